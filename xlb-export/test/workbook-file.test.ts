import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as CFB from 'cfb';
import { FormatError, InvalidStateError, SizeMismatchError } from 'xlb-base-types';
import { Container } from 'xlb-container';
import {
  BOFRecord, BoundSheetRecord, DecodeRecords, EOFRecord, EncodeRecords, SSTRecord, Sid, SplitRecords,
  SheetVisibility, SubstreamType, UnknownRecord,
} from 'xlb-records';
import { WorkbookFile } from '../src';

const Fill = (length: number, seed = 1): Uint8Array => {
  const data = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    data[i] = (i * 17 + seed) & 0xff;
  }
  return data;
};

/** declares four bytes more than it writes */
class ShortRecord extends UnknownRecord {
  public DataSize(): number {
    return this.data.length + 4;
  }
}

/** the workbook stream from a container image */
const WorkbookStream = (bytes: Uint8Array): Uint8Array => {
  const stream = Container.Open(bytes).GetStream('Workbook');
  if (!stream) {
    throw new Error('no workbook stream');
  }
  return stream;
};

const Reopen = (file: WorkbookFile): WorkbookFile => WorkbookFile.Open(file.GetBytes());

/** container holding a single stream */
const Wrap = (name: string, data: Uint8Array): Uint8Array => {
  const container = Container.Create();
  container.ReplaceStream(name, data);
  return container.ToBytes();
};

const OpenError = (bytes: Uint8Array): FormatError => {
  try {
    WorkbookFile.Open(bytes);
  }
  catch (err) {
    if (err instanceof FormatError) {
      return err;
    }
    throw err;
  }
  throw new Error('expected a format error');
};

const Sample = (): WorkbookFile => {
  const file = WorkbookFile.Create();
  const data = file.model.CreateSheet('Data');
  data.SetCellValue(0, 0, 42.5);
  data.SetCellValue(0, 1, 'text');
  data.SetCellValue(0, 2, true);
  data.SetCellValue(0, 3, '#DIV/0!');
  data.SetCellBlank(0, 4);
  data.SetCellFormula(1, 0, 'A1*2');
  const summary = file.model.CreateSheet('Summary');
  summary.SetCellFormula(0, 0, 'Data!A1+1');
  return file;
};

/** the sample workbook, plus a stream, a storage and a root class id */
const Extended = (): Uint8Array => {
  const container = Container.Create();
  container.ReplaceStream('Workbook', WorkbookStream(Sample().GetBytes()));
  container.ReplaceStream('Extra', Fill(300, 5));
  container.CreateStorage('Macros');
  container.ReplaceStream('Macros/Module1', Fill(40, 9));
  container.SetRootClassId(Fill(16, 3));
  return container.ToBytes();
};

describe('round trip', () => {

  test('cell values and formulas', () => {
    const model = Reopen(Sample()).model;
    expect(model.sheet_count).toBe(2);

    const data = model.GetSheetAt(0);
    expect(data.name).toBe('Data');
    expect(data.GetCellValue(0, 0)).toBe(42.5);
    expect(data.GetCellValue(0, 1)).toBe('text');
    expect(data.GetCellValue(0, 2)).toBe(true);
    expect(data.GetCellValue(0, 3)).toEqual({ error: '#DIV/0!' });
    expect(data.GetCell(0, 4)?.type).toBe('blank');
    expect(data.GetCellFormula(1, 0)).toBe('A1*2');

    expect(model.GetSheetAt(1).GetCellFormula(0, 0)).toBe('Data!A1+1');
  });

  test('an empty workbook', () => {
    const model = Reopen(WorkbookFile.Create()).model;
    expect(model.sheet_count).toBe(0);
    expect(model.GetActiveSheetIndex()).toBe(-1);
  });

  test('renamed and reordered sheets keep their references', () => {
    const file = Sample();
    file.model.SetSheetName(0, 'Inputs');
    file.model.SetSheetOrder('Summary', 0);

    const model = Reopen(file).model;
    expect(model.GetSheetName(0)).toBe('Summary');
    expect(model.GetSheetName(1)).toBe('Inputs');
    expect(model.GetSheetAt(0).GetCellFormula(0, 0)).toBe('Inputs!A1+1');
  });

  test('a reference to a removed sheet stays #REF! after a save', () => {
    const file = Sample();
    file.model.RemoveSheetAt(0);

    const model = Reopen(file).model;
    expect(model.sheet_count).toBe(1);
    expect(model.GetSheetAt(0).GetCellFormula(0, 0)).toBe('#REF!A1+1');
  });

  test('active sheet and selection', () => {
    const file = Sample();
    file.model.SetActiveSheet(1);
    file.model.SetSelectedTabs([0, 1]);

    const model = Reopen(file).model;
    expect(model.GetActiveSheetIndex()).toBe(1);
    expect(model.GetSelectedTabs()).toEqual([0, 1]);
  });

  test('print area', () => {
    const file = Sample();
    file.model.SetPrintArea(1, '$A$1:$C$5');

    const model = Reopen(file).model;
    expect(model.GetPrintArea(1)).toBe('Summary!$A$1:$C$5');
    expect(model.GetPrintArea(0)).toBeUndefined();
  });

  test('write protection', () => {
    const file = Sample();
    file.model.WriteProtectWorkbook('test-secret', 'tester');

    const reopened = Reopen(file);
    const model = reopened.model;
    expect(model.IsWriteProtected()).toBe(true);
    expect(model.ValidateWriteProtectPassword('test-secret')).toBe(true);
    expect(model.ValidateWriteProtectPassword('wrong')).toBe(false);

    model.UnwriteProtectWorkbook();
    const records = DecodeRecords(WorkbookStream(reopened.GetBytes()));
    expect(records.some(record => record.sid === Sid.WRITEPROTECT || record.sid === Sid.FILESHARING)).toBe(false);
  });

  test('hidden workbook', () => {
    const file = Sample();
    file.model.SetHidden(true);
    expect(Reopen(file).model.IsHidden()).toBe(true);
  });

  test('sheet visibility', () => {
    const file = Sample();
    file.model.SetSheetVisibility(1, SheetVisibility.VeryHidden);
    expect(Reopen(file).model.GetSheetAt(1).visibility).toBe(SheetVisibility.VeryHidden);
  });

  test('pictures and their reference counts', () => {
    const file = Sample();
    const index = file.model.AddPicture(Fill(64), 'png');
    file.model.InsertPicture(0, index, { first_column: 1, first_row: 1, last_column: 3, last_row: 5 });

    const model = Reopen(file).model;
    expect(model.GetPictureReferenceCount(index)).toBe(1);
    expect(model.GetSheetAt(0).drawing?.editable).toBe(true);

    model.InsertPicture(0, index, { first_column: 4, first_row: 1, last_column: 6, last_row: 5 });
    expect(model.GetPictureReferenceCount(index)).toBe(2);
  });

  test('blank runs', () => {
    const file = Sample();
    file.model.GetSheetAt(0).body.push(
      new UnknownRecord(Sid.MULBLANK, Uint8Array.from([2, 0, 1, 0, 15, 0, 16, 0, 2, 0])));
    const sheet = Reopen(file).model.GetSheetAt(0);
    expect(sheet.GetCell(2, 1)).toEqual({ type: 'blank', row: 2, column: 1, xf: 15 });
    expect(sheet.GetCell(2, 2)).toEqual({ type: 'blank', row: 2, column: 2, xf: 16 });
    expect(sheet.GetCell(2, 3)).toBeUndefined();
  });

  test('long strings are continued and come back whole', () => {
    const file = WorkbookFile.Create();
    const text = 'x'.repeat(10000);
    file.model.CreateSheet().SetCellValue(0, 0, text);

    const bytes = file.GetBytes();
    const sst = SplitRecords(WorkbookStream(bytes)).find(record => record.sid === Sid.SST);
    expect(sst?.fragments.length).toBe(2);

    expect(WorkbookFile.Open(bytes).model.GetSheetAt(0).GetCellValue(0, 0)).toBe(text);
  });

});

describe('stream layout', () => {

  test('strings are shared', () => {
    const file = WorkbookFile.Create();
    const sheet = file.model.CreateSheet();
    sheet.SetCellValue(0, 0, 'hello');
    sheet.SetCellValue(0, 1, 'hello');
    sheet.SetCellValue(1, 0, 'world');

    const sst = DecodeRecords(WorkbookStream(file.GetBytes())).find(record => record instanceof SSTRecord);
    expect(sst instanceof SSTRecord && sst.strings).toEqual(['hello', 'world']);
    expect(sst instanceof SSTRecord && sst.total).toBe(3);
  });

  test('sheet offsets point at each sheet\'s BOF', () => {
    const file = Sample();
    file.model.CreateSheet('Third').SetCellValue(3, 3, 'more');

    const stream = WorkbookStream(file.GetBytes());
    const raw = SplitRecords(stream);
    const bound = DecodeRecords(stream).filter((record): record is BoundSheetRecord => record instanceof BoundSheetRecord);

    expect(bound.map(record => record.name)).toEqual(['Data', 'Summary', 'Third']);
    for (const record of bound) {
      const target = raw.find(test => test.offset === record.position);
      expect(target?.sid).toBe(Sid.BOF);
    }
  });

  test('unknown global records keep their position', () => {
    const file = Sample();
    file.model.layout.entries.splice(1, 0, { record: new UnknownRecord(0x00e1, Uint8Array.from([0xb0, 0x04])) });

    const once = Reopen(file);
    const records = DecodeRecords(WorkbookStream(once.GetBytes()));
    expect(records[1].sid).toBe(0x00e1);
  });

  test('stale index records are dropped', () => {
    const file = WorkbookFile.Create();
    file.model.CreateSheet().head.push(new UnknownRecord(Sid.INDEX, new Uint8Array(16)));

    const info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    try {
      const reopened = Reopen(file);
      expect(info).toHaveBeenCalledWith('dropped 1 stale index record(s) from sheet \'Sheet1\'');
      const records = DecodeRecords(WorkbookStream(reopened.GetBytes()));
      expect(records.some(record => record.sid === Sid.INDEX)).toBe(false);
    }
    finally {
      info.mockRestore();
    }
  });

  test('a sheet that writes less than it declares aborts the save', () => {
    const file = Sample();
    file.model.GetSheetAt(1).body.push(new ShortRecord(0x0777, new Uint8Array(4)));

    try {
      file.GetBytes();
      throw new Error('expected a size mismatch');
    }
    catch (err) {
      expect(err).toBeInstanceOf(SizeMismatchError);
      if (err instanceof SizeMismatchError) {
        expect(err.message).toMatch(/for sheet \(1\)$/);
        expect(err.expected - err.actual).toBe(4);
      }
    }
  });

});

describe('container', () => {

  test('other entries and the root class id are carried over', () => {
    const output = Container.Open(WorkbookFile.Open(Extended()).GetBytes());
    expect(output.GetStream('Extra')).toEqual(Fill(300, 5));
    expect(output.GetStream('Macros/Module1')).toEqual(Fill(40, 9));
    expect(output.GetRootClassId()).toEqual(Fill(16, 3));
  });

  test('without preserve_nodes only the workbook is written', () => {
    const output = Container.Open(WorkbookFile.Open(Extended(), { preserve_nodes: false }).GetBytes());
    expect(output.Entries().map(entry => entry.path)).toEqual(['Workbook']);
    expect(output.GetRootClassId()).toEqual(Fill(16, 3));
  });

  test('the workbook stream name is matched without case', () => {
    const bytes = Wrap('WORKBOOK', WorkbookStream(Sample().GetBytes()));
    const file = WorkbookFile.Open(bytes);
    expect(file.model.GetSheetName(1)).toBe('Summary');
    expect(Container.Open(file.GetBytes()).Entries().map(entry => entry.path)).toEqual(['WORKBOOK']);
  });

  test('our output reads with a third-party reader', () => {
    const bytes = Sample().GetBytes();
    const doc = CFB.read(Buffer.from(bytes), { type: 'buffer' });
    const entry = CFB.find(doc, '/Workbook');
    expect(entry && Uint8Array.from(entry.content)).toEqual(WorkbookStream(bytes));
  });

  test('third-party output reads with our reader', () => {
    const doc = CFB.utils.cfb_new();
    CFB.utils.cfb_add(doc, 'Workbook', WorkbookStream(Sample().GetBytes()));
    const bytes = Uint8Array.from(CFB.write(doc, { type: 'buffer' }));
    expect(WorkbookFile.Open(bytes).model.GetSheetAt(0).GetCellValue(0, 1)).toBe('text');
  });

  test('writing to a sink', () => {
    const chunks: Uint8Array[] = [];
    const file = Sample();
    file.Write({ Write: bytes => chunks.push(bytes) });
    expect(chunks.length).toBe(1);
    expect(WorkbookFile.Open(chunks[0]).model.sheet_count).toBe(2);
  });

  test('opening from chunks', () => {
    const bytes = Sample().GetBytes();
    const file = WorkbookFile.Open([bytes.slice(0, 1000), bytes.slice(1000)]);
    expect(file.model.GetSheetAt(0).GetCellValue(0, 0)).toBe(42.5);
  });

});

describe('files', () => {

  let directory = '';

  beforeAll(() => {
    directory = fs.mkdtempSync(path.join(os.tmpdir(), 'xlb-'));
  });

  afterAll(() => {
    fs.rmSync(directory, { recursive: true, force: true });
  });

  test('write, then update in place', () => {
    const target = path.join(directory, 'update.xls');
    Sample().Write(target);

    const file = WorkbookFile.Open(target);
    file.model.GetSheetAt(0).SetCellValue(0, 0, 7);
    file.WriteInPlace();
    file.Close();

    const reopened = WorkbookFile.Open(target, { read_only: true });
    expect(reopened.model.GetSheetAt(0).GetCellValue(0, 0)).toBe(7);
    reopened.Close();
  });

  test('close does not write', () => {
    const target = path.join(directory, 'close.xls');
    Sample().Write(target);
    const before = fs.readFileSync(target);

    const file = WorkbookFile.Open(target);
    file.model.GetSheetAt(0).SetCellValue(0, 0, 99);
    file.Close();

    expect(fs.readFileSync(target)).toEqual(before);
  });

  test('read-only files can be written elsewhere but not in place', () => {
    const source = path.join(directory, 'readonly.xls');
    const copy = path.join(directory, 'copy.xls');
    Sample().Write(source);

    const file = WorkbookFile.Open({ path: source }, { read_only: true });
    expect(() => file.WriteInPlace()).toThrow('cannot write in place: the file was opened read-only');
    file.Write(copy);
    file.Close();

    const written = WorkbookFile.Open(copy, { read_only: true });
    expect(written.model.sheet_count).toBe(2);
    written.Close();
  });

  test('updating in place keeps the other entries and the root class id', () => {
    const target = path.join(directory, 'extended.xls');
    fs.writeFileSync(target, Extended());

    const file = WorkbookFile.Open(target);
    file.model.GetSheetAt(0).SetCellValue(0, 0, 7);
    file.WriteInPlace();
    file.Close();

    const output = Container.Open(Uint8Array.from(fs.readFileSync(target)));
    expect(output.GetStream('Extra')).toEqual(Fill(300, 5));
    expect(output.GetStream('Macros/Module1')).toEqual(Fill(40, 9));
    expect(output.GetRootClassId()).toEqual(Fill(16, 3));

    const reopened = WorkbookFile.Open(target, { read_only: true });
    expect(reopened.model.GetSheetAt(0).GetCellValue(0, 0)).toBe(7);
    reopened.Close();
  });

  test('bytes in memory cannot be written in place', () => {
    const file = WorkbookFile.Open(Sample().GetBytes());
    expect(() => file.WriteInPlace()).toThrow(InvalidStateError);
    expect(() => file.WriteInPlace()).toThrow(/cannot write in place/);
  });

  test('chunked input and new workbooks cannot be written in place', () => {
    const chunked = WorkbookFile.Open([Sample().GetBytes()]);
    expect(() => chunked.WriteInPlace()).toThrow(InvalidStateError);
    expect(() => chunked.WriteInPlace()).toThrow(
      'cannot write in place: the workbook was not opened from a writable file (stream)');

    const created = Sample();
    expect(() => created.WriteInPlace()).toThrow(
      'cannot write in place: the workbook was not opened from a writable file (new)');
  });

  test('a closed file cannot be written', () => {
    const file = WorkbookFile.Open(Sample().GetBytes());
    file.Close();
    expect(() => file.GetBytes()).toThrow('workbook file is closed');
  });

});

describe('unsupported files', () => {

  test('zip packages', () => {
    const bytes = new Uint8Array(512);
    bytes.set([0x50, 0x4b, 0x03, 0x04]);
    expect(OpenError(bytes).variant).toBe('ooxml');
  });

  test('a pre-97 book stream', () => {
    expect(OpenError(Wrap('Book', Fill(64))).variant).toBe('biff5');
  });

  test('a pre-97 version in the workbook stream', () => {
    const stream = EncodeRecords([new BOFRecord(SubstreamType.Globals, 0x0500), new EOFRecord()]);
    const err = OpenError(Wrap('Workbook', stream));
    expect(err.variant).toBe('biff5');
    expect(err.message).toMatch(/BIFF5/);
  });

  test('no workbook stream', () => {
    const err = OpenError(Wrap('Something', Fill(10)));
    expect(err.variant).toBe('missing-workbook');
    expect(err.message).toMatch(/Something/);
  });

  test('encrypted workbooks', () => {
    const file = Sample();
    file.model.layout.entries.splice(1, 0, { record: new UnknownRecord(Sid.FILEPASS, new Uint8Array(6)) });
    expect(OpenError(file.GetBytes()).variant).toBe('encrypted');
  });

  test('blank runs whose length does not match their columns', () => {
    const short = Sample();
    short.model.GetSheetAt(0).body.push(
      new UnknownRecord(Sid.MULBLANK, Uint8Array.from([2, 0, 1, 0, 15, 0, 15, 0, 3, 0])));
    const err = OpenError(short.GetBytes());
    expect(err.variant).toBe('corrupt');
    expect(err.message).toBe('MULBLANK record on sheet \'Data\' covers columns 1..3 but holds 2 cells');

    const odd = Sample();
    odd.model.GetSheetAt(0).body.push(new UnknownRecord(Sid.MULBLANK, Uint8Array.from([2, 0, 1, 0, 15])));
    expect(OpenError(odd.GetBytes()).message).toBe('MULBLANK record on sheet \'Data\' has an invalid length (5)');
  });

  test('a worksheet stream where the globals should be', () => {
    const stream = EncodeRecords([new BOFRecord(SubstreamType.Worksheet), new EOFRecord()]);
    expect(OpenError(Wrap('Workbook', stream)).variant).toBe('corrupt');
  });

});
