
import { CapacityExceededError, InvalidArgumentError, InvalidStateError, SizeMismatchError } from 'xlb-base-types';
import { ByteWriter } from 'xlb-utils';
import { BOFRecord, EOFRecord, StandardRecord } from 'xlb-records';
import { CheckSheetSize, GlobalLayout, MAX_CELL_STYLES, ValidateSheetName, WorkbookModel } from '../src';

/** three sheets, first one active and selected */
const ThreeSheets = (...names: string[]): WorkbookModel => {
  const model = new WorkbookModel();
  for (const name of names.length ? names : ['a', 'b', 'c']) {
    model.CreateSheet(name);
  }
  return model;
};

const png = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 1, 2, 3, 4]);
const anchor = { first_column: 1, first_row: 1, last_column: 3, last_row: 6 };

describe('sheets', () => {

  test('first sheet is active and selected', () => {
    const model = ThreeSheets();
    expect(model.sheet_count).toBe(3);
    expect(model.GetActiveSheetIndex()).toBe(0);
    expect(model.GetSelectedTabs()).toEqual([0]);
  });

  test('default names', () => {
    const model = new WorkbookModel();
    model.CreateSheet();
    model.CreateSheet();
    expect(model.GetSheetName(0)).toBe('Sheet1');
    expect(model.GetSheetName(1)).toBe('Sheet2');
  });

  test('duplicate names are rejected, ignoring case', () => {
    const model = ThreeSheets();
    expect(() => model.CreateSheet('A')).toThrow(InvalidArgumentError);
    expect(() => model.SetSheetName(1, 'C')).toThrow("The workbook already contains a sheet named 'C'");
    model.SetSheetName(1, 'B');
    expect(model.GetSheetIndex('b')).toBe(1);
  });

  test('sheet name rules', () => {
    expect(() => ValidateSheetName('a/b')).toThrow("Invalid char (/) found at index (1) in sheet name 'a/b'");
    expect(() => ValidateSheetName('')).toThrow(InvalidArgumentError);
    expect(() => ValidateSheetName('x'.repeat(32))).toThrow(InvalidArgumentError);
    expect(() => ValidateSheetName('\'quoted')).toThrow(InvalidArgumentError);
    expect(() => ValidateSheetName('x'.repeat(31))).not.toThrow();
  });

  test('out of range indexes', () => {
    const model = ThreeSheets();
    expect(() => model.GetSheetAt(3)).toThrow('Sheet index (3) is out of range (0..2)');
    expect(() => model.RemoveSheetAt(-1)).toThrow(InvalidArgumentError);
    expect(() => model.SetSheetOrder('missing', 0)).toThrow(InvalidArgumentError);
    expect(() => model.SetSheetOrder('a', 3)).toThrow(InvalidArgumentError);
  });

});

describe('tab selection', () => {

  test('removing the active, selected last sheet moves both to the new last sheet', () => {
    const model = ThreeSheets();
    model.SetActiveSheet(2);
    model.SetSelectedTab(2);
    model.RemoveSheetAt(2);
    expect(model.GetActiveSheetIndex()).toBe(1);
    expect(model.GetSelectedTabs()).toEqual([1]);
  });

  test('removing the active sheet activates the sheet that takes its place', () => {
    const model = ThreeSheets();
    model.SetActiveSheet(1);
    model.SetSelectedTab(1);
    model.RemoveSheetAt(1);
    expect(model.GetSheetName(1)).toBe('c');
    expect(model.GetActiveSheetIndex()).toBe(1);
    expect(model.GetSelectedTabs()).toEqual([1]);
  });

  test('removing a sheet before the active sheet keeps the same sheet active', () => {
    const model = ThreeSheets();
    model.SetActiveSheet(2);
    model.SetSelectedTab(2);
    model.RemoveSheetAt(0);
    expect(model.GetActiveSheetIndex()).toBe(1);
    expect(model.GetSheetName(model.GetActiveSheetIndex())).toBe('c');
    expect(model.GetSelectedTabs()).toEqual([1]);
  });

  test('selection is untouched if other sheets are still selected', () => {
    const model = ThreeSheets();
    model.SetSelectedTabs([0, 1, 2]);
    model.RemoveSheetAt(1);
    expect(model.GetSelectedTabs()).toEqual([0, 1]);
    expect(model.GetActiveSheetIndex()).toBe(0);
  });

  test('the last remaining sheet is active and selected', () => {
    const model = ThreeSheets();
    model.SetSelectedTab(2);
    model.RemoveSheets([0, 2]);
    expect(model.sheet_count).toBe(1);
    expect(model.GetSheetName(0)).toBe('b');
    expect(model.GetActiveSheetIndex()).toBe(0);
    expect(model.GetSelectedTabs()).toEqual([0]);
  });

  test('removing every sheet', () => {
    const model = ThreeSheets();
    model.RemoveSheets([0, 1, 2]);
    expect(model.sheet_count).toBe(0);
    expect(model.GetActiveSheetIndex()).toBe(-1);
    expect(model.GetFirstVisibleTab()).toBe(0);
  });

  test('active flag follows the sheet when it moves', () => {
    const model = ThreeSheets();
    model.SetSheetOrder('a', 2);
    expect([0, 1, 2].map(index => model.GetSheetName(index))).toEqual(['b', 'c', 'a']);
    expect(model.GetActiveSheetIndex()).toBe(2);
    expect(model.GetSelectedTabs()).toEqual([2]);
  });

  test('setting the active sheet leaves the selection alone', () => {
    const model = ThreeSheets();
    model.SetActiveSheet(1);
    expect(model.GetActiveSheetIndex()).toBe(1);
    expect(model.GetSelectedTabs()).toEqual([0]);
  });

  test('selecting tabs replaces the earlier selection', () => {
    const model = ThreeSheets();
    model.SetSelectedTabs([0, 2]);
    expect(model.GetSelectedTabs()).toEqual([0, 2]);
    model.SetSelectedTabs([1]);
    expect(model.GetSelectedTabs()).toEqual([1]);
    model.SetSelectedTab(2);
    expect(model.GetSelectedTabs()).toEqual([2]);
    expect(model.GetActiveSheetIndex()).toBe(0);
  });

  test('first visible tab shifts when an earlier sheet goes', () => {
    const model = ThreeSheets();
    model.SetFirstVisibleTab(2);
    model.RemoveSheetAt(0);
    expect(model.GetFirstVisibleTab()).toBe(1);
    expect(() => model.SetFirstVisibleTab(2)).toThrow(InvalidArgumentError);
  });

});

describe('formulas across sheet changes', () => {

  test('moving sheets does not change references', () => {
    const model = ThreeSheets('first sheet', 'other sheet', 'third');
    model.GetSheetAt(2).SetCellFormula(0, 0, 'SUM(\'other sheet\'!C1,\'first sheet\'!C1)');
    model.SetSheetOrder('other sheet', 0);
    model.SetSheetOrder('third', 1);
    const sheet = model.GetSheet('third');
    expect(sheet?.GetCellFormula(0, 0)).toBe('SUM(\'other sheet\'!C1,\'first sheet\'!C1)');
  });

  test('renaming a sheet shows up in formulas', () => {
    const model = ThreeSheets();
    model.GetSheetAt(0).SetCellFormula(0, 0, 'b!A1*2');
    model.SetSheetName(1, 'Inputs');
    expect(model.GetSheetAt(0).GetCellFormula(0, 0)).toBe('Inputs!A1*2');
  });

  test('references to a removed sheet become #REF!', () => {
    const model = ThreeSheets('first', 'second');
    const name = model.CreateName();
    name.SetNameName('myRange');
    name.SetRefersToFormula('second!$A$1:$A$3');
    model.GetSheetAt(0).SetCellFormula(1, 1, 'second!B2+1');

    model.RemoveSheetAt(1);

    expect(name.GetRefersToFormula()).toBe('#REF!$A$1:$A$3');
    expect(model.GetSheetAt(0).GetCellFormula(1, 1)).toBe('#REF!B2+1');
  });

  test('percent applies to any operand', () => {
    const model = ThreeSheets();
    const sheet = model.GetSheetAt(0);
    sheet.SetCellFormula(0, 1, 'A1%');
    sheet.SetCellFormula(0, 2, '(A1+1)%');
    sheet.SetCellFormula(0, 3, '50%*2');
    expect(sheet.GetCellFormula(0, 1)).toBe('A1%');
    expect(sheet.GetCellFormula(0, 2)).toBe('(A1+1)%');
    expect(sheet.GetCellFormula(0, 3)).toBe('50%*2');

    const a1 = { row: 0, column: 0, row_relative: true, column_relative: true };
    expect(model.formulas.Compile('(A1+1)%')).toEqual([
      { type: 'ref', cls: 'reference', ref: a1 },
      { type: 'int', value: 1 },
      { type: 'binary', operator: '+' },
      { type: 'unary', operator: '()' },
      { type: 'unary', operator: '%' },
    ]);
  });

  test('unknown sheets and functions are rejected', () => {
    const model = ThreeSheets();
    const sheet = model.GetSheetAt(0);
    expect(() => sheet.SetCellFormula(0, 0, 'missing!A1')).toThrow('Unknown sheet: missing');
    expect(() => sheet.SetCellFormula(0, 0, 'NOSUCHFUNCTION(1)')).toThrow(InvalidArgumentError);
    expect(sheet.GetCell(0, 0)).toBeUndefined();
  });

});

describe('names', () => {

  test('GetNameAt on an empty table', () => {
    const model = ThreeSheets();
    expect(() => model.GetNameAt(0)).toThrow(InvalidStateError);
    expect(() => model.GetNameAt(0)).toThrow('There are no defined names in this workbook');
  });

  test('GetNameAt out of range', () => {
    const model = ThreeSheets();
    model.CreateName().SetNameName('rates');
    expect(() => model.GetNameAt(3)).toThrow(InvalidArgumentError);
    expect(() => model.GetNameAt(3)).toThrow('Specified name index 3 is outside the allowable range (0..0)');
    expect(model.GetNameAt(0).name).toBe('rates');
  });

  test('name rules', () => {
    const model = ThreeSheets();
    const name = model.CreateName();
    expect(() => name.SetNameName('A1')).toThrow(InvalidArgumentError);
    expect(() => name.SetNameName('R1C1')).toThrow(InvalidArgumentError);
    expect(() => name.SetNameName('1st')).toThrow(InvalidArgumentError);
    expect(() => name.SetNameName('has space')).toThrow(InvalidArgumentError);
    name.SetNameName('_tax.rate');
    expect(model.GetNameIndex('_TAX.RATE')).toBe(0);
  });

  test('the same name can exist in different scopes', () => {
    const model = ThreeSheets();
    const global = model.CreateName();
    global.SetNameName('total');
    const local = model.CreateName();
    local.SetSheetIndex(1);
    local.SetNameName('total');
    expect(model.GetName('total')).toBe(global);
    expect(model.GetName('total', 1)).toBe(local);
    expect(local.GetSheetIndex()).toBe(1);

    const duplicate = model.CreateName();
    expect(() => duplicate.SetNameName('TOTAL')).toThrow('The workbook already contains this name: TOTAL');
  });

  test('removing a name renumbers name tokens', () => {
    const model = ThreeSheets();
    const one = model.CreateName();
    one.SetNameName('one');
    one.SetRefersToFormula('a!$A$1');
    const two = model.CreateName();
    two.SetNameName('two');
    two.SetRefersToFormula('a!$B$1');

    const sheet = model.GetSheetAt(0);
    sheet.SetCellFormula(0, 2, 'two+one');
    expect(sheet.GetCellFormula(0, 2)).toBe('two+one');

    model.RemoveName(0);

    expect(model.name_count).toBe(1);
    expect(sheet.GetCellFormula(0, 2)).toBe('two+#NAME?');
  });

  test('names scoped to a removed sheet move to the workbook', () => {
    const model = ThreeSheets();
    const local = model.CreateName();
    local.SetSheetIndex(1);
    local.SetNameName('local');
    local.SetRefersToFormula('a!$A$1');
    model.SetPrintArea(1, '$A$1:$B$2');
    expect(model.name_count).toBe(2);

    model.RemoveSheetAt(1);

    expect(model.name_count).toBe(2);
    expect(local.GetSheetIndex()).toBe(-1);
    expect(local.orphaned).toBe(false);
    expect(model.GetName('local')).toBe(local);
    expect(local.GetRefersToFormula()).toBe('a!$A$1');
  });

  test('built-in names of a removed sheet keep a deleted-sheet scope', () => {
    const model = ThreeSheets();
    model.SetPrintArea(1, '$A$1:$B$2');
    const print_area = model.GetNameAt(0);

    model.RemoveSheetAt(1);

    expect(model.name_count).toBe(1);
    expect(model.GetNameAt(0)).toBe(print_area);
    expect(print_area.orphaned).toBe(true);
    expect(print_area.GetSheetIndex()).toBe(-1);
    expect(print_area.GetRefersToFormula()).toBe('#REF!$A$1:$B$2');
    expect(model.GetPrintArea(0)).toBeUndefined();
    expect(model.GetPrintArea(1)).toBeUndefined();
  });

  test('scoped names that collide with a workbook name keep a deleted-sheet scope', () => {
    const model = ThreeSheets();
    const global = model.CreateName();
    global.SetNameName('total');
    global.SetRefersToFormula('a!$A$1');
    const local = model.CreateName();
    local.SetSheetIndex(2);
    local.SetNameName('total');
    local.SetRefersToFormula('b!$B$2');
    const sheet = model.GetSheetAt(0);
    sheet.SetCellFormula(0, 0, 'c!total*2');

    model.RemoveSheetAt(2);

    expect(model.name_count).toBe(2);
    expect(local.orphaned).toBe(true);
    expect(local.GetSheetIndex()).toBe(-1);
    expect(local.GetRefersToFormula()).toBe('b!$B$2');
    expect(model.GetName('total')).toBe(global);
    expect(global.orphaned).toBe(false);
    expect(sheet.GetCellFormula(0, 0)).toBe('total*2');
  });

});

describe('print area', () => {

  test('set, get and remove', () => {
    const model = ThreeSheets('first sheet', 'b');
    expect(model.GetPrintArea(0)).toBeUndefined();

    model.SetPrintArea(0, '$A$1:$C$5');
    expect(model.GetPrintArea(0)).toBe('\'first sheet\'!$A$1:$C$5');
    expect(model.GetNameAt(0).name).toBe('Print_Area');
    expect(model.GetNameAt(0).GetSheetIndex()).toBe(0);

    model.SetPrintArea(0, '$B$2:$D$4');
    expect(model.name_count).toBe(1);
    expect(model.GetPrintArea(0)).toBe('\'first sheet\'!$B$2:$D$4');

    model.RemovePrintArea(0);
    expect(model.GetPrintArea(0)).toBeUndefined();
    expect(model.name_count).toBe(0);
  });

});

describe('clone', () => {

  test('numbered names', () => {
    const model = new WorkbookModel();
    model.CreateSheet('Data');
    expect(model.CloneSheet(0).name).toBe('Data (2)');
    expect(model.CloneSheet(0).name).toBe('Data (3)');
    expect(model.CloneSheet(1).name).toBe('Data (4)');
  });

  test('long names are shortened to fit', () => {
    const model = new WorkbookModel();
    model.CreateSheet('x'.repeat(31));
    expect(model.CloneSheet(0).name).toBe('x'.repeat(27) + ' (2)');
  });

  test('the copy is independent, and not selected', () => {
    const model = new WorkbookModel();
    const source = model.CreateSheet('Data');
    source.SetCellValue(0, 0, 42);
    source.SetCellFormula(1, 0, 'A1*2');

    const clone = model.CloneSheet(0);
    clone.SetCellValue(0, 0, 'changed');

    expect(source.GetCellValue(0, 0)).toBe(42);
    expect(clone.GetCellValue(0, 0)).toBe('changed');
    expect(clone.GetCellFormula(1, 0)).toBe('A1*2');
    expect(clone.IsActive()).toBe(false);
    expect(clone.IsSelected()).toBe(false);
    expect(model.GetSelectedTabs()).toEqual([0]);
  });

  test('print area comes along', () => {
    const model = new WorkbookModel();
    model.CreateSheet('Data');
    model.SetPrintArea(0, '$A$1:$B$2');
    model.CloneSheet(0);
    expect(model.name_count).toBe(2);
    expect(model.GetPrintArea(1)).toBe('\'Data (2)\'!$A$1:$B$2');
    expect(model.GetPrintArea(0)).toBe('Data!$A$1:$B$2');
  });

});

describe('pictures', () => {

  test('reference counts follow clones and removal', () => {
    const model = new WorkbookModel();
    model.CreateSheet('pics');
    const index = model.AddPicture(png, 'png');
    expect(index).toBe(1);
    expect(model.GetPictureReferenceCount(index)).toBe(0);

    expect(model.InsertPicture(0, index, anchor)).toBe(1025);
    expect(model.GetPictureReferenceCount(index)).toBe(1);

    model.CloneSheet(0);
    expect(model.GetPictureReferenceCount(index)).toBe(2);
    model.CloneSheet(0);
    expect(model.GetPictureReferenceCount(index)).toBe(3);

    model.RemoveSheetAt(2);
    expect(model.GetPictureReferenceCount(index)).toBe(2);
  });

  test('a sheet that refuses to clone leaves the pictures alone', () => {
    const model = new WorkbookModel();
    const sheet = model.CreateSheet('pics');
    const index = model.AddPicture(png, 'png');
    model.InsertPicture(0, index, anchor);
    sheet.preserved = [];

    expect(() => model.CloneSheet(0)).toThrow(InvalidStateError);
    expect(model.GetPictureReferenceCount(index)).toBe(1);
    expect(model.sheet_count).toBe(1);

    sheet.preserved = undefined;
    expect(model.CloneSheet(0).name).toBe('pics (2)');
    expect(model.GetPictureReferenceCount(index)).toBe(2);
  });

  test('picture index must exist', () => {
    const model = new WorkbookModel();
    model.CreateSheet();
    expect(() => model.InsertPicture(0, 1, anchor)).toThrow(InvalidArgumentError);
    expect(() => model.GetPictureReferenceCount(0)).toThrow(InvalidArgumentError);
  });

});

describe('workbook settings', () => {

  test('cell style capacity', () => {
    const model = new WorkbookModel();
    expect(model.cell_style_count).toBe(21);
    for (let i = model.cell_style_count; i < MAX_CELL_STYLES; i++) {
      model.CreateCellStyle();
    }
    expect(model.cell_style_count).toBe(4030);
    expect(() => model.CreateCellStyle()).toThrow(CapacityExceededError);
    expect(() => model.CreateCellStyle()).toThrow(
      'The maximum number of cell styles was exceeded. You can define up to 4000 styles in a .xls workbook');
    expect(model.cell_style_count).toBe(4030);
  });

  test('write protection', () => {
    const model = new WorkbookModel();
    expect(model.IsWriteProtected()).toBe(false);
    model.WriteProtectWorkbook('test-secret', 'someone');
    expect(model.IsWriteProtected()).toBe(true);
    expect(model.file_sharing?.username).toBe('someone');
    expect(model.ValidateWriteProtectPassword('test-secret')).toBe(true);
    expect(model.ValidateWriteProtectPassword('other')).toBe(false);
    model.UnwriteProtectWorkbook();
    expect(model.IsWriteProtected()).toBe(false);
    expect(model.file_sharing).toBeUndefined();
  });

  test('hidden', () => {
    const model = new WorkbookModel();
    model.SetHidden(true);
    expect(model.IsHidden()).toBe(true);
    expect(model.window1.options & 0x0001).toBe(1);
    model.SetHidden(false);
    expect(model.IsHidden()).toBe(false);
  });

});

describe('cells', () => {

  test('values, errors and dimensions', () => {
    const model = new WorkbookModel();
    const sheet = model.CreateSheet();
    sheet.SetCellValue(2, 3, 'text');
    sheet.SetCellValue(5, 1, '#N/A');
    sheet.SetCellValue(4, 4, true);

    expect(sheet.GetCellValue(5, 1)).toEqual({ error: '#N/A' });
    expect(sheet.GetCell(5, 1)?.type).toBe('error');
    expect(sheet.Dimensions()).toEqual({ first_row: 2, last_row: 6, first_column: 1, last_column: 5 });
    expect(sheet.first_row).toBe(2);
    expect(sheet.last_row).toBe(5);
    expect(sheet.Cells().map(cell => [cell.row, cell.column])).toEqual([[2, 3], [4, 4], [5, 1]]);

    expect(sheet.RemoveCell(2, 3)).toBe(true);
    expect(sheet.cell_count).toBe(2);
  });

  test('addresses are checked', () => {
    const sheet = new WorkbookModel().CreateSheet();
    expect(() => sheet.SetCellValue(65536, 0, 1)).toThrow(InvalidArgumentError);
    expect(() => sheet.SetCellValue(0, 256, 1)).toThrow(InvalidArgumentError);
    expect(sheet.Dimensions()).toBeUndefined();
  });

});

describe('globals layout', () => {

  test('missing slots go in front of the next slot that exists', () => {
    const layout = new GlobalLayout([
      { record: new BOFRecord() },
      { slot: 'window1' },
      { slot: 'sst' },
      { record: new EOFRecord() },
    ]);
    layout.Ensure('names');
    layout.Ensure('write-protect');
    layout.Ensure('file-sharing');
    layout.Ensure('tabid');
    expect(layout.entries.map(entry => 'slot' in entry ? entry.slot : entry.record.sid)).toEqual([
      0x0809, 'write-protect', 'file-sharing', 'tabid', 'window1', 'names', 'sst', 0x000a,
    ]);
  });

  test('default layout has every slot', () => {
    const layout = GlobalLayout.Default();
    for (const slot of ['write-protect', 'tabid', 'window1', 'styles', 'boundsheets', 'links', 'names', 'drawing-group', 'sst'] as const) {
      expect(layout.Has(slot)).toBe(true);
    }
  });

});

describe('sheet size guard', () => {

  class ShortRecord extends StandardRecord {
    public readonly sid = 0x0777;
    public DataSize(): number {
      return 8;
    }
    protected SerializeData(writer: ByteWriter): void {
      writer.WriteUInt32(0);
    }
  }

  test('matching sizes', () => {
    expect(CheckSheetSize([new BOFRecord(), new EOFRecord()], 0)).toBe(24);
  });

  test('a record that writes less than it declares', () => {
    const records = [new BOFRecord(), new ShortRecord(), new EOFRecord()];
    expect(() => CheckSheetSize(records, 3)).toThrow(SizeMismatchError);
    expect(() => CheckSheetSize(records, 3)).toThrow(
      'Actual serialized sheet size (32) differs from pre-calculated size (36) for sheet (3)');
  });

});
