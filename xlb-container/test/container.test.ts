
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import * as CFB from 'cfb';
import { FormatError, InvalidStateError } from 'xlb-base-types';
import { Container, LIBRARY_SEED_STREAM } from '../src';

const Fill = (length: number, seed = 1): Uint8Array => {
  const data = new Uint8Array(length);
  for (let i = 0; i < length; i++) {
    data[i] = (i * 31 + seed) & 0xff;
  }
  return data;
};

const Sample = (): Container => {
  const container = Container.Create();
  container.ReplaceStream('Workbook', Fill(100));
  container.ReplaceStream('Large', Fill(5000, 7));
  container.CreateStorage('MBD0001');
  container.ReplaceStream('MBD0001/Ole', Fill(20, 3));
  return container;
};

/**
 * a container with one 10-sector stream. FAT in sector 0, mini FAT in 1,
 * directory in 2, the stream in 3..12 and the mini stream after it.
 */
const SingleStream = (): Uint8Array => {
  const container = Container.Create();
  container.ReplaceStream('Large', Fill(5000));
  return container.ToBytes();
};

const PatchFAT = (bytes: Uint8Array, index: number, value: number) => {
  new DataView(bytes.buffer, bytes.byteOffset).setUint32(512 + index * 4, value, true);
};

describe('round trip', () => {

  test('streams and storages survive', () => {
    const bytes = Sample().ToBytes();
    expect(bytes.length % 512).toBe(0);

    const container = Container.Open(bytes);
    expect(container.GetStream('Workbook')).toEqual(Fill(100));
    expect(container.GetStream('Large')).toEqual(Fill(5000, 7));
    expect(container.GetStream('MBD0001/Ole')).toEqual(Fill(20, 3));
    expect(container.HasStream('MBD0001')).toBe(false);
    expect(container.GetStorage('MBD0001')?.children.length).toBe(1);
  });

  test('lookups ignore case', () => {
    const container = Container.Open(Sample().ToBytes());
    expect(container.HasStream('WORKBOOK')).toBe(true);
    expect(container.GetStream('mbd0001/ole')).toEqual(Fill(20, 3));
  });

  test('entries are listed with paths and sizes', () => {
    const container = Container.Open(Sample().ToBytes());
    const entries = container.Entries();
    expect(entries).toContainEqual({ path: 'Workbook', type: 'stream', size: 100 });
    expect(entries).toContainEqual({ path: 'MBD0001', type: 'storage', size: 0 });
    expect(entries).toContainEqual({ path: 'MBD0001/Ole', type: 'stream', size: 20 });
  });

  test('root class id is preserved', () => {
    const container = Sample();
    const class_id = Fill(16, 9);
    container.SetRootClassId(class_id);
    expect(Container.Open(container.ToBytes()).GetRootClassId()).toEqual(class_id);
    expect(() => container.SetRootClassId(new Uint8Array(4))).toThrow('16 bytes');
  });

  test('empty streams', () => {
    const container = Container.Create();
    container.ReplaceStream('Empty', new Uint8Array(0));
    const reopened = Container.Open(container.ToBytes());
    expect(reopened.HasStream('Empty')).toBe(true);
    expect(reopened.GetStream('Empty')?.length).toBe(0);
  });

  test('the library\'s own seed stream is not listed', () => {
    const bytes = Container.Create().ToBytes();
    const doc = CFB.read(Buffer.from(bytes), { type: 'buffer' });
    expect(CFB.find(doc, '/' + LIBRARY_SEED_STREAM)).not.toBeNull();
    expect(Container.Open(bytes).Entries()).toEqual([]);
  });

  test('a replaced stream keeps its stored name', () => {
    const container = Container.Create();
    container.ReplaceStream('WORKBOOK', Fill(10));
    container.ReplaceStream('Workbook', Fill(12));
    expect(Container.Open(container.ToBytes()).Entries()).toEqual([{ path: 'WORKBOOK', type: 'stream', size: 12 }]);
  });

  test('streams and storages can\'t stand in for each other', () => {
    const container = Sample();
    expect(() => container.ReplaceStream('MBD0001', Fill(4))).toThrow('MBD0001 is a storage, not a stream');
    expect(() => container.CreateStorage('Workbook')).toThrow('Workbook is a stream, not a storage');
    expect(() => container.ReplaceStream('Missing/Stream', Fill(4))).toThrow('no storage at Missing');
  });

  test('remove entry', () => {
    const container = Sample();
    expect(container.RemoveEntry('mbd0001')).toBe(true);
    expect(container.RemoveEntry('MBD0001')).toBe(false);
    const reopened = Container.Open(container.ToBytes());
    expect(reopened.Get('MBD0001')).toBeUndefined();
    expect(reopened.HasStream('MBD0001/Ole')).toBe(false);
    expect(reopened.Entries().map(entry => entry.path).sort()).toEqual(['Large', 'Workbook']);
  });

  test('files larger than the header DIFAT can address', () => {
    const container = Container.Create();
    const data = Fill(15000 * 512, 5);
    container.ReplaceStream('Huge', data);
    const bytes = container.ToBytes();

    // 109 FAT sectors address 13952 sectors, so the DIFAT is in use
    expect(new DataView(bytes.buffer).getUint32(72, true)).toBe(1);
    const huge = Container.Open(bytes).GetStream('Huge');
    expect(huge && Buffer.from(huge).equals(Buffer.from(data))).toBe(true);
  });

});

describe('sources', () => {

  test('chunked stream source', () => {
    const bytes = Sample().ToBytes();
    const container = Container.Open([bytes.slice(0, 700), bytes.slice(700)]);
    expect(container.mode).toBe('stream');
    expect(container.GetStream('Workbook')).toEqual(Fill(100));
  });

  test('commit is refused for memory and stream sources', () => {
    const bytes = Sample().ToBytes();
    expect(() => Container.Open(bytes).Commit()).toThrow(InvalidStateError);
    expect(() => Container.Open([bytes]).Commit()).toThrow(InvalidStateError);
    expect(() => Container.Create().Commit()).toThrow(InvalidStateError);
  });

  describe('files', () => {

    let directory = '';

    beforeEach(() => {
      directory = fs.mkdtempSync(path.join(os.tmpdir(), 'xlb-container-'));
    });

    afterEach(() => {
      fs.rmSync(directory, { recursive: true, force: true });
    });

    test('commit rewrites the file', () => {
      const file = path.join(directory, 'sample.bin');
      fs.writeFileSync(file, Sample().ToBytes());

      const container = Container.Open({ path: file });
      container.ReplaceStream('Workbook', Fill(10, 4));
      container.RemoveEntry('Large');
      container.Commit();
      container.Close();

      const reopened = Container.Open(new Uint8Array(fs.readFileSync(file)));
      expect(reopened.GetStream('Workbook')).toEqual(Fill(10, 4));
      expect(reopened.HasStream('Large')).toBe(false);
      expect(fs.statSync(file).size).toBe(reopened.ToBytes().length);
    });

    test('commit keeps the other entries and the root class id', () => {
      const file = path.join(directory, 'sample.bin');
      const source = Sample();
      source.SetRootClassId(Fill(16, 9));
      fs.writeFileSync(file, source.ToBytes());

      const container = Container.Open({ path: file });
      container.ReplaceStream('Workbook', Fill(10, 4));
      container.Commit();
      container.Close();

      const reopened = Container.Open(new Uint8Array(fs.readFileSync(file)));
      expect(reopened.GetStream('Workbook')).toEqual(Fill(10, 4));
      expect(reopened.GetStream('Large')).toEqual(Fill(5000, 7));
      expect(reopened.GetStream('MBD0001/Ole')).toEqual(Fill(20, 3));
      expect(reopened.GetRootClassId()).toEqual(Fill(16, 9));
    });

    test('read-only files cannot be committed', () => {
      const file = path.join(directory, 'sample.bin');
      const original = Sample().ToBytes();
      fs.writeFileSync(file, original);

      const container = Container.Open({ path: file, read_only: true });
      container.ReplaceStream('Workbook', Fill(10, 4));
      expect(() => container.Commit()).toThrow('cannot write in place');
      container.Close();

      expect(new Uint8Array(fs.readFileSync(file))).toEqual(original);
    });

    test('closed containers refuse to serialize', () => {
      const file = path.join(directory, 'sample.bin');
      fs.writeFileSync(file, Sample().ToBytes());
      const container = Container.Open({ path: file });
      container.Close();
      container.Close();
      expect(() => container.ToBytes()).toThrow(InvalidStateError);
    });

    test('a file that fails to parse is not left open', () => {
      const file = path.join(directory, 'broken.bin');
      fs.writeFileSync(file, Uint8Array.from([1, 2, 3, 4]));
      expect(() => Container.Open({ path: file })).toThrow(FormatError);
      fs.unlinkSync(file);
    });

  });

});

describe('format errors', () => {

  const Variant = (data: Uint8Array): string | undefined => {
    try {
      Container.Open(data);
    }
    catch (err) {
      if (err instanceof FormatError) {
        return err.variant;
      }
      throw err;
    }
    return undefined;
  };

  test('zip packages', () => {
    expect(Variant(Uint8Array.from([0x50, 0x4b, 0x03, 0x04, 0, 0, 0, 0]))).toBe('ooxml');
  });

  test('raw older workbook streams', () => {
    expect(Variant(Uint8Array.from([0x09, 0x00, 0x04, 0x00, 0x02, 0x00, 0x10, 0x00]))).toBe('biff2');
    expect(Variant(Uint8Array.from([0x09, 0x02, 0x06, 0x00, 0x00, 0x00, 0x10, 0x00]))).toBe('biff3');
    expect(Variant(Uint8Array.from([0x09, 0x04, 0x06, 0x00, 0x00, 0x00, 0x10, 0x00]))).toBe('biff4');
    expect(() => Container.Open(Uint8Array.from([0x09, 0x04, 0x06, 0x00, 0x00, 0x00, 0x10, 0x00])))
      .toThrow('BIFF4');
  });

  test('unknown data', () => {
    expect(Variant(Uint8Array.from([1, 2, 3, 4, 5, 6, 7, 8]))).toBe('not-ole2');
  });

  test('loop in a sector chain', () => {
    const bytes = SingleStream();
    PatchFAT(bytes, 4, 3);
    expect(Variant(bytes)).toBe('corrupt');
  });

  test('chain shorter than the declared size', () => {
    const bytes = SingleStream();
    PatchFAT(bytes, 6, 0xfffffffe);
    expect(() => Container.Open(bytes)).toThrow('Stream "Large" declares 5000 bytes but its chain holds 2048');
  });

  test('chain pointing outside the file', () => {
    const bytes = SingleStream();
    PatchFAT(bytes, 5, 90);
    expect(Variant(bytes)).toBe('corrupt');
  });

  test('truncated header', () => {
    expect(Variant(SingleStream().slice(0, 300))).toBe('corrupt');
  });

});

describe('interop', () => {

  test('our output reads with a third-party reader', () => {
    const doc = CFB.read(Buffer.from(Sample().ToBytes()), { type: 'buffer' });
    const workbook = CFB.find(doc, '/Workbook');
    const large = CFB.find(doc, '/Large');
    const nested = CFB.find(doc, '/MBD0001/Ole');
    expect(workbook && Uint8Array.from(workbook.content)).toEqual(Fill(100));
    expect(large && Uint8Array.from(large.content)).toEqual(Fill(5000, 7));
    expect(nested && Uint8Array.from(nested.content)).toEqual(Fill(20, 3));
  });

  test('third-party output reads with our reader', () => {
    const doc = CFB.utils.cfb_new();
    CFB.utils.cfb_add(doc, 'Workbook', Fill(300, 2));
    CFB.utils.cfb_add(doc, 'Large', Fill(9000, 6));
    const bytes = Uint8Array.from(CFB.write(doc, { type: 'buffer' }));

    const container = Container.Open(bytes);
    expect(container.GetStream('Workbook')).toEqual(Fill(300, 2));
    expect(container.GetStream('Large')).toEqual(Fill(9000, 6));
  });

});
