import { FormatError } from 'xlb-base-types';
import {
  Container, CreateBSE, CreateDrawing, CreatePictureShape, DggAtom, EscherSize, EscherType,
  FindAtom, GetBSEReferences, ParseDgg, ParseEscher, PictureReferences, SerializeEscher,
  SetBSEReferences, ShapeId, type EscherContainer,
} from '../src';

const uid = new Uint8Array(16).fill(7);

describe('escher', () => {

  test('containers nest and serialize with computed lengths', () => {
    const drawing = CreateDrawing(2);
    const bytes = SerializeEscher([drawing]);
    expect(bytes.length).toBe(EscherSize(drawing));

    const view = new DataView(bytes.buffer, bytes.byteOffset);
    expect(view.getUint16(0, true)).toBe(0x000f);
    expect(view.getUint16(2, true)).toBe(EscherType.DgContainer);
    expect(view.getUint32(4, true)).toBe(bytes.length - 8);

    expect(ParseEscher(bytes)).toEqual([drawing]);
  });

  test('drawing ids and shape ids', () => {
    const drawing = CreateDrawing(3);
    const dg = FindAtom([drawing], EscherType.Dg);
    expect(dg?.instance).toBe(3);

    const sp = FindAtom([drawing], EscherType.Sp);
    expect(sp && ShapeId(sp)).toBe(3072);
  });

  test('picture references are found through OPT properties', () => {
    const drawing = CreateDrawing(1);
    const group = drawing.children[1];
    if (group.kind !== 'container') {
      throw new Error('expected the group container');
    }
    group.children.push(CreatePictureShape(1025, 1, { first_column: 0, first_row: 0, last_column: 2, last_row: 4 }));
    group.children.push(CreatePictureShape(1026, 1, { first_column: 3, first_row: 0, last_column: 5, last_row: 4 }));
    group.children.push(CreatePictureShape(1027, 2, { first_column: 6, first_row: 0, last_column: 8, last_row: 4 }));

    const parsed = ParseEscher(SerializeEscher([drawing]));
    expect(PictureReferences(parsed)).toEqual([1, 1, 2]);
  });

  test('BSE reference counts', () => {
    const bse = CreateBSE(Uint8Array.from([1, 2, 3, 4]), 'png', uid);
    expect(bse.instance).toBe(6);
    expect(GetBSEReferences(bse)).toBe(0);
    SetBSEReferences(bse, 3);
    expect(GetBSEReferences(bse)).toBe(3);
    expect(bse.data[24]).toBe(3);

    // header, then the embedded blip: 36 + 8 + 16 + 1 + 4
    expect(bse.data.length).toBe(65);
    const store: EscherContainer = Container(EscherType.BStoreContainer, [bse], 1);
    const [parsed] = ParseEscher(SerializeEscher([store]));
    expect(parsed.kind === 'container' && parsed.children[0]).toEqual(bse);
  });

  test('drawing group clusters', () => {
    const atom = DggAtom({ max_shape_id: 3074, shapes_saved: 4, drawings_saved: 2, clusters: [
      { drawing_id: 1, shapes_used: 2 },
      { drawing_id: 2, shapes_used: 3 },
    ] });
    expect(atom.data.length).toBe(32);
    expect(ParseDgg(atom)).toEqual({ max_shape_id: 3074, shapes_saved: 4, drawings_saved: 2, clusters: [
      { drawing_id: 1, shapes_used: 2 },
      { drawing_id: 2, shapes_used: 3 },
    ] });
  });

  test('a child running past its parent is corrupt', () => {
    const bytes = SerializeEscher([CreateDrawing(1)]);
    new DataView(bytes.buffer, bytes.byteOffset).setUint32(4, 10, true);
    expect(() => ParseEscher(bytes)).toThrow(FormatError);
  });

});
