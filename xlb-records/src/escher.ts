/*
 * This file is part of TREB.
 *
 * TREB is free software: you can redistribute it and/or modify it under the 
 * terms of the GNU General Public License as published by the Free Software 
 * Foundation, either version 3 of the License, or (at your option) any 
 * later version.
 *
 * TREB is distributed in the hope that it will be useful, but WITHOUT ANY 
 * WARRANTY; without even the implied warranty of MERCHANTABILITY or FITNESS 
 * FOR A PARTICULAR PURPOSE. See the GNU General Public License for more 
 * details.
 *
 * You should have received a copy of the GNU General Public License along 
 * with TREB. If not, see <https://www.gnu.org/licenses/>. 
 *
 * Copyright 2022-2025 trebco, llc. 
 * info@treb.app
 * 
 */

import { FormatError } from 'xlb-base-types';
import { ByteReader, ByteWriter } from 'xlb-utils';

/**
 * office drawing ("escher") records. these live inside MSODRAWINGGROUP
 * (the picture store and drawing id clusters) and MSODRAWING (one tree
 * per sheet). we parse the tree generically and only look inside the few
 * atoms we need to keep ids and reference counts straight.
 */

export const EscherType = {
  DggContainer: 0xf000,
  BStoreContainer: 0xf001,
  DgContainer: 0xf002,
  SpgrContainer: 0xf003,
  SpContainer: 0xf004,
  Dgg: 0xf006,
  BSE: 0xf007,
  Dg: 0xf008,
  Spgr: 0xf009,
  Sp: 0xf00a,
  OPT: 0xf00b,
  ClientAnchor: 0xf010,
  ClientData: 0xf011,
  BlipFirst: 0xf018,
  SplitMenuColors: 0xf11e,
} as const;

export const ESCHER_HEADER_SIZE = 8;

/** version 0xF marks a container */
const CONTAINER_VERSION = 0x0f;

export interface EscherAtom {
  kind: 'atom';
  version: number;
  instance: number;
  type: number;
  data: Uint8Array;
}

export interface EscherContainer {
  kind: 'container';
  instance: number;
  type: number;
  children: EscherRecord[];
}

export type EscherRecord = EscherAtom | EscherContainer;

export const Atom = (type: number, instance: number, data: Uint8Array, version = 0): EscherAtom => {
  return { kind: 'atom', version, instance, type, data };
};

export const Container = (type: number, children: EscherRecord[], instance = 0): EscherContainer => {
  return { kind: 'container', instance, type, children };
};

const ParseRange = (reader: ByteReader, end: number): EscherRecord[] => {

  const list: EscherRecord[] = [];

  while (reader.position < end) {

    if (end - reader.position < ESCHER_HEADER_SIZE) {
      throw new FormatError('corrupt', `Truncated drawing record at offset ${reader.position}`);
    }

    const options = reader.ReadUInt16();
    const type = reader.ReadUInt16();
    const length = reader.ReadUInt32();
    const version = options & 0x0f;
    const instance = options >> 4;

    if (reader.position + length > end) {
      throw new FormatError('corrupt',
        `Drawing record 0x${type.toString(16)} declares ${length} bytes but only ${end - reader.position} remain`);
    }

    if (version === CONTAINER_VERSION) {
      list.push({ kind: 'container', instance, type, children: ParseRange(reader, reader.position + length) });
    }
    else {
      list.push({ kind: 'atom', version, instance, type, data: reader.ReadBytes(length) });
    }

  }

  return list;

};

export const ParseEscher = (bytes: Uint8Array): EscherRecord[] => {
  return ParseRange(new ByteReader(bytes), bytes.length);
};

export const EscherSize = (record: EscherRecord): number => {
  if (record.kind === 'atom') {
    return ESCHER_HEADER_SIZE + record.data.length;
  }
  return record.children.reduce((sum, child) => sum + EscherSize(child), ESCHER_HEADER_SIZE);
};

/**
 * write records. the callback runs after each record is complete, with
 * the writer positioned at its end; the sheet drawing uses this to find
 * where OBJ records have to be interleaved.
 */
export const WriteEscher = (writer: ByteWriter, records: EscherRecord[], after?: (record: EscherRecord) => void): void => {
  for (const record of records) {
    if (record.kind === 'atom') {
      writer.WriteUInt16((record.instance << 4) | (record.version & 0x0f));
      writer.WriteUInt16(record.type);
      writer.WriteUInt32(record.data.length);
      writer.WriteBytes(record.data);
    }
    else {
      writer.WriteUInt16((record.instance << 4) | CONTAINER_VERSION);
      writer.WriteUInt16(record.type);
      writer.WriteUInt32(EscherSize(record) - ESCHER_HEADER_SIZE);
      WriteEscher(writer, record.children, after);
    }
    after?.(record);
  }
};

export const SerializeEscher = (records: EscherRecord[]): Uint8Array => {
  const writer = new ByteWriter(records.reduce((sum, record) => sum + EscherSize(record), 0));
  WriteEscher(writer, records);
  return writer.Bytes();
};

export const CloneEscher = (record: EscherRecord): EscherRecord => {
  if (record.kind === 'atom') {
    return { ...record, data: record.data.slice(0) };
  }
  return { ...record, children: record.children.map(CloneEscher) };
};

/** depth-first search */
export const FindEscher = (records: EscherRecord[], type: number): EscherRecord | undefined => {
  for (const record of records) {
    if (record.type === type) {
      return record;
    }
    if (record.kind === 'container') {
      const found = FindEscher(record.children, type);
      if (found) { return found; }
    }
  }
  return undefined;
};

/** all records of a type, depth-first */
export const FindAllEscher = (records: EscherRecord[], type: number, list: EscherRecord[] = []): EscherRecord[] => {
  for (const record of records) {
    if (record.type === type) {
      list.push(record);
    }
    if (record.kind === 'container') {
      FindAllEscher(record.children, type, list);
    }
  }
  return list;
};

export const FindAtom = (records: EscherRecord[], type: number): EscherAtom | undefined => {
  const record = FindEscher(records, type);
  return record?.kind === 'atom' ? record : undefined;
};

// --- picture store -----------------------------------------------------------

/** blip types, as stored in BSE */
export const BlipType = {
  EMF: 2,
  WMF: 3,
  PICT: 4,
  JPEG: 5,
  PNG: 6,
  DIB: 7,
} as const;

export type PictureFormat = 'emf' | 'wmf' | 'pict' | 'jpeg' | 'png' | 'dib';

const blip_types: Record<PictureFormat, number> = {
  emf: BlipType.EMF,
  wmf: BlipType.WMF,
  pict: BlipType.PICT,
  jpeg: BlipType.JPEG,
  png: BlipType.PNG,
  dib: BlipType.DIB,
};

/** blip record instance ("signature"), by blip type */
const blip_signatures: Record<number, number> = {
  [BlipType.EMF]: 0x3d4,
  [BlipType.WMF]: 0x216,
  [BlipType.PICT]: 0x542,
  [BlipType.JPEG]: 0x46a,
  [BlipType.PNG]: 0x6e0,
  [BlipType.DIB]: 0x7a8,
};

const BSE_REFERENCE_OFFSET = 24;

/** reference count of a BSE atom (how many shapes use the picture) */
export const GetBSEReferences = (bse: EscherAtom): number => {
  return new ByteReader(bse.data, BSE_REFERENCE_OFFSET).ReadUInt32();
};

export const SetBSEReferences = (bse: EscherAtom, count: number): void => {
  new DataView(bse.data.buffer, bse.data.byteOffset, bse.data.byteLength)
    .setUint32(BSE_REFERENCE_OFFSET, count >>> 0, true);
};

/**
 * a BSE entry with the picture embedded. `uid` is a 16-byte digest of
 * the image data. the reference count starts at zero; inserting the
 * picture into a sheet adds the first reference.
 */
export const CreateBSE = (image: Uint8Array, format: PictureFormat, uid: Uint8Array): EscherAtom => {

  const blip_type = blip_types[format];

  // raster blips: uid, tag, data
  const blip = new ByteWriter(17 + image.length);
  blip.WriteBytes(uid);
  blip.WriteUInt8(0xff);
  blip.WriteBytes(image);
  const blip_data = blip.Bytes();

  const writer = new ByteWriter(36 + ESCHER_HEADER_SIZE + blip_data.length);
  writer.WriteUInt8(blip_type); // win32
  writer.WriteUInt8(blip_type); // mac
  writer.WriteBytes(uid);
  writer.WriteUInt16(0xff); // tag
  writer.WriteUInt32(blip_data.length + ESCHER_HEADER_SIZE);
  writer.WriteUInt32(0); // references
  writer.WriteUInt32(0); // delay offset
  writer.WriteUInt8(0); // usage
  writer.WriteUInt8(0); // name length
  writer.WriteUInt8(0);
  writer.WriteUInt8(0);

  WriteEscher(writer, [Atom(EscherType.BlipFirst + blip_type, blip_signatures[blip_type] ?? 0, blip_data)]);

  return Atom(EscherType.BSE, blip_type, writer.Bytes(), 2);

};

// --- drawing group -----------------------------------------------------------

export interface DrawingCluster {
  drawing_id: number;
  shapes_used: number;
}

/** the Dgg atom: shape id bookkeeping for every drawing in the workbook */
export interface DggInfo {
  max_shape_id: number;
  shapes_saved: number;
  drawings_saved: number;
  clusters: DrawingCluster[];
}

export const ParseDgg = (atom: EscherAtom): DggInfo => {
  const reader = new ByteReader(atom.data);
  const max_shape_id = reader.ReadUInt32();
  const cluster_count = Math.max(0, reader.ReadUInt32() - 1);
  const shapes_saved = reader.ReadUInt32();
  const drawings_saved = reader.ReadUInt32();
  const clusters: DrawingCluster[] = [];
  for (let i = 0; i < cluster_count && reader.remaining >= 8; i++) {
    clusters.push({ drawing_id: reader.ReadUInt32(), shapes_used: reader.ReadUInt32() });
  }
  return { max_shape_id, shapes_saved, drawings_saved, clusters };
};

export const DggAtom = (info: DggInfo): EscherAtom => {
  const writer = new ByteWriter(16 + info.clusters.length * 8);
  writer.WriteUInt32(info.max_shape_id);
  writer.WriteUInt32(info.clusters.length + 1);
  writer.WriteUInt32(info.shapes_saved);
  writer.WriteUInt32(info.drawings_saved);
  for (const cluster of info.clusters) {
    writer.WriteUInt32(cluster.drawing_id);
    writer.WriteUInt32(cluster.shapes_used);
  }
  return Atom(EscherType.Dgg, 0, writer.Bytes());
};

// --- sheet drawings ----------------------------------------------------------

/** shape ids for a drawing are allocated in blocks of 1024 */
export const SHAPE_ID_BLOCK = 1024;

export const ShapeFlags = {
  Group: 0x0001,
  Child: 0x0002,
  Patriarch: 0x0004,
  HaveAnchor: 0x0200,
  HaveShapeType: 0x0800,
} as const;

export const SHAPE_TYPE_PICTURE_FRAME = 75;

/** OPT property holding the 1-based picture index (blip id flag set) */
export const PROPERTY_PICTURE = 0x4104;

export interface PictureAnchor {
  first_column: number;
  first_row: number;
  last_column: number;
  last_row: number;
  dx1?: number;
  dy1?: number;
  dx2?: number;
  dy2?: number;
}

const ShapeAtom = (shape_id: number, shape_type: number, flags: number): EscherAtom => {
  const writer = new ByteWriter(8);
  writer.WriteUInt32(shape_id);
  writer.WriteUInt32(flags);
  return Atom(EscherType.Sp, shape_type, writer.Bytes(), 2);
};

export const ShapeId = (sp: EscherAtom): number => new ByteReader(sp.data).ReadUInt32();

export const SetShapeId = (sp: EscherAtom, shape_id: number): void => {
  new DataView(sp.data.buffer, sp.data.byteOffset, sp.data.byteLength).setUint32(0, shape_id >>> 0, true);
};

/** the Dg atom: instance is the drawing id; data is shape count and last shape id */
export const DgAtom = (drawing_id: number, shape_count: number, last_shape_id: number): EscherAtom => {
  const writer = new ByteWriter(8);
  writer.WriteUInt32(shape_count);
  writer.WriteUInt32(last_shape_id);
  return Atom(EscherType.Dg, drawing_id, writer.Bytes());
};

/**
 * an empty sheet drawing: the group container with its patriarch shape.
 * the patriarch takes the first id in the drawing's shape id block.
 */
export const CreateDrawing = (drawing_id: number, first = drawing_id * SHAPE_ID_BLOCK): EscherContainer => {
  return Container(EscherType.DgContainer, [
    DgAtom(drawing_id, 1, first),
    Container(EscherType.SpgrContainer, [
      Container(EscherType.SpContainer, [
        Atom(EscherType.Spgr, 0, new Uint8Array(16), 1),
        ShapeAtom(first, 0, ShapeFlags.Group | ShapeFlags.Patriarch),
      ]),
    ]),
  ]);
};

/** a picture frame shape referencing picture `picture_index` (1-based) */
export const CreatePictureShape = (shape_id: number, picture_index: number, anchor: PictureAnchor): EscherContainer => {

  const opt = new ByteWriter(6);
  opt.WriteUInt16(PROPERTY_PICTURE);
  opt.WriteUInt32(picture_index);

  const position = new ByteWriter(18);
  position.WriteUInt16(0);
  position.WriteUInt16(anchor.first_column);
  position.WriteUInt16(anchor.dx1 ?? 0);
  position.WriteUInt16(anchor.first_row);
  position.WriteUInt16(anchor.dy1 ?? 0);
  position.WriteUInt16(anchor.last_column);
  position.WriteUInt16(anchor.dx2 ?? 0);
  position.WriteUInt16(anchor.last_row);
  position.WriteUInt16(anchor.dy2 ?? 0);

  return Container(EscherType.SpContainer, [
    ShapeAtom(shape_id, SHAPE_TYPE_PICTURE_FRAME, ShapeFlags.HaveAnchor | ShapeFlags.HaveShapeType),
    Atom(EscherType.OPT, 1, opt.Bytes(), 3),
    Atom(EscherType.ClientAnchor, 0, position.Bytes()),
    Atom(EscherType.ClientData, 0, new Uint8Array(0)),
  ]);

};

/**
 * picture indexes referenced by shapes in a tree (one entry per shape,
 * so a picture used twice is listed twice)
 */
export const PictureReferences = (records: EscherRecord[]): number[] => {
  const list: number[] = [];
  for (const record of FindAllEscher(records, EscherType.OPT)) {
    if (record.kind !== 'atom') { continue; }
    const reader = new ByteReader(record.data);
    for (let i = 0; i < record.instance && reader.remaining >= 6; i++) {
      const id = reader.ReadUInt16();
      const value = reader.ReadUInt32();
      if ((id & 0x3fff) === (PROPERTY_PICTURE & 0x3fff) && value > 0) {
        list.push(value);
      }
    }
  }
  return list;
};
