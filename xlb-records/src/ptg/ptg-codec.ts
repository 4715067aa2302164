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

import { ByteReader, ByteWriter, IsWide } from 'xlb-utils';
import {
  AttrFlags, type BinaryOperator, type CellRef, type Ptg, type PtgClass, type UnaryOperator,
} from './ptg-types';

const binary_operators: Record<number, BinaryOperator> = {
  0x03: '+', 0x04: '-', 0x05: '*', 0x06: '/', 0x07: '^', 0x08: '&',
  0x09: '<', 0x0a: '<=', 0x0b: '=', 0x0c: '>=', 0x0d: '>', 0x0e: '<>',
  0x0f: ' ', 0x10: ',', 0x11: ':',
};

const unary_operators: Record<number, UnaryOperator> = {
  0x12: '+', 0x13: '-', 0x14: '%', 0x15: '()',
};

const BinaryId = (operator: BinaryOperator): number => {
  for (const [key, value] of Object.entries(binary_operators)) {
    if (value === operator) { return Number(key); }
  }
  throw new Error(`unknown operator ${operator}`);
};

const UnaryId = (operator: UnaryOperator): number => {
  for (const [key, value] of Object.entries(unary_operators)) {
    if (value === operator) { return Number(key); }
  }
  throw new Error(`unknown operator ${operator}`);
};

/** payload sizes for tokens we pass through without interpreting */
const opaque_sizes: Record<number, number> = {
  0x01: 4, // exp (shared formula)
  0x02: 4, // tbl (data table)
  0x20: 7, // array constant; the values follow the formula
  0x2c: 4, // refN
  0x2d: 8, // areaN
  0x39: 6, // nameX
};

/** memory token payload sizes, by base id */
const mem_sizes: Record<number, number> = {
  0x26: 6, 0x27: 6, 0x28: 6, 0x29: 2, 0x2e: 2, 0x2f: 2,
};

const ClassOf = (id: number): PtgClass => {
  switch ((id >> 5) & 0x03) {
    case 1: return 'reference';
    case 3: return 'array';
    default: return 'value';
  }
};

const ClassBits = (cls: PtgClass): number => {
  switch (cls) {
    case 'reference': return 0x20;
    case 'array': return 0x60;
    default: return 0x40;
  }
};

/** column field: 14 bits of column, then column-relative, row-relative */
const ReadRef = (row: number, column: number): CellRef => ({
  row,
  column: column & 0x3fff,
  column_relative: (column & 0x4000) !== 0,
  row_relative: (column & 0x8000) !== 0,
});

const ColumnField = (ref: CellRef): number => {
  return (ref.column & 0x3fff) | (ref.column_relative ? 0x4000 : 0) | (ref.row_relative ? 0x8000 : 0);
};

/**
 * decode a token array (rgce). decoding never fails: once we reach
 * something we can't read, the rest of the bytes become one raw token
 * and go back out unchanged.
 */
export const DecodePtgs = (bytes: Uint8Array): Ptg[] => {

  const reader = new ByteReader(bytes);
  const list: Ptg[] = [];

  while (reader.remaining > 0) {
    const start = reader.position;
    let token: Ptg | undefined;
    try {
      token = DecodeToken(reader);
    }
    catch (err) {
      if (!(err instanceof RangeError)) { throw err; }
      token = undefined;
    }
    if (!token) {
      console.info(`formula token 0x${bytes[start].toString(16)} not interpreted; kept as raw bytes`);
      list.push({ type: 'raw', id: bytes[start], bytes: bytes.slice(start) });
      break;
    }
    list.push(token);
  }

  return list;

};

const DecodeToken = (reader: ByteReader): Ptg | undefined => {

  const start = reader.position;
  const id = reader.ReadUInt8();

  if (binary_operators[id]) {
    return { type: 'binary', operator: binary_operators[id] };
  }
  if (unary_operators[id]) {
    return { type: 'unary', operator: unary_operators[id] };
  }

  switch (id) {
    case 0x16:
      return { type: 'missing' };

    case 0x17: {
      const length = reader.ReadUInt8();
      const wide = (reader.ReadUInt8() & 0x01) === 0x01;
      return { type: 'string', value: reader.ReadChars(length, wide) };
    }

    case 0x19: {
      const options = reader.ReadUInt8();
      const data = reader.ReadUInt16();
      if (options & AttrFlags.Choose) {
        const jumps: number[] = [];
        for (let i = 0; i <= data; i++) {
          jumps.push(reader.ReadUInt16());
        }
        return { type: 'attr', options, data, jumps };
      }
      return { type: 'attr', options, data };
    }

    case 0x1c:
      return { type: 'error', code: reader.ReadUInt8() };

    case 0x1d:
      return { type: 'bool', value: reader.ReadUInt8() !== 0 };

    case 0x1e:
      return { type: 'int', value: reader.ReadUInt16() };

    case 0x1f:
      return { type: 'number', value: reader.ReadDouble() };
  }

  if (id < 0x20) {
    if (opaque_sizes[id] !== undefined) {
      reader.Skip(opaque_sizes[id]);
      return { type: 'raw', id, bytes: reader.data.slice(start, reader.position) };
    }
    return undefined;
  }

  const base = (id & 0x1f) | 0x20;
  const cls = ClassOf(id);

  switch (base) {
    case 0x21:
      return { type: 'func', cls, index: reader.ReadUInt16() };

    case 0x22: {
      const argc = reader.ReadUInt8() & 0x7f;
      return { type: 'funcvar', cls, argc, index: reader.ReadUInt16() & 0x7fff };
    }

    case 0x23: {
      const index = reader.ReadUInt16();
      reader.Skip(2);
      return { type: 'name', cls, index };
    }

    case 0x24: {
      const row = reader.ReadUInt16();
      return { type: 'ref', cls, ref: ReadRef(row, reader.ReadUInt16()) };
    }

    case 0x25: {
      const first_row = reader.ReadUInt16();
      const last_row = reader.ReadUInt16();
      const first_column = reader.ReadUInt16();
      const last_column = reader.ReadUInt16();
      return { type: 'area', cls, first: ReadRef(first_row, first_column), last: ReadRef(last_row, last_column) };
    }

    case 0x2a:
      reader.Skip(4);
      return { type: 'ref-error', cls, area: false };

    case 0x2b:
      reader.Skip(8);
      return { type: 'ref-error', cls, area: true };

    case 0x3a: {
      const ixti = reader.ReadUInt16();
      const row = reader.ReadUInt16();
      return { type: 'ref3d', cls, ixti, ref: ReadRef(row, reader.ReadUInt16()) };
    }

    case 0x3b: {
      const ixti = reader.ReadUInt16();
      const first_row = reader.ReadUInt16();
      const last_row = reader.ReadUInt16();
      const first_column = reader.ReadUInt16();
      const last_column = reader.ReadUInt16();
      return { type: 'area3d', cls, ixti, first: ReadRef(first_row, first_column), last: ReadRef(last_row, last_column) };
    }

    case 0x3c: {
      const ixti = reader.ReadUInt16();
      reader.Skip(4);
      return { type: 'ref-error', cls, area: false, ixti };
    }

    case 0x3d: {
      const ixti = reader.ReadUInt16();
      reader.Skip(8);
      return { type: 'ref-error', cls, area: true, ixti };
    }
  }

  if (mem_sizes[base] !== undefined) {
    reader.Skip(mem_sizes[base]);
    return { type: 'mem', id, bytes: reader.data.slice(start + 1, reader.position) };
  }

  if (opaque_sizes[base] !== undefined) {
    reader.Skip(opaque_sizes[base]);
    return { type: 'raw', id, bytes: reader.data.slice(start, reader.position) };
  }

  return undefined;

};

/** encoded size of one token, including the id byte */
export const PtgSize = (ptg: Ptg): number => {
  switch (ptg.type) {
    case 'binary':
    case 'unary':
    case 'missing':
      return 1;
    case 'string':
      return 3 + (IsWide(ptg.value) ? ptg.value.length * 2 : ptg.value.length);
    case 'attr':
      return 4 + (ptg.jumps ? ptg.jumps.length * 2 : 0);
    case 'error':
    case 'bool':
      return 2;
    case 'int':
    case 'func':
      return 3;
    case 'funcvar':
      return 4;
    case 'number':
      return 9;
    case 'name':
    case 'ref':
      return 5;
    case 'area':
      return 9;
    case 'ref3d':
      return 7;
    case 'area3d':
      return 11;
    case 'ref-error':
      return 1 + (ptg.ixti === undefined ? 0 : 2) + (ptg.area ? 8 : 4);
    case 'mem':
      return 1 + ptg.bytes.length;
    case 'raw':
      return ptg.bytes.length;
  }
};

export const PtgsSize = (ptgs: Ptg[]): number => {
  return ptgs.reduce((sum, ptg) => sum + PtgSize(ptg), 0);
};

export const WritePtgs = (writer: ByteWriter, ptgs: Ptg[]): void => {
  for (const ptg of ptgs) {
    WritePtg(writer, ptg);
  }
};

export const EncodePtgs = (ptgs: Ptg[]): Uint8Array => {
  const writer = new ByteWriter(PtgsSize(ptgs));
  WritePtgs(writer, ptgs);
  return writer.Bytes();
};

const WritePtg = (writer: ByteWriter, ptg: Ptg): void => {

  switch (ptg.type) {
    case 'binary':
      writer.WriteUInt8(BinaryId(ptg.operator));
      break;

    case 'unary':
      writer.WriteUInt8(UnaryId(ptg.operator));
      break;

    case 'missing':
      writer.WriteUInt8(0x16);
      break;

    case 'string': {
      const wide = IsWide(ptg.value);
      writer.WriteUInt8(0x17);
      writer.WriteUInt8(ptg.value.length);
      writer.WriteUInt8(wide ? 1 : 0);
      writer.WriteChars(ptg.value, wide);
      break;
    }

    case 'attr':
      writer.WriteUInt8(0x19);
      writer.WriteUInt8(ptg.options);
      writer.WriteUInt16(ptg.data);
      for (const jump of ptg.jumps || []) {
        writer.WriteUInt16(jump);
      }
      break;

    case 'error':
      writer.WriteUInt8(0x1c);
      writer.WriteUInt8(ptg.code);
      break;

    case 'bool':
      writer.WriteUInt8(0x1d);
      writer.WriteUInt8(ptg.value ? 1 : 0);
      break;

    case 'int':
      writer.WriteUInt8(0x1e);
      writer.WriteUInt16(ptg.value);
      break;

    case 'number':
      writer.WriteUInt8(0x1f);
      writer.WriteDouble(ptg.value);
      break;

    case 'func':
      writer.WriteUInt8(0x01 | ClassBits(ptg.cls));
      writer.WriteUInt16(ptg.index);
      break;

    case 'funcvar':
      writer.WriteUInt8(0x02 | ClassBits(ptg.cls));
      writer.WriteUInt8(ptg.argc);
      writer.WriteUInt16(ptg.index);
      break;

    case 'name':
      writer.WriteUInt8(0x03 | ClassBits(ptg.cls));
      writer.WriteUInt16(ptg.index);
      writer.WriteUInt16(0);
      break;

    case 'ref':
      writer.WriteUInt8(0x04 | ClassBits(ptg.cls));
      writer.WriteUInt16(ptg.ref.row);
      writer.WriteUInt16(ColumnField(ptg.ref));
      break;

    case 'area':
      writer.WriteUInt8(0x05 | ClassBits(ptg.cls));
      WriteArea(writer, ptg.first, ptg.last);
      break;

    case 'ref3d':
      writer.WriteUInt8(0x1a | ClassBits(ptg.cls));
      writer.WriteUInt16(ptg.ixti);
      writer.WriteUInt16(ptg.ref.row);
      writer.WriteUInt16(ColumnField(ptg.ref));
      break;

    case 'area3d':
      writer.WriteUInt8(0x1b | ClassBits(ptg.cls));
      writer.WriteUInt16(ptg.ixti);
      WriteArea(writer, ptg.first, ptg.last);
      break;

    case 'ref-error':
      if (ptg.ixti === undefined) {
        writer.WriteUInt8((ptg.area ? 0x0b : 0x0a) | ClassBits(ptg.cls));
      }
      else {
        writer.WriteUInt8((ptg.area ? 0x1d : 0x1c) | ClassBits(ptg.cls));
        writer.WriteUInt16(ptg.ixti);
      }
      writer.Fill(ptg.area ? 8 : 4);
      break;

    case 'mem':
      writer.WriteUInt8(ptg.id);
      writer.WriteBytes(ptg.bytes);
      break;

    case 'raw':
      writer.WriteBytes(ptg.bytes);
      break;
  }

};

const WriteArea = (writer: ByteWriter, first: CellRef, last: CellRef) => {
  writer.WriteUInt16(first.row);
  writer.WriteUInt16(last.row);
  writer.WriteUInt16(ColumnField(first));
  writer.WriteUInt16(ColumnField(last));
};
