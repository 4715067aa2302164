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

import { ByteReader, ByteWriter, UnicodeStringSize } from 'xlb-utils';
import { StandardRecord } from '../record-base';
import { Sid } from '../sid';
import { DecodePtgs, PtgsSize, WritePtgs } from '../ptg/ptg-codec';
import type { Ptg } from '../ptg/ptg-types';
import { ReadUnicodeString, WriteUnicodeString } from './strings';

/**
 * RK is a compressed number: either a 30-bit integer or the top 30 bits
 * of a double, optionally divided by 100.
 */
export const DecodeRK = (rk: number): number => {
  let value: number;
  if (rk & 0x02) {
    value = (rk | 0) >> 2;
  }
  else {
    const view = new DataView(new ArrayBuffer(8));
    view.setUint32(4, rk & 0xfffffffc, true);
    value = view.getFloat64(0, true);
  }
  return (rk & 0x01) ? value / 100 : value;
};

/** base for records addressing one cell */
abstract class CellRecord extends StandardRecord {

  constructor(public row: number, public column: number, public xf: number) {
    super();
  }

  protected WriteCell(writer: ByteWriter) {
    writer.WriteUInt16(this.row);
    writer.WriteUInt16(this.column);
    writer.WriteUInt16(this.xf);
  }

}

export class NumberRecord extends CellRecord {

  public readonly sid = Sid.NUMBER;

  constructor(row: number, column: number, xf: number, public value: number) {
    super(row, column, xf);
  }

  public static Parse(data: Uint8Array): NumberRecord {
    const reader = new ByteReader(data);
    return new NumberRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadDouble());
  }

  public DataSize(): number {
    return 14;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    writer.WriteDouble(this.value);
  }

}

export class RKRecord extends CellRecord {

  public readonly sid = Sid.RK;

  constructor(row: number, column: number, xf: number, public rk: number) {
    super(row, column, xf);
  }

  public get value(): number {
    return DecodeRK(this.rk);
  }

  public static Parse(data: Uint8Array): RKRecord {
    const reader = new ByteReader(data);
    return new RKRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt32());
  }

  public DataSize(): number {
    return 10;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    writer.WriteUInt32(this.rk);
  }

}

export interface MulRKCell {
  column: number;
  xf: number;
  rk: number;
}

/** a run of RK cells in one row */
export class MulRKRecord extends StandardRecord {

  public readonly sid = Sid.MULRK;

  constructor(public row: number, public first_column: number, public cells: MulRKCell[]) {
    super();
  }

  public static Parse(data: Uint8Array): MulRKRecord {
    const reader = new ByteReader(data);
    const row = reader.ReadUInt16();
    const first_column = reader.ReadUInt16();
    const count = (data.length - 6) / 6;
    const cells: MulRKCell[] = [];
    for (let i = 0; i < count; i++) {
      cells.push({ column: first_column + i, xf: reader.ReadUInt16(), rk: reader.ReadUInt32() });
    }
    return new MulRKRecord(row, first_column, cells);
  }

  public DataSize(): number {
    return 6 + this.cells.length * 6;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.row);
    writer.WriteUInt16(this.first_column);
    for (const cell of this.cells) {
      writer.WriteUInt16(cell.xf);
      writer.WriteUInt32(cell.rk);
    }
    writer.WriteUInt16(this.first_column + this.cells.length - 1);
  }

}

/** inline string cell. we read these but write LABELSST. */
export class LabelRecord extends CellRecord {

  public readonly sid = Sid.LABEL;

  constructor(row: number, column: number, xf: number, public value: string) {
    super(row, column, xf);
  }

  public static Parse(data: Uint8Array): LabelRecord {
    const reader = new ByteReader(data);
    return new LabelRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16(), ReadUnicodeString(reader));
  }

  public DataSize(): number {
    return 6 + UnicodeStringSize(this.value);
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    WriteUnicodeString(writer, this.value);
  }

}

export class LabelSSTRecord extends CellRecord {

  public readonly sid = Sid.LABELSST;

  constructor(row: number, column: number, xf: number, public index: number) {
    super(row, column, xf);
  }

  public static Parse(data: Uint8Array): LabelSSTRecord {
    const reader = new ByteReader(data);
    return new LabelSSTRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt32());
  }

  public DataSize(): number {
    return 10;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    writer.WriteUInt32(this.index);
  }

}

export class BlankRecord extends CellRecord {

  public readonly sid = Sid.BLANK;

  public static Parse(data: Uint8Array): BlankRecord {
    const reader = new ByteReader(data);
    return new BlankRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16());
  }

  public DataSize(): number {
    return 6;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
  }

}

/** boolean or error value */
export class BoolErrRecord extends CellRecord {

  public readonly sid = Sid.BOOLERR;

  constructor(row: number, column: number, xf: number, public value: number, public is_error: boolean) {
    super(row, column, xf);
  }

  public static Parse(data: Uint8Array): BoolErrRecord {
    const reader = new ByteReader(data);
    const row = reader.ReadUInt16();
    const column = reader.ReadUInt16();
    const xf = reader.ReadUInt16();
    const value = reader.ReadUInt8();
    return new BoolErrRecord(row, column, xf, value, reader.ReadUInt8() !== 0);
  }

  public DataSize(): number {
    return 8;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    writer.WriteUInt8(this.value);
    writer.WriteUInt8(this.is_error ? 1 : 0);
  }

}

/** cached result of a formula. string results live in a following STRING record. */
export type FormulaResult =
  | { type: 'number', value: number }
  | { type: 'string' }
  | { type: 'bool', value: boolean }
  | { type: 'error', code: number }
  | { type: 'empty' };

export const FormulaFlags = {
  AlwaysCalc: 0x0001,
  CalcOnLoad: 0x0002,
  Shared: 0x0008,
} as const;

export class FormulaRecord extends CellRecord {

  public readonly sid = Sid.FORMULA;

  public result: FormulaResult = { type: 'number', value: 0 };
  public options: number = FormulaFlags.CalcOnLoad;

  /** array constant data and anything else after the tokens */
  public trailer: Uint8Array = new Uint8Array(0);

  constructor(row: number, column: number, xf: number, public formula: Ptg[] = []) {
    super(row, column, xf);
  }

  public static Parse(data: Uint8Array): FormulaRecord {
    const reader = new ByteReader(data);
    const record = new FormulaRecord(reader.ReadUInt16(), reader.ReadUInt16(), reader.ReadUInt16());
    record.result = ReadResult(reader.ReadBytes(8));
    record.options = reader.ReadUInt16();
    reader.Skip(4);
    const length = reader.ReadUInt16();
    record.formula = DecodePtgs(reader.ReadBytes(length));
    record.trailer = reader.ReadBytes(reader.remaining);
    return record;
  }

  public DataSize(): number {
    return 22 + PtgsSize(this.formula) + this.trailer.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    this.WriteCell(writer);
    WriteResult(writer, this.result);
    writer.WriteUInt16(this.options);
    writer.WriteUInt32(0);
    writer.WriteUInt16(PtgsSize(this.formula));
    WritePtgs(writer, this.formula);
    writer.WriteBytes(this.trailer);
  }

}

const ReadResult = (bytes: Uint8Array): FormulaResult => {
  if (bytes[6] === 0xff && bytes[7] === 0xff) {
    switch (bytes[0]) {
      case 0: return { type: 'string' };
      case 1: return { type: 'bool', value: bytes[2] !== 0 };
      case 2: return { type: 'error', code: bytes[2] };
      default: return { type: 'empty' };
    }
  }
  return { type: 'number', value: new DataView(bytes.buffer, bytes.byteOffset, 8).getFloat64(0, true) };
};

const WriteResult = (writer: ByteWriter, result: FormulaResult) => {
  if (result.type === 'number') {
    writer.WriteDouble(result.value);
    return;
  }
  const type = { string: 0, bool: 1, error: 2, empty: 3 }[result.type];
  const value = result.type === 'bool' ? (result.value ? 1 : 0) : result.type === 'error' ? result.code : 0;
  writer.WriteUInt8(type);
  writer.WriteUInt8(0);
  writer.WriteUInt8(value);
  writer.Fill(3);
  writer.WriteUInt16(0xffff);
};

/** string result of the preceding formula */
export class StringRecord extends StandardRecord {

  public readonly sid = Sid.STRING;

  constructor(public value: string) {
    super();
  }

  public static Parse(data: Uint8Array): StringRecord {
    return new StringRecord(ReadUnicodeString(new ByteReader(data)));
  }

  public DataSize(): number {
    return UnicodeStringSize(this.value);
  }

  protected SerializeData(writer: ByteWriter): void {
    WriteUnicodeString(writer, this.value);
  }

}
