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

import { ByteReader, ByteWriter, CharDataSize, IsWide } from 'xlb-utils';
import { StandardRecord } from '../record-base';
import { Sid } from '../sid';
import { DecodePtgs, PtgsSize, WritePtgs } from '../ptg/ptg-codec';
import type { Ptg } from '../ptg/ptg-types';

export const NameFlags = {
  Hidden: 0x0001,
  Function: 0x0002,
  Builtin: 0x0020,
} as const;

/** built-in names are stored as a single character code */
export const BuiltinNames = [
  'Consolidate_Area',
  'Auto_Open',
  'Auto_Close',
  'Extract',
  'Database',
  'Criteria',
  'Print_Area',
  'Print_Titles',
  'Recorder',
  'Data_Form',
  'Auto_Activate',
  'Auto_Deactivate',
  'Sheet_Title',
  '_FilterDatabase',
];

export const BuiltinCode = {
  PrintArea: 0x06,
  PrintTitles: 0x07,
} as const;

/**
 * defined name. `scope` is the 1-based tab index of the owning sheet, or
 * 0 for a workbook-level name. the definition is a token array; the
 * optional menu/description/help/status strings (and any array constant
 * data) are kept as trailing bytes.
 */
export class NameRecord extends StandardRecord {

  public readonly sid = Sid.NAME;

  public options = 0;
  public shortcut = 0;
  public scope = 0;
  public formula: Ptg[] = [];

  /** counts for the four optional strings, then the strings themselves */
  public string_lengths: Uint8Array = new Uint8Array(4);
  public trailer: Uint8Array = new Uint8Array(0);

  constructor(public name = '') {
    super();
  }

  public static Builtin(code: number, scope: number, formula: Ptg[] = []): NameRecord {
    const record = new NameRecord(String.fromCharCode(code));
    record.options = NameFlags.Builtin;
    record.scope = scope;
    record.formula = formula;
    return record;
  }

  public get builtin(): boolean {
    return (this.options & NameFlags.Builtin) !== 0;
  }

  public get builtin_code(): number | undefined {
    return this.builtin ? this.name.charCodeAt(0) : undefined;
  }

  /** built-ins render with their well-known names */
  public get display_name(): string {
    const code = this.builtin_code;
    if (code === undefined) {
      return this.name;
    }
    return BuiltinNames[code] ?? `Builtin_${code}`;
  }

  public static Parse(data: Uint8Array): NameRecord {

    const reader = new ByteReader(data);
    const record = new NameRecord();

    record.options = reader.ReadUInt16();
    record.shortcut = reader.ReadUInt8();
    const length = reader.ReadUInt8();
    const formula_length = reader.ReadUInt16();
    reader.Skip(2);
    record.scope = reader.ReadUInt16();
    record.string_lengths = reader.ReadBytes(4);

    if (length) {
      const wide = (reader.ReadUInt8() & 0x01) === 0x01;
      record.name = reader.ReadChars(length, wide);
    }

    record.formula = DecodePtgs(reader.ReadBytes(formula_length));
    record.trailer = reader.ReadBytes(reader.remaining);

    return record;

  }

  public DataSize(): number {
    return 14
      + (this.name.length ? 1 + CharDataSize(this.name) : 0)
      + PtgsSize(this.formula)
      + this.trailer.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.options);
    writer.WriteUInt8(this.shortcut);
    writer.WriteUInt8(this.name.length);
    writer.WriteUInt16(PtgsSize(this.formula));
    writer.WriteUInt16(0);
    writer.WriteUInt16(this.scope);
    writer.WriteBytes(this.string_lengths);
    if (this.name.length) {
      const wide = IsWide(this.name);
      writer.WriteUInt8(wide ? 1 : 0);
      writer.WriteChars(this.name, wide);
    }
    WritePtgs(writer, this.formula);
    writer.WriteBytes(this.trailer);
  }

}
