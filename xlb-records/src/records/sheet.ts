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

import { ByteReader, ByteWriter } from 'xlb-utils';
import { StandardRecord } from '../record-base';
import { Sid } from '../sid';

/** used range. last row and column are exclusive. */
export class DimensionsRecord extends StandardRecord {

  public readonly sid = Sid.DIMENSIONS;

  constructor(
    public first_row = 0,
    public last_row = 0,
    public first_column = 0,
    public last_column = 0) {
    super();
  }

  public static Parse(data: Uint8Array): DimensionsRecord {
    const reader = new ByteReader(data);
    return new DimensionsRecord(reader.ReadUInt32(), reader.ReadUInt32(), reader.ReadUInt16(), reader.ReadUInt16());
  }

  public DataSize(): number {
    return 14;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt32(this.first_row);
    writer.WriteUInt32(this.last_row);
    writer.WriteUInt16(this.first_column);
    writer.WriteUInt16(this.last_column);
    writer.WriteUInt16(0);
  }

}

export const Window2Flags = {
  Formulas: 0x0001,
  Gridlines: 0x0002,
  Headers: 0x0004,
  Frozen: 0x0008,
  Zeros: 0x0010,
  DefaultGridColor: 0x0020,
  RightToLeft: 0x0040,
  Outline: 0x0080,
  FrozenNoSplit: 0x0100,
  Selected: 0x0200,
  Active: 0x0400,
  PageBreakPreview: 0x0800,
} as const;

/**
 * sheet window. the selected flag puts the sheet in the tab selection;
 * the "paged" flag (displayed in the workbook window) is what marks the
 * active sheet.
 */
export class Window2Record extends StandardRecord {

  public readonly sid = Sid.WINDOW2;

  public options = 0x06b6;
  public top_row = 0;
  public left_column = 0;
  public grid_color = 0x40;

  /** zoom and reserved fields, when present */
  public tail: Uint8Array = new Uint8Array(8);

  public get selected(): boolean {
    return (this.options & Window2Flags.Selected) !== 0;
  }

  public set selected(selected: boolean) {
    this.options = selected ? (this.options | Window2Flags.Selected) : (this.options & ~Window2Flags.Selected);
  }

  public get active(): boolean {
    return (this.options & Window2Flags.Active) !== 0;
  }

  public set active(active: boolean) {
    this.options = active ? (this.options | Window2Flags.Active) : (this.options & ~Window2Flags.Active);
  }

  public static Parse(data: Uint8Array): Window2Record {
    const reader = new ByteReader(data);
    const record = new Window2Record();
    record.options = reader.ReadUInt16();
    record.top_row = reader.ReadUInt16();
    record.left_column = reader.ReadUInt16();
    record.grid_color = reader.ReadUInt32();
    record.tail = reader.ReadBytes(reader.remaining);
    return record;
  }

  public Clone(): Window2Record {
    const clone = new Window2Record();
    clone.options = this.options;
    clone.top_row = this.top_row;
    clone.left_column = this.left_column;
    clone.grid_color = this.grid_color;
    clone.tail = this.tail.slice(0);
    return clone;
  }

  public DataSize(): number {
    return 10 + this.tail.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.options);
    writer.WriteUInt16(this.top_row);
    writer.WriteUInt16(this.left_column);
    writer.WriteUInt32(this.grid_color);
    writer.WriteBytes(this.tail);
  }

}

/** escher data for one sheet's drawing (or a piece of it) */
export class MsoDrawingRecord extends StandardRecord {

  public readonly sid = Sid.MSODRAWING;

  constructor(public data: Uint8Array) {
    super();
  }

  public static Parse(data: Uint8Array): MsoDrawingRecord {
    return new MsoDrawingRecord(data.slice(0));
  }

  public DataSize(): number {
    return this.data.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteBytes(this.data);
  }

}

export const ObjectType = {
  Picture: 0x08,
} as const;

/**
 * drawing object. the first subrecord (ftCmo) carries the object type and
 * id; everything else is kept as bytes.
 */
export class ObjRecord extends StandardRecord {

  public readonly sid = Sid.OBJ;

  constructor(public data: Uint8Array) {
    super();
  }

  /** a picture object: ftCmo, ftCf, ftPioGrbit, ftEnd */
  public static Picture(object_id: number): ObjRecord {
    const writer = new ByteWriter(38);

    writer.WriteUInt16(0x0015);
    writer.WriteUInt16(0x0012);
    writer.WriteUInt16(ObjectType.Picture);
    writer.WriteUInt16(object_id);
    writer.WriteUInt16(0x6011); // locked, print, autofill, autoline
    writer.Fill(12);

    writer.WriteUInt16(0x0007);
    writer.WriteUInt16(0x0002);
    writer.WriteUInt16(0xffff);

    writer.WriteUInt16(0x0008);
    writer.WriteUInt16(0x0002);
    writer.WriteUInt16(0x0000);

    writer.WriteUInt32(0);

    return new ObjRecord(writer.Bytes());
  }

  public get object_type(): number | undefined {
    return this.HasCommon() ? (this.data[4] | (this.data[5] << 8)) : undefined;
  }

  public get object_id(): number | undefined {
    return this.HasCommon() ? (this.data[6] | (this.data[7] << 8)) : undefined;
  }

  public set object_id(id: number | undefined) {
    if (id !== undefined && this.HasCommon()) {
      this.data[6] = id & 0xff;
      this.data[7] = (id >> 8) & 0xff;
    }
  }

  public static Parse(data: Uint8Array): ObjRecord {
    return new ObjRecord(data.slice(0));
  }

  public Clone(): ObjRecord {
    return new ObjRecord(this.data.slice(0));
  }

  public DataSize(): number {
    return this.data.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteBytes(this.data);
  }

  protected HasCommon(): boolean {
    return this.data.length >= 8 && this.data[0] === 0x15 && this.data[1] === 0x00;
  }

}
