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

import { ByteReader, ByteWriter, ShortUnicodeStringSize, UnicodeStringSize } from 'xlb-utils';
import { StandardRecord } from '../record-base';
import { BIFF8_VERSION, Sid, SubstreamType } from '../sid';
import { ReadShortUnicodeString, ReadUnicodeString, WriteShortUnicodeString, WriteUnicodeString } from './strings';

/** build, year, history flags and lowest version, as written by Excel 97 */
const DefaultBOFTail = (): Uint8Array => {
  const writer = new ByteWriter(12);
  writer.WriteUInt16(0x0dbb);
  writer.WriteUInt16(0x07cc);
  writer.WriteUInt32(0x00000041);
  writer.WriteUInt32(0x00000006);
  return writer.Bytes();
};

export class BOFRecord extends StandardRecord {

  public readonly sid = Sid.BOF;

  constructor(
    public substream: number = SubstreamType.Worksheet,
    public version = BIFF8_VERSION,
    public tail = DefaultBOFTail()) {
    super();
  }

  public static Parse(data: Uint8Array): BOFRecord {
    const reader = new ByteReader(data);
    const version = reader.ReadUInt16();
    const substream = reader.ReadUInt16();
    return new BOFRecord(substream, version, reader.ReadBytes(reader.remaining));
  }

  public DataSize(): number {
    return 4 + this.tail.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.version);
    writer.WriteUInt16(this.substream);
    writer.WriteBytes(this.tail);
  }

}

export class EOFRecord extends StandardRecord {

  public readonly sid = Sid.EOF;

  public DataSize(): number {
    return 0;
  }

  protected SerializeData(): void {
    // no payload
  }

}

export const Window1Flags = {
  Hidden: 0x0001,
  Iconic: 0x0002,
  HorizontalScroll: 0x0008,
  VerticalScroll: 0x0010,
  Tabs: 0x0020,
} as const;

/** workbook window: visibility, active tab, first visible tab */
export class Window1Record extends StandardRecord {

  public readonly sid = Sid.WINDOW1;

  public h_pos = 0x0168;
  public v_pos = 0x010e;
  public width = 0x3a5c;
  public height = 0x23be;
  public options: number = Window1Flags.HorizontalScroll | Window1Flags.VerticalScroll | Window1Flags.Tabs;
  public active_tab = 0;
  public first_visible_tab = 0;
  public selected_count = 1;
  public tab_ratio = 0x0258;

  public get hidden(): boolean {
    return (this.options & Window1Flags.Hidden) !== 0;
  }

  public set hidden(hidden: boolean) {
    this.options = hidden ? (this.options | Window1Flags.Hidden) : (this.options & ~Window1Flags.Hidden);
  }

  public static Parse(data: Uint8Array): Window1Record {
    const reader = new ByteReader(data);
    const record = new Window1Record();
    record.h_pos = reader.ReadUInt16();
    record.v_pos = reader.ReadUInt16();
    record.width = reader.ReadUInt16();
    record.height = reader.ReadUInt16();
    record.options = reader.ReadUInt16();
    record.active_tab = reader.ReadUInt16();
    record.first_visible_tab = reader.ReadUInt16();
    record.selected_count = reader.ReadUInt16();
    record.tab_ratio = reader.ReadUInt16();
    return record;
  }

  public DataSize(): number {
    return 18;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.h_pos);
    writer.WriteUInt16(this.v_pos);
    writer.WriteUInt16(this.width);
    writer.WriteUInt16(this.height);
    writer.WriteUInt16(this.options);
    writer.WriteUInt16(this.active_tab);
    writer.WriteUInt16(this.first_visible_tab);
    writer.WriteUInt16(this.selected_count);
    writer.WriteUInt16(this.tab_ratio);
  }

}

export enum SheetVisibility {
  Visible = 0,
  Hidden = 1,
  VeryHidden = 2,
}

/**
 * one per sheet, in tab order. `position` is the absolute offset of the
 * sheet's BOF in the workbook stream; it's computed on write.
 */
export class BoundSheetRecord extends StandardRecord {

  public readonly sid = Sid.BOUNDSHEET;

  constructor(
    public name: string,
    public position = 0,
    public visibility: number = SheetVisibility.Visible,
    public sheet_type = 0) {
    super();
  }

  public static Parse(data: Uint8Array): BoundSheetRecord {
    const reader = new ByteReader(data);
    const position = reader.ReadUInt32();
    const visibility = reader.ReadUInt8() & 0x03;
    const sheet_type = reader.ReadUInt8();
    return new BoundSheetRecord(ReadShortUnicodeString(reader), position, visibility, sheet_type);
  }

  public DataSize(): number {
    return 6 + ShortUnicodeStringSize(this.name);
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt32(this.position);
    writer.WriteUInt8(this.visibility);
    writer.WriteUInt8(this.sheet_type);
    WriteShortUnicodeString(writer, this.name);
  }

}

/**
 * supporting link. we only interpret the "this workbook" form; add-in and
 * external links are kept as they are.
 */
export class SupBookRecord extends StandardRecord {

  public readonly sid = Sid.SUPBOOK;

  protected constructor(
    public kind: 'internal' | 'add-in' | 'external',
    public sheet_count: number,
    protected raw: Uint8Array) {
    super();
  }

  public get internal(): boolean {
    return this.kind === 'internal';
  }

  public static Internal(sheet_count: number): SupBookRecord {
    return new SupBookRecord('internal', sheet_count, new Uint8Array(0));
  }

  public static Parse(data: Uint8Array): SupBookRecord {
    const reader = new ByteReader(data);
    const count = reader.ReadUInt16();
    const marker = reader.remaining >= 2 ? reader.ReadUInt16() : 0;
    if (data.length === 4 && marker === 0x0401) {
      return new SupBookRecord('internal', count, data);
    }
    if (data.length === 4 && marker === 0x3a01) {
      return new SupBookRecord('add-in', count, data);
    }
    return new SupBookRecord('external', count, data);
  }

  public DataSize(): number {
    return this.internal ? 4 : this.raw.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    if (this.internal) {
      writer.WriteUInt16(this.sheet_count);
      writer.WriteUInt16(0x0401);
    }
    else {
      writer.WriteBytes(this.raw);
    }
  }

}

/**
 * raw extern sheet entry: a supbook index and a range of sheet indexes
 * within that book. in the internal book, 0xFFFE and 0xFFFF mark a
 * deleted sheet.
 */
export interface XTI {
  supbook: number;
  first: number;
  last: number;
}

export class ExternSheetRecord extends StandardRecord {

  public readonly sid = Sid.EXTERNSHEET;

  constructor(public entries: XTI[] = []) {
    super();
  }

  public static Parse(data: Uint8Array): ExternSheetRecord {
    const reader = new ByteReader(data);
    const count = reader.ReadUInt16();
    const entries: XTI[] = [];
    for (let i = 0; i < count && reader.remaining >= 6; i++) {
      entries.push({ supbook: reader.ReadUInt16(), first: reader.ReadUInt16(), last: reader.ReadUInt16() });
    }
    return new ExternSheetRecord(entries);
  }

  public DataSize(): number {
    return 2 + this.entries.length * 6;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.entries.length);
    for (const entry of this.entries) {
      writer.WriteUInt16(entry.supbook);
      writer.WriteUInt16(entry.first);
      writer.WriteUInt16(entry.last);
    }
  }

}

/**
 * cell format. we only look at the font and number format; the rest of
 * the structure (alignment, borders, fills) is carried as bytes.
 */
export class XFRecord extends StandardRecord {

  public readonly sid = Sid.XF;

  constructor(
    public font = 0,
    public format = 0,
    public flags = 0x0001,
    public rest: Uint8Array = new Uint8Array(14)) {
    super();
  }

  /** style XFs (vs. cell XFs) */
  public get is_style(): boolean {
    return (this.flags & 0x0004) !== 0;
  }

  public static Parse(data: Uint8Array): XFRecord {
    const reader = new ByteReader(data);
    const font = reader.ReadUInt16();
    const format = reader.ReadUInt16();
    const flags = reader.ReadUInt16();
    return new XFRecord(font, format, flags, reader.ReadBytes(reader.remaining));
  }

  public Clone(): XFRecord {
    return new XFRecord(this.font, this.format, this.flags, this.rest.slice(0));
  }

  public DataSize(): number {
    return 6 + this.rest.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.font);
    writer.WriteUInt16(this.format);
    writer.WriteUInt16(this.flags);
    writer.WriteBytes(this.rest);
  }

}

/** presence of this record means "write-reserved": open read-only unless the password is known */
export class WriteProtectRecord extends StandardRecord {

  public readonly sid = Sid.WRITEPROTECT;

  public DataSize(): number {
    return 0;
  }

  protected SerializeData(): void {
    // no payload
  }

}

export class FileSharingRecord extends StandardRecord {

  public readonly sid = Sid.FILESHARING;

  constructor(
    public verifier = 0,
    public username = '',
    public read_only_recommended = 0) {
    super();
  }

  public static Parse(data: Uint8Array): FileSharingRecord {
    const reader = new ByteReader(data);
    const read_only_recommended = reader.ReadUInt16();
    const verifier = reader.ReadUInt16();
    const username = reader.remaining >= 3 ? ReadUnicodeString(reader) : '';
    return new FileSharingRecord(verifier, username, read_only_recommended);
  }

  public DataSize(): number {
    return 4 + UnicodeStringSize(this.username);
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteUInt16(this.read_only_recommended);
    writer.WriteUInt16(this.verifier);
    WriteUnicodeString(writer, this.username);
  }

}

/** sheet ids in tab order. regenerated on every write. */
export class TabIdRecord extends StandardRecord {

  public readonly sid = Sid.TABID;

  constructor(public ids: number[] = []) {
    super();
  }

  public static Parse(data: Uint8Array): TabIdRecord {
    const reader = new ByteReader(data);
    const ids: number[] = [];
    while (reader.remaining >= 2) {
      ids.push(reader.ReadUInt16());
    }
    return new TabIdRecord(ids);
  }

  public DataSize(): number {
    return this.ids.length * 2;
  }

  protected SerializeData(writer: ByteWriter): void {
    for (const id of this.ids) {
      writer.WriteUInt16(id);
    }
  }

}

/** escher data for the drawing group (picture store, drawing id clusters) */
export class MsoDrawingGroupRecord extends StandardRecord {

  public readonly sid = Sid.MSODRAWINGGROUP;

  constructor(public data: Uint8Array) {
    super();
  }

  public static Parse(data: Uint8Array): MsoDrawingGroupRecord {
    return new MsoDrawingGroupRecord(data.slice(0));
  }

  public DataSize(): number {
    return this.data.length;
  }

  protected SerializeData(writer: ByteWriter): void {
    writer.WriteBytes(this.data);
  }

}
