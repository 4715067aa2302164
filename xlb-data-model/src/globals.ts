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

import { ByteWriter } from 'xlb-utils';
import { BOFRecord, EOFRecord, Sid, SubstreamType, UnknownRecord, type BiffRecord } from 'xlb-records';

/**
 * parts of the globals substream the model owns. everything else is
 * kept as records, in place.
 */
export type GlobalSlot =
  | 'write-protect'
  | 'file-sharing'
  | 'tabid'
  | 'window1'
  | 'styles'
  | 'boundsheets'
  | 'links'
  | 'names'
  | 'drawing-group'
  | 'sst'
  ;

/** the order slots appear in a well-formed stream */
export const slot_order: GlobalSlot[] = [
  'write-protect', 'file-sharing', 'tabid', 'window1', 'styles',
  'boundsheets', 'links', 'names', 'drawing-group', 'sst',
];

export type GlobalEntry = { slot: GlobalSlot } | { record: BiffRecord };

/** a FONT record: 10 point Arial, in one of the four default weights/styles */
const Font = (bold: boolean, italic: boolean): UnknownRecord => {
  const writer = new ByteWriter(21);
  writer.WriteUInt16(200); // height, in twips
  writer.WriteUInt16(italic ? 0x0002 : 0);
  writer.WriteUInt16(0x7fff); // automatic color
  writer.WriteUInt16(bold ? 700 : 400);
  writer.Fill(6);
  writer.WriteUInt8(5);
  writer.WriteUInt8(0);
  writer.WriteChars('Arial', false);
  return new UnknownRecord(Sid.FONT, writer.Bytes());
};

/** built-in style: STYLE pointing at one of the default style XFs */
const Style = (xf: number, builtin: number): UnknownRecord => {
  const writer = new ByteWriter(4);
  writer.WriteUInt16(0x8000 | xf);
  writer.WriteUInt8(builtin);
  writer.WriteUInt8(0xff);
  return new UnknownRecord(Sid.STYLE, writer.Bytes());
};

const UInt16Record = (sid: number, ...values: number[]): UnknownRecord => {
  const writer = new ByteWriter(values.length * 2);
  values.forEach(value => writer.WriteUInt16(value));
  return new UnknownRecord(sid, writer.Bytes());
};

/**
 * layout of the globals substream: records we keep as they are, with
 * placeholders where the model's own records go when the stream is
 * written.
 */
export class GlobalLayout {

  constructor(public entries: GlobalEntry[] = []) {}

  /** globals for a new workbook */
  public static Default(): GlobalLayout {
    return new GlobalLayout([
      { record: new BOFRecord(SubstreamType.Globals) },
      { slot: 'write-protect' },
      { slot: 'file-sharing' },
      { record: UInt16Record(Sid.CODEPAGE, 1200) },
      { slot: 'tabid' },
      { slot: 'window1' },
      { record: Font(false, false) },
      { record: Font(true, false) },
      { record: Font(false, true) },
      { record: Font(true, true) },
      { slot: 'styles' },
      { record: Style(0x10, 3) },
      { record: Style(0x11, 6) },
      { record: Style(0x12, 4) },
      { record: Style(0x13, 7) },
      { record: Style(0x00, 0) },
      { record: Style(0x14, 5) },
      { slot: 'boundsheets' },
      { record: UInt16Record(Sid.COUNTRY, 1, 1) },
      { slot: 'links' },
      { slot: 'names' },
      { slot: 'drawing-group' },
      { slot: 'sst' },
      { record: new EOFRecord() },
    ]);
  }

  public Has(slot: GlobalSlot): boolean {
    return this.entries.some(entry => 'slot' in entry && entry.slot === slot);
  }

  /**
   * make sure a slot exists. a missing slot goes in front of the next
   * slot (in stream order) that exists, or failing that after the last
   * one that does. write protection goes right after the BOF, and file
   * sharing after WRITEACCESS (or write protection) if there is one.
   */
  public Ensure(slot: GlobalSlot): void {

    if (this.Has(slot)) {
      return;
    }

    const Position = (test: GlobalSlot) =>
      this.entries.findIndex(entry => 'slot' in entry && entry.slot === test);

    const rank = slot_order.indexOf(slot);
    let index = -1;

    if (slot === 'write-protect') {
      index = 1;
    }
    else if (slot === 'file-sharing') {
      const access = this.entries.findIndex(entry => 'record' in entry && entry.record.sid === Sid.WRITEACCESS);
      const previous = access >= 0 ? access : Position('write-protect');
      index = previous >= 0 ? previous + 1 : 1;
    }
    else {
      for (const following of slot_order.slice(rank + 1)) {
        index = Position(following);
        if (index >= 0) { break; }
      }
      if (index < 0) {
        for (const preceding of slot_order.slice(0, rank).reverse()) {
          const position = Position(preceding);
          if (position >= 0) {
            index = position + 1;
            break;
          }
        }
      }
      if (index < 0) {
        // before the EOF
        index = Math.max(1, this.entries.length - 1);
      }
    }

    this.entries.splice(Math.min(index, this.entries.length), 0, { slot });

  }

}
