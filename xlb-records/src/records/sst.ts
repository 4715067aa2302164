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

import { ByteWriter, IsWide } from 'xlb-utils';
import { ContinuableReader, ContinuableWriter } from '../continue';
import type { RecordBase } from '../record-base';
import { RECORD_HEADER_SIZE, Sid } from '../sid';

const StringFlags = {
  Wide: 0x01,
  Extended: 0x04,
  Rich: 0x08,
} as const;

/**
 * shared string table. strings are unique; cells reference them by
 * index. formatting runs and phonetic data are dropped on read.
 *
 * this record handles its own continuation, because a string split
 * across a boundary has to repeat its flag byte.
 */
export class SSTRecord implements RecordBase {

  public readonly sid = Sid.SST;

  /** total number of cell references, as opposed to unique strings */
  public total = 0;

  constructor(public strings: string[] = []) {}

  public static Parse(data: Uint8Array, fragments: number[] = [data.length]): SSTRecord {

    const reader = new ContinuableReader(data, fragments);
    const record = new SSTRecord();

    record.total = reader.ReadUInt32();
    const unique = reader.ReadUInt32();

    for (let i = 0; i < unique && reader.remaining > 0; i++) {
      const length = reader.ReadUInt16();
      const flags = reader.ReadUInt8();
      const runs = (flags & StringFlags.Rich) ? reader.ReadUInt16() : 0;
      const extended = (flags & StringFlags.Extended) ? reader.ReadUInt32() : 0;
      record.strings.push(reader.ReadChars(length, (flags & StringFlags.Wide) === StringFlags.Wide));
      reader.Skip(runs * 4 + extended);
    }

    return record;

  }

  public RecordSize(): number {
    return this.Layout().reduce((sum, fragment) => sum + RECORD_HEADER_SIZE + fragment.length, 0);
  }

  public Serialize(writer: ByteWriter): void {
    this.Layout().forEach((fragment, index) => {
      writer.WriteUInt16(index ? Sid.CONTINUE : this.sid);
      writer.WriteUInt16(fragment.length);
      writer.WriteBytes(fragment);
    });
  }

  protected Layout(): Uint8Array[] {
    const writer = new ContinuableWriter();
    writer.WriteUInt32(Math.max(this.total, this.strings.length));
    writer.WriteUInt32(this.strings.length);
    for (const text of this.strings) {
      writer.WriteString(text, IsWide(text));
    }
    return writer.Fragments();
  }

}
