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
import { ContinuedSize, WriteContinued } from './continue';

/**
 * shared interface for everything that goes into a workbook stream.
 *
 * RecordSize is the number of bytes Serialize will write, including the
 * 4-byte record header and any continuation headers. offsets in the
 * stream (BOUNDSHEET positions) are computed from RecordSize before
 * anything is written, so the two have to agree.
 */
export interface RecordBase {
  readonly sid: number;
  RecordSize(): number;
  Serialize(writer: ByteWriter): void;
}

/**
 * base for records that write their payload as one block. payloads over
 * the record limit are split into CONTINUE records without regard to
 * content.
 *
 * subclasses declare the payload size separately from writing it; the
 * codec checks one against the other.
 */
export abstract class StandardRecord implements RecordBase {

  public abstract readonly sid: number;

  /** original fragment sizes, if this record was read from a stream */
  protected fragments?: number[];

  /**
   * keep the continuation boundaries from the original stream. they're
   * used on write as long as they still add up to the payload size.
   */
  public SetFragments(fragments: number[]): this {
    this.fragments = fragments.length > 1 ? fragments.slice(0) : undefined;
    return this;
  }

  public RecordSize(): number {
    return ContinuedSize(this.DataSize(), this.fragments);
  }

  public Serialize(writer: ByteWriter): void {
    const payload = new ByteWriter(this.DataSize());
    this.SerializeData(payload);
    WriteContinued(writer, this.sid, payload.Bytes(), this.fragments);
  }

  /** payload bytes, not including headers */
  public abstract DataSize(): number;

  protected abstract SerializeData(writer: ByteWriter): void;

}
