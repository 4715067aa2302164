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
import { MAX_RECORD_DATA, RECORD_HEADER_SIZE, Sid } from './sid';

/**
 * fragment sizes for a payload. if the caller has boundaries from the
 * original stream and they still describe the payload, we keep them;
 * otherwise we split at the record limit.
 */
export const Fragments = (length: number, original?: number[]): number[] => {

  if (original && original.length) {
    const sum = original.reduce((a, b) => a + b, 0);
    if (sum === length && original.every(size => size <= MAX_RECORD_DATA)) {
      return original.slice(0);
    }
  }

  if (!length) { return [0]; }

  const list: number[] = [];
  for (let offset = 0; offset < length; offset += MAX_RECORD_DATA) {
    list.push(Math.min(MAX_RECORD_DATA, length - offset));
  }
  return list;

};

/** total bytes for a payload written as a record plus continuations */
export const ContinuedSize = (length: number, original?: number[]): number => {
  return length + Fragments(length, original).length * RECORD_HEADER_SIZE;
};

/**
 * write a payload as one record, plus CONTINUE records if it does not
 * fit. this knows nothing about the payload.
 */
export const WriteContinued = (writer: ByteWriter, sid: number, payload: Uint8Array, original?: number[]): void => {
  let offset = 0;
  Fragments(payload.length, original).forEach((size, index) => {
    writer.WriteUInt16(index ? Sid.CONTINUE : sid);
    writer.WriteUInt16(size);
    writer.WriteBytes(payload.subarray(offset, offset + size));
    offset += size;
  });
};

/**
 * for payloads that can't split anywhere. some structures have to stay
 * in one fragment, and strings split across a boundary repeat their
 * option flags at the start of the next fragment. used by the shared
 * string table.
 */
export class ContinuableWriter {

  protected fragments: Uint8Array[] = [];
  protected current = new ByteWriter(MAX_RECORD_DATA);

  public get available(): number {
    return MAX_RECORD_DATA - this.current.position;
  }

  /** start a new fragment unless `count` bytes fit in this one */
  public Reserve(count: number): void {
    if (this.available < count) {
      this.Break();
    }
  }

  public WriteUInt16(value: number): void {
    this.Reserve(2);
    this.current.WriteUInt16(value);
  }

  public WriteUInt32(value: number): void {
    this.Reserve(4);
    this.current.WriteUInt32(value);
  }

  /**
   * XLUnicodeRichExtendedString without formatting runs. the header and
   * at least one character stay together.
   */
  public WriteString(text: string, wide: boolean): void {
    const char_size = wide ? 2 : 1;
    this.Reserve(3 + (text.length ? char_size : 0));
    this.current.WriteUInt16(text.length);
    this.current.WriteUInt8(wide ? 1 : 0);

    for (let i = 0; i < text.length; i++) {
      if (this.available < char_size) {
        this.Break();
        this.current.WriteUInt8(wide ? 1 : 0);
      }
      this.current.WriteChars(text[i], wide);
    }
  }

  /** payload fragments, in order */
  public Fragments(): Uint8Array[] {
    return [...this.fragments, this.current.Bytes()];
  }

  protected Break() {
    this.fragments.push(this.current.Bytes());
    this.current = new ByteWriter(MAX_RECORD_DATA);
  }

}

/**
 * reads a merged payload, knowing where the original fragment
 * boundaries were, so strings that span a boundary can pick up the
 * repeated flag byte.
 */
export class ContinuableReader {

  public position = 0;

  protected boundaries: number[] = [];
  protected view: DataView;

  public get remaining(): number {
    return this.data.length - this.position;
  }

  constructor(protected readonly data: Uint8Array, fragments: number[]) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    let offset = 0;
    for (const size of fragments.slice(0, -1)) {
      offset += size;
      this.boundaries.push(offset);
    }
  }

  public ReadUInt8(): number {
    this.Check(1);
    return this.view.getUint8(this.position++);
  }

  public ReadUInt16(): number {
    this.Check(2);
    const value = this.view.getUint16(this.position, true);
    this.position += 2;
    return value;
  }

  public ReadUInt32(): number {
    this.Check(4);
    const value = this.view.getUint32(this.position, true);
    this.position += 4;
    return value;
  }

  public Skip(count: number): void {
    this.Check(count);
    this.position += count;
  }

  /**
   * read characters. at a fragment boundary the next byte is a fresh
   * flag byte, and the width can change.
   */
  public ReadChars(count: number, wide: boolean): string {
    const chars: number[] = [];
    for (let i = 0; i < count; i++) {
      if (this.boundaries.includes(this.position)) {
        wide = (this.ReadUInt8() & 0x01) === 0x01;
      }
      if (wide) {
        chars.push(this.ReadUInt16());
      }
      else {
        chars.push(this.ReadUInt8());
      }
    }
    return String.fromCharCode(...chars);
  }

  protected Check(count: number) {
    if (this.position + count > this.data.length) {
      throw new RangeError(`read of ${count} bytes at ${this.position} overruns record (${this.data.length})`);
    }
  }

}
