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

/**
 * little-endian reader over a byte array. all reads advance the cursor.
 * reading past the end throws a RangeError; callers that need to report
 * format errors should check `remaining` first.
 */
export class ByteReader {

  public position = 0;

  protected view: DataView;

  public get length(): number {
    return this.data.length;
  }

  public get remaining(): number {
    return this.data.length - this.position;
  }

  constructor(public readonly data: Uint8Array, offset = 0) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    this.position = offset;
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

  public ReadInt16(): number {
    this.Check(2);
    const value = this.view.getInt16(this.position, true);
    this.position += 2;
    return value;
  }

  public ReadUInt32(): number {
    this.Check(4);
    const value = this.view.getUint32(this.position, true);
    this.position += 4;
    return value;
  }

  public ReadInt32(): number {
    this.Check(4);
    const value = this.view.getInt32(this.position, true);
    this.position += 4;
    return value;
  }

  public ReadDouble(): number {
    this.Check(8);
    const value = this.view.getFloat64(this.position, true);
    this.position += 8;
    return value;
  }

  /** returns a copy, not a view */
  public ReadBytes(count: number): Uint8Array {
    this.Check(count);
    const bytes = this.data.slice(this.position, this.position + count);
    this.position += count;
    return bytes;
  }

  public Skip(count: number): void {
    this.Check(count);
    this.position += count;
  }

  /**
   * read characters, either compressed (one byte per char, high byte
   * zero) or UTF-16LE.
   */
  public ReadChars(count: number, wide: boolean): string {
    const chars: number[] = [];
    for (let i = 0; i < count; i++) {
      chars.push(wide ? this.ReadUInt16() : this.ReadUInt8());
    }
    return String.fromCharCode(...chars);
  }

  protected Check(count: number) {
    if (count < 0 || this.position + count > this.data.length) {
      throw new RangeError(`read of ${count} bytes at ${this.position} overruns buffer (${this.data.length})`);
    }
  }

}
