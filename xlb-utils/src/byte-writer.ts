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
 * little-endian writer. the buffer grows as needed, but you can (and
 * should) size it up front when the final length is known.
 */
export class ByteWriter {

  public position = 0;

  protected data: Uint8Array;
  protected view: DataView;

  constructor(capacity = 256) {
    this.data = new Uint8Array(Math.max(capacity, 16));
    this.view = new DataView(this.data.buffer);
  }

  public WriteUInt8(value: number): void {
    this.Ensure(1);
    this.view.setUint8(this.position++, value & 0xff);
  }

  public WriteUInt16(value: number): void {
    this.Ensure(2);
    this.view.setUint16(this.position, value & 0xffff, true);
    this.position += 2;
  }

  public WriteInt16(value: number): void {
    this.Ensure(2);
    this.view.setInt16(this.position, value, true);
    this.position += 2;
  }

  public WriteUInt32(value: number): void {
    this.Ensure(4);
    this.view.setUint32(this.position, value >>> 0, true);
    this.position += 4;
  }

  public WriteInt32(value: number): void {
    this.Ensure(4);
    this.view.setInt32(this.position, value, true);
    this.position += 4;
  }

  public WriteDouble(value: number): void {
    this.Ensure(8);
    this.view.setFloat64(this.position, value, true);
    this.position += 8;
  }

  public WriteBytes(bytes: Uint8Array): void {
    this.Ensure(bytes.length);
    this.data.set(bytes, this.position);
    this.position += bytes.length;
  }

  /** write zero bytes */
  public Fill(count: number, value = 0): void {
    this.Ensure(count);
    this.data.fill(value, this.position, this.position + count);
    this.position += count;
  }

  /** compressed (1 byte) or UTF-16LE characters, no header */
  public WriteChars(text: string, wide: boolean): void {
    for (let i = 0; i < text.length; i++) {
      if (wide) {
        this.WriteUInt16(text.charCodeAt(i));
      }
      else {
        this.WriteUInt8(text.charCodeAt(i));
      }
    }
  }

  /** returns a copy of the written bytes */
  public Bytes(): Uint8Array {
    return this.data.slice(0, this.position);
  }

  protected Ensure(count: number) {
    const required = this.position + count;
    if (required <= this.data.length) { return; }

    let capacity = this.data.length * 2;
    while (capacity < required) { capacity *= 2; }

    const data = new Uint8Array(capacity);
    data.set(this.data);
    this.data = data;
    this.view = new DataView(this.data.buffer);
  }

}
