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

import { ByteReader, ByteWriter, IsWide } from 'xlb-utils';

/** XLUnicodeString: 16-bit count, flag byte, characters */
export const ReadUnicodeString = (reader: ByteReader): string => {
  const count = reader.ReadUInt16();
  const wide = (reader.ReadUInt8() & 0x01) === 0x01;
  return reader.ReadChars(count, wide);
};

/** ShortXLUnicodeString: 8-bit count, flag byte, characters */
export const ReadShortUnicodeString = (reader: ByteReader): string => {
  const count = reader.ReadUInt8();
  const wide = (reader.ReadUInt8() & 0x01) === 0x01;
  return reader.ReadChars(count, wide);
};

export const WriteUnicodeString = (writer: ByteWriter, text: string): void => {
  const wide = IsWide(text);
  writer.WriteUInt16(text.length);
  writer.WriteUInt8(wide ? 1 : 0);
  writer.WriteChars(text, wide);
};

export const WriteShortUnicodeString = (writer: ByteWriter, text: string): void => {
  const wide = IsWide(text);
  writer.WriteUInt8(text.length);
  writer.WriteUInt8(wide ? 1 : 0);
  writer.WriteChars(text, wide);
};
