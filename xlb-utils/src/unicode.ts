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
 * strings in the workbook stream are stored "compressed" (one byte per
 * character) if every character fits in a byte, otherwise as UTF-16LE.
 * a flag byte says which.
 */
export const IsWide = (text: string): boolean => {
  for (let i = 0; i < text.length; i++) {
    if (text.charCodeAt(i) > 0xff) {
      return true;
    }
  }
  return false;
};

/** bytes for the character data only */
export const CharDataSize = (text: string): number => {
  return IsWide(text) ? text.length * 2 : text.length;
};

/**
 * size of a string with a 16-bit count, a flag byte and character data
 * (XLUnicodeString).
 */
export const UnicodeStringSize = (text: string): number => {
  return 3 + CharDataSize(text);
};

/**
 * size of a string with an 8-bit count, a flag byte and character data
 * (ShortXLUnicodeString).
 */
export const ShortUnicodeStringSize = (text: string): number => {
  return 2 + CharDataSize(text);
};
