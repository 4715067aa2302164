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

const RotateLeft15 = (value: number): number => {
  return ((value & 0x4000) ? 1 : 0) | ((value << 1) & 0x7fff);
};

/**
 * the 16-bit password verifier used by write protection (and sheet
 * protection) records. this is not encryption, it's a hash that the
 * application compares against; it's trivially reversible.
 *
 * characters are reduced to a single byte (low byte, or high byte if
 * the low byte is zero).
 */
export const PasswordVerifier = (password: string): number => {

  if (!password.length) {
    return 0;
  }

  const bytes: number[] = [];
  for (let i = 0; i < password.length; i++) {
    const char = password.charCodeAt(i);
    bytes.push((char & 0xff) || ((char >>> 8) & 0xff));
  }

  let verifier = 0;
  for (let i = bytes.length - 1; i >= 0; i--) {
    verifier = RotateLeft15(verifier);
    verifier ^= bytes[i];
  }

  verifier = RotateLeft15(verifier);
  verifier ^= bytes.length;
  verifier ^= 0xce4b;

  return verifier & 0xffff;

};
