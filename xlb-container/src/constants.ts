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

/** D0 CF 11 E0 A1 B1 1A E1 */
export const SIGNATURE = Uint8Array.from([0xd0, 0xcf, 0x11, 0xe0, 0xa1, 0xb1, 0x1a, 0xe1]);

export const HEADER_SIZE = 512;
export const CLASS_ID_LENGTH = 16;

/** directory entry types, as the library reports them */
export const EntryType = {
  Storage: 1,
  Stream: 2,
  Root: 5,
} as const;

/**
 * the container library adds this stream to everything it writes. we
 * leave it in the file but keep it out of listings and lookups.
 */
export const LIBRARY_SEED_STREAM = '\u0001Sh33tJ5';
