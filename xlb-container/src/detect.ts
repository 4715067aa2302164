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

import { FormatError } from 'xlb-base-types';
import { SIGNATURE } from './constants';

/** BOF record ids by generation, for raw (unwrapped) workbook streams */
const raw_bof: Array<{ sid: number, variant: 'biff2' | 'biff3' | 'biff4', label: string }> = [
  { sid: 0x0009, variant: 'biff2', label: 'BIFF2' },
  { sid: 0x0209, variant: 'biff3', label: 'BIFF3' },
  { sid: 0x0409, variant: 'biff4', label: 'BIFF4' },
];

const Hex = (bytes: Uint8Array): string => {
  return Array.from(bytes).map(byte => byte.toString(16).padStart(2, '0')).join('').toUpperCase();
};

export const HasSignature = (data: Uint8Array): boolean => {
  if (data.length < SIGNATURE.length) { return false; }
  for (let i = 0; i < SIGNATURE.length; i++) {
    if (data[i] !== SIGNATURE[i]) { return false; }
  }
  return true;
};

/**
 * called when the data does not start with the compound file signature.
 * we try to say what it actually is, since "wrong signature" is not very
 * helpful to someone holding an .xlsx or a very old file.
 */
export const Classify = (data: Uint8Array): FormatError => {

  // zip local file header

  if (data.length >= 4 && data[0] === 0x50 && data[1] === 0x4b && data[2] === 0x03 && data[3] === 0x04) {
    return new FormatError('ooxml',
      'The supplied data appears to be in the Office 2007+ XML format (a zip package), not a compound binary workbook');
  }

  if (data.length >= 4) {
    const sid = data[0] | (data[1] << 8);
    for (const candidate of raw_bof) {
      if (candidate.sid === sid) {
        return new FormatError(candidate.variant,
          `The supplied data appears to be in ${candidate.label} format. Only BIFF8 workbooks (Excel 97 and later) are supported`);
      }
    }
    if (sid === 0x0809) {
      return new FormatError('not-ole2',
        'The supplied data appears to be a raw workbook stream without the compound file wrapper');
    }
  }

  const head = Hex(data.slice(0, SIGNATURE.length));
  return new FormatError('not-ole2',
    `Invalid header signature; read 0x${head || '(empty)'}, expected 0x${Hex(SIGNATURE)}`);

};
