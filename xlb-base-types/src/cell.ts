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

export type ErrorText = '#NULL!' | '#DIV/0!' | '#VALUE!' | '#REF!' | '#NAME?' | '#NUM!' | '#N/A';

/**
 * error codes as stored in the file (BOOLERR records, error tokens in
 * formulas). the key is the rendered text.
 */
export const ErrorCodes: Record<ErrorText, number> = {
  '#NULL!': 0x00,
  '#DIV/0!': 0x07,
  '#VALUE!': 0x0f,
  '#REF!': 0x17,
  '#NAME?': 0x1d,
  '#NUM!': 0x24,
  '#N/A': 0x2a,
};

const error_texts: ErrorText[] = [
  '#NULL!', '#DIV/0!', '#VALUE!', '#REF!', '#NAME?', '#NUM!', '#N/A',
];

/** unknown codes map to #N/A */
export const ErrorCodeToText = (code: number): ErrorText => {
  return error_texts.find(text => ErrorCodes[text] === code) || '#N/A';
};

/** typeguard */
export const IsErrorText = (value: unknown): value is ErrorText => {
  return typeof value === 'string' && error_texts.some(test => test === value);
};

export interface CellError {
  error: ErrorText;
}

/**
 * cell value. formulas are stored separately (on the cell); this is the
 * literal or cached value.
 */
export type CellValue = number | string | boolean | CellError | undefined;
