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

import type { ErrorText } from 'xlb-base-types';
import type { BiffRecord, FormulaRecord } from 'xlb-records';

interface BaseCell {
  row: number;
  column: number;

  /** index into the cell style table */
  xf: number;
}

export interface NumberCell extends BaseCell {
  type: 'number';
  value: number;
}

/** strings go through the shared string table on write */
export interface StringCell extends BaseCell {
  type: 'string';
  value: string;
}

export interface BooleanCell extends BaseCell {
  type: 'boolean';
  value: boolean;
}

export interface ErrorCell extends BaseCell {
  type: 'error';
  value: ErrorText;
}

export interface BlankCell extends BaseCell {
  type: 'blank';
}

/**
 * formula cell. we keep the record, which holds the tokens, flags and
 * cached result. a cached string result is carried separately (it goes
 * out as a STRING record). shared formula, array and data table records
 * that followed the formula are written back after it.
 */
export interface FormulaCell extends BaseCell {
  type: 'formula';
  record: FormulaRecord;
  cached_string?: string;
  attached: BiffRecord[];
}

export type Cell = NumberCell | StringCell | BooleanCell | ErrorCell | BlankCell | FormulaCell;

/** the default cell format in every workbook */
export const DEFAULT_CELL_XF = 15;

/** column count is 256, so this orders keys row-major */
export const CellKey = (row: number, column: number): number => row * 0x100 + column;
