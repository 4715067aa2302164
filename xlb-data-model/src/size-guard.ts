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

import { SizeMismatchError } from 'xlb-base-types';
import { MeasureRecords, type RecordBase } from 'xlb-records';

/**
 * compare what a sheet block declares against what it writes. the
 * BOUNDSHEET offsets are computed from declared sizes before anything is
 * written, so a block that drifts would corrupt every later sheet.
 * returns the block size.
 */
export const CheckSheetSize = (records: RecordBase[], sheet_index: number): number => {

  const declared = records.reduce((sum, record) => sum + record.RecordSize(), 0);
  const actual = MeasureRecords(records).reduce((sum, size) => sum + size, 0);

  if (declared !== actual) {
    throw new SizeMismatchError(
      `Actual serialized sheet size (${actual}) differs from pre-calculated size (${declared}) for sheet (${sheet_index})`,
      declared, actual);
  }

  return declared;

};
