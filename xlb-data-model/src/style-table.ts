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

import { CapacityExceededError } from 'xlb-base-types';
import { XFRecord } from 'xlb-records';
import { DEFAULT_CELL_XF } from './cell';

/** the most cell formats (style and cell XFs together) a workbook can hold */
export const MAX_CELL_STYLES = 4030;

/**
 * the XF table. the first 16 entries are the built-in style formats and
 * entry 15 is the default cell format; we create 21 for a new workbook,
 * as Excel does.
 */
export class StyleTable {

  protected list: XFRecord[] = [];

  public get length(): number {
    return this.list.length;
  }

  public get records(): XFRecord[] {
    return this.list.slice(0);
  }

  public static Default(): StyleTable {
    const table = new StyleTable();
    for (let i = 0; i < 21; i++) {
      const style = i < DEFAULT_CELL_XF || i > DEFAULT_CELL_XF;
      table.list.push(new XFRecord(0, 0, style ? 0xfff5 : 0x0001));
    }
    return table;
  }

  public Load(records: XFRecord[]): void {
    this.list = records.slice(0);
  }

  public Get(index: number): XFRecord | undefined {
    return this.list[index];
  }

  /**
   * add a cell format, copied from the default cell format. throws if
   * the table is full; the table is not modified in that case.
   */
  public Create(): number {

    if (this.list.length >= MAX_CELL_STYLES) {
      throw new CapacityExceededError(
        'The maximum number of cell styles was exceeded. You can define up to 4000 styles in a .xls workbook',
        MAX_CELL_STYLES);
    }

    const base = this.list[DEFAULT_CELL_XF];
    this.list.push(base ? base.Clone() : new XFRecord());
    return this.list.length - 1;

  }

}
