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

import { SSTRecord } from 'xlb-records';

/**
 * shared string table, for writing. strings are unique; cells point at
 * them by index. `total` counts references, which the SST header wants
 * as well.
 */
export class SharedStrings {

  public strings: string[] = [];

  public total = 0;

  protected reverse: Map<string, number> = new Map();

  /** return a string by index */
  public Get(index: number): string | undefined {
    return this.strings[index];
  }

  /** find existing string or insert, and return index. counts a reference. */
  public Ensure(text: string): number {

    this.total++;

    let index = this.reverse.get(text);
    if (typeof index === 'number') {
      return index;
    }

    index = this.strings.length;
    this.strings.push(text);
    this.reverse.set(text, index);
    return index;

  }

  public ToRecord(): SSTRecord {
    const record = new SSTRecord(this.strings.slice(0));
    record.total = this.total;
    return record;
  }

}
