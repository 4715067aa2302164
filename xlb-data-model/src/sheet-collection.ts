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

import type { Sheet } from './sheet';

/**
 * we look up sheets by name, by stable id and by ordinal. this class
 * supports all three without looping.
 *
 * nothing should assign to the array directly, or the indexes will go
 * stale. renaming a sheet also requires updating indexes.
 */
export class SheetCollection {

  /**
   * returns a copy of the list. useful for indexing or functional-style
   * calls; changes to the copy are ignored.
   */
  public get list(): Sheet[] {
    return this.sheets_.slice(0);
  }

  public get length(): number {
    return this.sheets_.length;
  }

  /** map of (normalized) name -> sheet */
  protected names: Map<string, Sheet> = new Map();

  /** map of id -> sheet */
  protected ids: Map<number, Sheet> = new Map();

  /** map of id -> ordinal */
  protected ordinals: Map<number, number> = new Map();

  private sheets_: Sheet[] = [];

  /**
   * remove any existing sheets and add the passed list. updates indexes.
   */
  public Assign(sheets: Sheet[]): void {
    this.sheets_ = [...sheets];
    this.UpdateIndexes();
  }

  /** add a sheet to the end of the list. updates indexes. */
  public Add(sheet: Sheet): void {
    this.sheets_.push(sheet);
    this.UpdateIndexes();
  }

  /** wrapper for array splice. updates indexes. */
  public Splice(insert_index: number, delete_count: number, ...items: Sheet[]): Sheet[] {
    const removed = this.sheets_.splice(insert_index, delete_count, ...items);
    this.UpdateIndexes();
    return removed;
  }

  public At(ordinal: number): Sheet | undefined {
    return this.sheets_[ordinal];
  }

  /**
   * find by name or id. names are normalized here, so you do not need
   * to do it.
   */
  public Find(id: string | number): Sheet | undefined {
    if (typeof id === 'string') {
      return this.names.get(Normalize(id));
    }
    return this.ids.get(id);
  }

  /** get name for sheet with given id */
  public Name(id: number): string | undefined {
    return this.ids.get(id)?.name;
  }

  /** get ID for sheet with given name */
  public ID(name: string): number | undefined {
    return this.names.get(Normalize(name))?.id;
  }

  /** current position of the sheet with the given id, or -1 */
  public Ordinal(id: number): number {
    return this.ordinals.get(id) ?? -1;
  }

  public UpdateIndexes(): void {

    this.names.clear();
    this.ids.clear();
    this.ordinals.clear();

    this.sheets_.forEach((sheet, index) => {
      this.names.set(Normalize(sheet.name), sheet);
      this.ids.set(sheet.id, sheet);
      this.ordinals.set(sheet.id, index);
    });

  }

}

/** sheet names compare case-insensitively */
const Normalize = (name: string) => name.toLocaleUpperCase();
