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

import { ExternSheetRecord, SupBookRecord, type BiffRecord, type XTI } from 'xlb-records';

/** the sheet was deleted. written as 0xFFFF. */
export const DELETED_SHEET = -1;

/** a workbook-level reference (0xFFFE in the file) */
export const WORKBOOK_LEVEL = -2;

const DELETED_TAB = 0xffff;
const WORKBOOK_TAB = 0xfffe;

/**
 * one entry. for the internal book, first and last are stable sheet ids
 * (or one of the sentinels); for external books they are the raw tab
 * indexes from the file.
 */
export interface ExternSheetEntry {
  supbook: number;
  first: number;
  last: number;
}

/**
 * the extern sheet table. 3D reference tokens carry an index into this
 * table rather than a sheet ordinal. entries for this workbook hold
 * stable sheet ids and are converted to ordinals only when written, so
 * moving sheets around never touches a token. deleting a sheet turns
 * its entries into the deleted sentinel.
 *
 * entries are never removed or reordered, so an index stays valid for
 * the life of the model.
 */
export class ExternSheetTable {

  public supbooks: SupBookRecord[] = [];

  /**
   * records that follow each supbook in the file (external names, cached
   * values), by supbook index. they're written back after their supbook.
   */
  public supbook_records: BiffRecord[][] = [];

  public entries: ExternSheetEntry[] = [];

  /** index of the self-referencing supbook, or -1 */
  protected internal = -1;

  public get length(): number {
    return this.entries.length;
  }

  public IsInternal(entry: ExternSheetEntry): boolean {
    return entry.supbook === this.internal;
  }

  /**
   * load from the file. `SheetId` maps a tab index in this workbook to
   * a stable id.
   */
  public Load(
      supbooks: SupBookRecord[],
      record: ExternSheetRecord | undefined,
      SheetId: (ordinal: number) => number | undefined,
      supbook_records: BiffRecord[][] = []): void {

    this.supbooks = supbooks;
    this.supbook_records = supbooks.map((_, index) => supbook_records[index] || []);
    this.internal = supbooks.findIndex(supbook => supbook.internal);

    const Resolve = (tab: number): number => {
      if (tab === WORKBOOK_TAB) { return WORKBOOK_LEVEL; }
      return SheetId(tab) ?? DELETED_SHEET;
    };

    this.entries = (record?.entries || []).map(xti => {
      if (xti.supbook === this.internal) {
        return { supbook: xti.supbook, first: Resolve(xti.first), last: Resolve(xti.last) };
      }
      return { ...xti };
    });

  }

  /**
   * find the entry for a single sheet in this workbook, adding it (and
   * the internal supbook, if there isn't one) as necessary.
   */
  public IndexFor(sheet_id: number): number {

    if (this.internal < 0) {
      this.internal = this.supbooks.length;
      this.supbooks.push(SupBookRecord.Internal(0));
      this.supbook_records.push([]);
    }

    const index = this.entries.findIndex(entry =>
      entry.supbook === this.internal && entry.first === sheet_id && entry.last === sheet_id);

    if (index >= 0) {
      return index;
    }

    this.entries.push({ supbook: this.internal, first: sheet_id, last: sheet_id });
    return this.entries.length - 1;

  }

  /**
   * the sheet an entry names, if it names exactly one sheet in this
   * workbook. undefined for deleted sheets, ranges and external books.
   */
  public SheetId(ixti: number): number | undefined {
    const entry = this.entries[ixti];
    if (!entry || !this.IsInternal(entry) || entry.first !== entry.last || entry.first < 0) {
      return undefined;
    }
    return entry.first;
  }

  /** the sheet ids of an internal multi-sheet entry (`Sheet1:Sheet3`) */
  public SheetRange(ixti: number): [number, number] | undefined {
    const entry = this.entries[ixti];
    if (!entry || !this.IsInternal(entry) || entry.first === entry.last || entry.first < 0 || entry.last < 0) {
      return undefined;
    }
    return [entry.first, entry.last];
  }

  /** entries touching the sheet become deleted */
  public RemoveSheet(sheet_id: number): void {
    for (const entry of this.entries) {
      if (this.IsInternal(entry) && (entry.first === sheet_id || entry.last === sheet_id)) {
        entry.first = entry.last = DELETED_SHEET;
      }
    }
  }

  /**
   * records for writing: each supbook with the records that followed it,
   * then the extern sheet table. `Ordinal` maps a stable id to its current
   * tab index, or -1 if the sheet is gone. nothing is written if the table
   * was never used.
   */
  public ToRecords(sheet_count: number, Ordinal: (sheet_id: number) => number): BiffRecord[] {

    if (!this.supbooks.length) {
      return [];
    }

    const Tab = (id: number): number => {
      if (id === WORKBOOK_LEVEL) { return WORKBOOK_TAB; }
      const ordinal = id < 0 ? -1 : Ordinal(id);
      return ordinal < 0 ? DELETED_TAB : ordinal;
    };

    const records: BiffRecord[] = [];
    this.supbooks.forEach((supbook, index) => {
      records.push(index === this.internal ? SupBookRecord.Internal(sheet_count) : supbook);
      records.push(...(this.supbook_records[index] || []));
    });

    const entries: XTI[] = this.entries.map(entry => {
      if (entry.supbook === this.internal) {
        return { supbook: entry.supbook, first: Tab(entry.first), last: Tab(entry.last) };
      }
      return { ...entry };
    });

    records.push(new ExternSheetRecord(entries));
    return records;

  }

}
