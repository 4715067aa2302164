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

import { ErrorCodes, InvalidArgumentError, InvalidStateError } from 'xlb-base-types';
import { NameFlags, NameRecord, type Ptg } from 'xlb-records';
import type { FormulaCompiler } from './formula';
import type { SheetCollection } from './sheet-collection';

/** scope of a name whose sheet was removed */
export const DELETED_SHEET_SCOPE = -1;

/**
 * handle for a defined name. the record holds the name, flags and the
 * token definition; `scope` is the stable id of the owning sheet, or
 * undefined for a workbook-level name.
 */
export class Name {

  constructor(
    protected readonly manager: NamedRangeManager,
    public readonly record: NameRecord,
    public scope?: number) {}

  /** canonical name. built-ins render with their well-known names. */
  public get name(): string {
    return this.record.display_name;
  }

  public get builtin(): boolean {
    return this.record.builtin;
  }

  /** scoped to a sheet that no longer exists */
  public get orphaned(): boolean {
    return this.scope === DELETED_SHEET_SCOPE;
  }

  public get hidden(): boolean {
    return (this.record.options & NameFlags.Hidden) !== 0;
  }

  public get definition(): Ptg[] {
    return this.record.formula;
  }

  public SetNameName(name: string): void {
    this.manager.Rename(this, name);
  }

  /** ordinal of the scope sheet, or -1 for a workbook-level name */
  public GetSheetIndex(): number {
    return this.manager.ScopeOrdinal(this);
  }

  /** pass -1 for a workbook-level name */
  public SetSheetIndex(ordinal: number): void {
    this.manager.Rescope(this, ordinal);
  }

  public SetRefersToFormula(formula: string): void {
    this.record.formula = this.manager.compiler.Compile(formula, this.scope);
  }

  public GetRefersToFormula(): string {
    return this.manager.compiler.Render(this.record.formula);
  }

}

/**
 * defined names. names are case-insensitive and unique within a scope;
 * the same name can exist at workbook level and on any number of sheets.
 *
 * the list is ordered: name tokens in formulas refer to names by 1-based
 * position in this list. the map is keyed `scope:name` (or just `name`
 * for workbook-level names) with normalized names, so we can look up the
 * scoped version first and then fall back to the global one.
 */
export class NamedRangeManager {

  protected names_: Name[] = [];

  protected named: Map<string, Name> = new Map();

  constructor(
    public readonly compiler: FormulaCompiler,
    protected readonly sheets: SheetCollection) {}

  public get list(): Name[] {
    return this.names_.slice(0);
  }

  public get length(): number {
    return this.names_.length;
  }

  /** no checks; undefined if out of range */
  public At(index: number): Name | undefined {
    return this.names_[index];
  }

  /**
   * lookup by index. an empty table is a state error, regardless of the
   * index; otherwise an out-of-range index is an argument error.
   */
  public Get(index: number): Name {
    if (!this.names_.length) {
      throw new InvalidStateError('There are no defined names in this workbook');
    }
    const name = this.names_[index];
    if (!name) {
      throw new InvalidArgumentError(
        `Specified name index ${index} is outside the allowable range (0..${this.names_.length - 1})`);
    }
    return name;
  }

  public IndexOf(name: Name): number {
    return this.names_.indexOf(name);
  }

  /** exact match in one scope */
  public Find(name: string, scope?: number): Name | undefined {
    return this.named.get(this.ScopedName(name, scope));
  }

  /**
   * scoped version first; if that's not found, the global version. if
   * there are both, we prefer the scoped name.
   */
  public Lookup(name: string, scope?: number): Name | undefined {
    if (typeof scope === 'number') {
      return this.named.get(this.ScopedName(name, scope)) || this.named.get(this.ScopedName(name));
    }
    return this.named.get(this.ScopedName(name));
  }

  /** a built-in name for a sheet (print area, print titles) */
  public FindBuiltin(code: number, scope: number): Name | undefined {
    return this.names_.find(test => test.record.builtin_code === code && test.scope === scope);
  }

  /** load names from the file. `SheetId` maps a 0-based tab index to a stable id. */
  public Load(records: NameRecord[], SheetId: (ordinal: number) => number | undefined): void {
    this.names_ = records.map(record =>
      new Name(this, record, record.scope ? SheetId(record.scope - 1) : undefined));
    this.UpdateIndexes();
  }

  /**
   * add a name with no text. it can't be found by name until it gets one,
   * but it occupies an index.
   */
  public Create(): Name {
    const name = new Name(this, new NameRecord());
    this.names_.push(name);
    return name;
  }

  public CreateBuiltin(code: number, scope: number): Name {
    const name = new Name(this, NameRecord.Builtin(code, 0), scope);
    this.names_.push(name);
    this.UpdateIndexes();
    return name;
  }

  /**
   * remove by index. returns the removed name. callers are responsible
   * for fixing name tokens that point past it (see RemapNameTokens).
   */
  public Remove(index: number): Name {
    const name = this.Get(index);
    this.names_.splice(index, 1);
    this.UpdateIndexes();
    return name;
  }

  public Rename(name: Name, text: string): void {

    if (name.builtin) {
      throw new InvalidArgumentError(`Built-in name ${name.name} can't be renamed`);
    }

    if (!this.ValidateNamed(text)) {
      throw new InvalidArgumentError(`Invalid name: "${text}"`);
    }

    this.CheckDuplicate(name, text.trim(), name.scope);
    name.record.name = text.trim();
    this.UpdateIndexes();

  }

  public ScopeOrdinal(name: Name): number {
    return name.scope === undefined ? -1 : this.sheets.Ordinal(name.scope);
  }

  public Rescope(name: Name, ordinal: number): void {

    let scope: number | undefined;

    if (ordinal >= 0) {
      const sheet = this.sheets.At(ordinal);
      if (!sheet) {
        throw new InvalidArgumentError(`Sheet index (${ordinal}) is out of range (0..${this.sheets.length - 1})`);
      }
      scope = sheet.id;
    }

    if (name.record.name) {
      this.CheckDuplicate(name, name.name, scope);
    }

    name.scope = scope;
    this.UpdateIndexes();

  }

  /**
   * a sheet is going away. names scoped to it become workbook-level
   * names. built-ins (which only make sense on a sheet), and names whose
   * text is already taken at workbook level, stay in the list with the
   * deleted-sheet scope instead. either way the entry and its index
   * survive, so name tokens elsewhere still point at it.
   */
  public RemoveSheet(sheet_id: number): void {

    for (const name of this.names_) {
      if (name.scope !== sheet_id) { continue; }
      if (name.builtin || this.named.has(this.ScopedName(name.name))) {
        name.scope = DELETED_SHEET_SCOPE;
      }
      else {
        name.scope = undefined;
        this.named.set(this.ScopedName(name.name), name);
      }
    }

    this.UpdateIndexes();

  }

  /**
   * records for writing, with scopes converted to 1-based tab indexes.
   * there's no tab index for a deleted sheet, so those names are written
   * at workbook level.
   */
  public ToRecords(): NameRecord[] {
    return this.names_.map(name => {
      const ordinal = name.scope === undefined ? -1 : this.sheets.Ordinal(name.scope);
      name.record.scope = ordinal + 1;
      return name.record;
    });
  }

  /**
   * name rules:
   *
   * - legal characters are alphanumeric, underscore, dot, backslash and
   *   question mark (not in first position).
   *
   * - must start with a letter, underscore or backslash.
   *
   * - cannot look like a cell address (1-3 letters followed by a row
   *   number) or an R1C1 address. R and C on their own are illegal.
   *
   * - at most 255 characters.
   *
   * returns a normalized name (just caps, atm) or false.
   */
  public ValidateNamed(name: string): string | false {

    // normalize
    name = name.trim().toUpperCase();

    if (!name.length || name.length > 255) return false;

    // can only contain legal characters
    if (/[^A-Z\d_.?\\\u00c0-\uffff]/.test(name)) return false;

    // must start with a letter, underscore or backslash
    if (/^[\d.?]/.test(name)) return false;

    if (name === 'R' || name === 'C') {
      return false;
    }

    // can't look like a spreadsheet address
    if (/^[A-Z]{1,3}\d+$/.test(name)) return false;

    // can't look like R1C1 either
    if (/^R\d*C\d*$/.test(name)) return false;

    return name;

  }

  protected CheckDuplicate(name: Name, text: string, scope?: number): void {
    const existing = this.named.get(this.ScopedName(text, scope));
    if (existing && existing !== name) {
      throw new InvalidArgumentError(
        `The ${scope === undefined ? 'workbook' : 'sheet'} already contains this name: ${text}`);
    }
  }

  protected ScopedName(name: string, scope?: number): string {
    if (typeof scope === 'number') {
      return scope + ':' + name.toLowerCase();
    }
    return name.toLowerCase();
  }

  protected UpdateIndexes(): void {
    this.named.clear();
    for (const name of this.names_) {
      if (name.record.name) {
        this.named.set(this.ScopedName(name.name, name.scope), name);
      }
    }
  }

}

/**
 * after removing the name at (0-based) `removed`, fix name tokens: later
 * names move down by one, and references to the removed name become a
 * #NAME? error.
 */
export const RemapNameTokens = (ptgs: Ptg[], removed: number): Ptg[] => {
  const removed_index = removed + 1;
  return ptgs.map((ptg): Ptg => {
    if (ptg.type !== 'name') {
      return ptg;
    }
    if (ptg.index === removed_index) {
      return { type: 'error', code: ErrorCodes['#NAME?'] };
    }
    if (ptg.index > removed_index) {
      return { ...ptg, index: ptg.index - 1 };
    }
    return ptg;
  });
};
