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

import { Area, InvalidArgumentError, InvalidStateError, IsErrorText, type CellValue, type ErrorText } from 'xlb-base-types';
import {
  BOFRecord, CloneRecords, FormulaRecord, SheetVisibility, SubstreamType, Window2Record,
  type BiffRecord, type RecordBase,
} from 'xlb-records';
import { MAX_COLUMN, MAX_ROW } from 'xlb-parser';
import { CellKey, DEFAULT_CELL_XF, type Cell } from './cell';
import type { FormulaCompiler } from './formula';
import type { SheetDrawing } from './sheet-drawing';

/** used range, in the file's terms: last row and column are exclusive */
export interface SheetDimensions {
  first_row: number;
  last_row: number;
  first_column: number;
  last_column: number;
}

/**
 * sheet names: 1 to 31 characters, none of `/\?*:[]`, and no quote at
 * either end.
 */
export const ValidateSheetName = (name: string): void => {
  if (!name.length || name.length > 31) {
    throw new InvalidArgumentError(`Sheet name "${name}" must be between 1 and 31 characters`);
  }
  const match = /[/\\?*:[\]]/.exec(name);
  if (match) {
    throw new InvalidArgumentError(`Invalid char (${match[0]}) found at index (${match.index}) in sheet name '${name}'`);
  }
  if (name[0] === '\'' || name[name.length - 1] === '\'') {
    throw new InvalidArgumentError(`Invalid sheet name '${name}'. Sheet names must not begin or end with (').`);
  }
};

/**
 * one sheet. cells are held in a map; everything else in the sheet's
 * block is kept as records, in runs around the cells: `head` (before the
 * cell table), `rows` (row heights and formats), `body` (after the cells),
 * then the drawing, `notes` (records between the drawing and the window,
 * usually comments) and `tail` (after the window).
 *
 * chart and macro sheets are not interpreted. their records are kept in
 * `preserved` and written back as they are.
 *
 * `id` is stable for the life of the model and survives reordering;
 * formulas and names refer to sheets by id. `window` carries the
 * selected and active flags.
 */
export class Sheet {

  public visibility: SheetVisibility = SheetVisibility.Visible;

  /** BOUNDSHEET sheet type: 0 worksheet, 1 macro sheet, 2 chart */
  public sheet_type = 0;

  public bof = new BOFRecord(SubstreamType.Worksheet);

  public head: BiffRecord[] = [];
  public rows: BiffRecord[] = [];
  public body: BiffRecord[] = [];
  public notes: BiffRecord[] = [];
  public tail: BiffRecord[] = [];

  /** everything between BOF and EOF, for sheets we don't interpret */
  public preserved?: BiffRecord[];

  public window = new Window2Record();

  public drawing?: SheetDrawing;

  protected cells: Map<number, Cell> = new Map();

  constructor(
    public readonly id: number,
    public name: string,
    protected readonly formulas: FormulaCompiler) {
    this.window.selected = false;
    this.window.active = false;
  }

  public IsActive(): boolean {
    return this.window.active;
  }

  public IsSelected(): boolean {
    return this.window.selected;
  }

  public get hidden(): boolean {
    return this.visibility !== SheetVisibility.Visible;
  }

  /** first row with a cell, or undefined if the sheet is empty */
  public get first_row(): number | undefined {
    return this.Dimensions()?.first_row;
  }

  /** last row with a cell, or undefined if the sheet is empty */
  public get last_row(): number | undefined {
    const dimensions = this.Dimensions();
    return dimensions ? dimensions.last_row - 1 : undefined;
  }

  public get cell_count(): number {
    return this.cells.size;
  }

  /** cells in row-major order */
  public Cells(): Cell[] {
    return Array.from(this.cells.keys()).sort((a, b) => a - b).map(key => this.cells.get(key)).filter((cell): cell is Cell => !!cell);
  }

  public GetCell(row: number, column: number): Cell | undefined {
    return this.cells.get(CellKey(row, column));
  }

  /** literal value, or the cached result of a formula */
  public GetCellValue(row: number, column: number): CellValue {
    const cell = this.GetCell(row, column);
    switch (cell?.type) {
      case 'number':
      case 'string':
      case 'boolean':
        return cell.value;
      case 'error':
        return { error: cell.value };
      case 'formula': {
        const result = cell.record.result;
        switch (result.type) {
          case 'number': return result.value;
          case 'bool': return result.value;
          case 'string': return cell.cached_string ?? '';
          default: return undefined;
        }
      }
    }
    return undefined;
  }

  /**
   * set a literal value. strings that look like error values (`#N/A`)
   * are stored as errors.
   */
  public SetCellValue(row: number, column: number, value: number | string | boolean | ErrorText, xf = DEFAULT_CELL_XF): void {
    this.CheckAddress(row, column);
    const base = { row, column, xf };
    if (typeof value === 'number') {
      this.PutCell({ ...base, type: 'number', value });
    }
    else if (typeof value === 'boolean') {
      this.PutCell({ ...base, type: 'boolean', value });
    }
    else if (IsErrorText(value)) {
      this.PutCell({ ...base, type: 'error', value });
    }
    else {
      this.PutCell({ ...base, type: 'string', value });
    }
  }

  public SetCellBlank(row: number, column: number, xf = DEFAULT_CELL_XF): void {
    this.CheckAddress(row, column);
    this.PutCell({ row, column, xf, type: 'blank' });
  }

  /**
   * set a formula (with or without the leading `=`). the formula is
   * compiled here, so references to unknown sheets or names, and unknown
   * functions, throw. the cached result is empty; the workbook is
   * recalculated when it's opened.
   */
  public SetCellFormula(row: number, column: number, formula: string, xf = DEFAULT_CELL_XF): void {
    this.CheckAddress(row, column);
    const record = new FormulaRecord(row, column, xf, this.formulas.Compile(formula, this.id));
    this.PutCell({ row, column, xf, type: 'formula', record, attached: [] });
  }

  /** formula text, without a leading `=`. undefined if this is not a formula cell. */
  public GetCellFormula(row: number, column: number): string | undefined {
    const cell = this.GetCell(row, column);
    return cell?.type === 'formula' ? this.formulas.Render(cell.record.formula) : undefined;
  }

  public RemoveCell(row: number, column: number): boolean {
    return this.cells.delete(CellKey(row, column));
  }

  /** add or replace, no checks. the importer uses this directly. */
  public PutCell(cell: Cell): void {
    this.cells.set(CellKey(cell.row, cell.column), cell);
  }

  /** used range, or undefined if there are no cells */
  public Dimensions(): SheetDimensions | undefined {

    let area: Area | undefined;

    for (const { row, column } of this.cells.values()) {
      if (area) {
        area.ConsumeAddress({ row, column });
      }
      else {
        area = new Area({ row, column });
      }
    }

    if (!area) {
      return undefined;
    }

    const { start, end } = area;
    return { first_row: start.row, last_row: end.row + 1, first_column: start.column, last_column: end.column + 1 };

  }

  /**
   * deep copy, except for the drawing: that needs the drawing group, so
   * the model handles it. the copy is neither selected nor active.
   */
  public Clone(id: number, name: string): Sheet {

    const clone = new Sheet(id, name, this.formulas);

    if (this.preserved) {
      throw new InvalidStateError(`Sheet '${this.name}' is a chart or macro sheet and can't be cloned`);
    }

    clone.visibility = this.visibility;
    clone.sheet_type = this.sheet_type;
    clone.bof = this.CloneOne(this.bof, BOFRecord);
    clone.head = CloneRecords(this.head);
    clone.rows = CloneRecords(this.rows);
    clone.body = CloneRecords(this.body);
    clone.notes = CloneRecords(this.notes);
    clone.tail = CloneRecords(this.tail);
    clone.window = this.window.Clone();
    clone.window.selected = false;
    clone.window.active = false;

    for (const cell of this.cells.values()) {
      if (cell.type === 'formula') {
        clone.PutCell({
          ...cell,
          record: this.CloneOne(cell.record, FormulaRecord),
          attached: CloneRecords(cell.attached),
        });
      }
      else {
        clone.PutCell({ ...cell });
      }
    }

    return clone;

  }

  protected CloneOne<T extends BiffRecord>(record: RecordBase, type: new (...args: never[]) => T): T {
    const [copy] = CloneRecords([record]);
    if (!(copy instanceof type)) {
      throw new InvalidArgumentError(`record 0x${record.sid.toString(16)} did not survive a copy`);
    }
    return copy;
  }

  protected CheckAddress(row: number, column: number): void {
    if (!Number.isInteger(row) || row < 0 || row > MAX_ROW) {
      throw new InvalidArgumentError(`Invalid row number (${row}) outside allowable range (0..${MAX_ROW})`);
    }
    if (!Number.isInteger(column) || column < 0 || column > MAX_COLUMN) {
      throw new InvalidArgumentError(`Invalid column index (${column}).  Allowable column range for BIFF8 is (0..${MAX_COLUMN})`);
    }
  }

}
