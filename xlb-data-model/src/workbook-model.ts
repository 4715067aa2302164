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

import { InvalidArgumentError } from 'xlb-base-types';
import { PasswordVerifier } from 'xlb-utils';
import {
  BuiltinCode, FileSharingRecord, QuoteSheetName, SheetVisibility, Window1Record, WriteProtectRecord,
  type PictureAnchor, type PictureFormat, type Ptg,
} from 'xlb-records';
import { DrawingGroup } from './drawing-group';
import { ExternSheetTable } from './extern-sheet';
import { FormulaCompiler, type FormulaContext } from './formula';
import { GlobalLayout } from './globals';
import { NamedRangeManager, RemapNameTokens, type Name } from './named';
import { Sheet, ValidateSheetName } from './sheet';
import { SheetCollection } from './sheet-collection';
import { SheetDrawing } from './sheet-drawing';
import { StyleTable } from './style-table';

/**
 * the workbook. this is the part that keeps things consistent when sheets
 * are added, removed, cloned or moved: names, formulas, extern sheet
 * entries, drawings and the tab selection.
 *
 * sheets are referenced internally by stable ids, and only turned into
 * tab indexes when the workbook is written. so moving a sheet doesn't
 * touch any formula, and removing one only has to mark its extern sheet
 * entries as deleted.
 *
 * the active sheet and the selection live in each sheet's window record;
 * the workbook window (WINDOW1) gets its active tab and selection count
 * when it's written.
 */
export class WorkbookModel implements FormulaContext {

  public readonly sheets = new SheetCollection();

  public readonly extern_sheets = new ExternSheetTable();

  public readonly formulas: FormulaCompiler = new FormulaCompiler(this);

  public readonly names: NamedRangeManager = new NamedRangeManager(this.formulas, this.sheets);

  public styles = StyleTable.Default();

  public readonly drawing_group = new DrawingGroup();

  public window1 = new Window1Record();

  /** both present or both absent */
  public write_protect?: WriteProtectRecord;
  public file_sharing?: FileSharingRecord;

  public layout = GlobalLayout.Default();

  protected next_sheet_id = 1;

  public get sheet_count(): number {
    return this.sheets.length;
  }

  public get name_count(): number {
    return this.names.length;
  }

  public get cell_style_count(): number {
    return this.styles.length;
  }

  // --- sheets ---------------------------------------------------------------

  /**
   * add a sheet at the end. without a name we use the first free
   * `SheetN`. the first sheet in a workbook is active and selected.
   */
  public CreateSheet(name?: string): Sheet {

    if (name === undefined) {
      for (let i = this.sheets.length + 1; ; i++) {
        if (!this.sheets.Find(`Sheet${i}`)) {
          name = `Sheet${i}`;
          break;
        }
      }
    }

    ValidateSheetName(name);
    this.CheckSheetNameUnique(name);

    const sheet = new Sheet(this.next_sheet_id++, name, this.formulas);
    this.sheets.Add(sheet);

    if (this.sheets.length === 1) {
      sheet.window.active = sheet.window.selected = true;
    }

    return sheet;

  }

  /** the importer adds sheets with the ids it assigned */
  public AdoptSheet(sheet: Sheet): void {
    this.sheets.Add(sheet);
    this.next_sheet_id = Math.max(this.next_sheet_id, sheet.id + 1);
  }

  /** a fresh sheet id, for the importer */
  public AllocateSheetId(): number {
    return this.next_sheet_id++;
  }

  public GetSheetAt(ordinal: number): Sheet {
    return this.CheckedSheet(ordinal);
  }

  public GetSheet(name: string): Sheet | undefined {
    return this.sheets.Find(name);
  }

  public GetSheetName(ordinal: number): string {
    return this.CheckedSheet(ordinal).name;
  }

  /** -1 if there's no such sheet */
  public GetSheetIndex(sheet: string | Sheet): number {
    const id = typeof sheet === 'string' ? this.sheets.ID(sheet) : sheet.id;
    return id === undefined ? -1 : this.sheets.Ordinal(id);
  }

  public SetSheetName(ordinal: number, name: string): void {
    const sheet = this.CheckedSheet(ordinal);
    ValidateSheetName(name);
    this.CheckSheetNameUnique(name, sheet);
    sheet.name = name;
    this.sheets.UpdateIndexes();
  }

  public SetSheetVisibility(ordinal: number, visibility: SheetVisibility): void {
    this.CheckedSheet(ordinal).visibility = visibility;
  }

  /**
   * remove a sheet. names scoped to it become workbook-level names (or
   * keep a deleted-sheet scope; see NamedRangeManager.RemoveSheet),
   * references to it become #REF!, and its pictures lose a reference.
   *
   * if it was the active sheet, the sheet that takes its place (or the
   * new last sheet) becomes active. the same goes for the selection, if
   * it was the only selected sheet.
   */
  public RemoveSheetAt(ordinal: number): void {

    const sheet = this.CheckedSheet(ordinal);
    const was_active = sheet.IsActive();
    const was_selected = sheet.IsSelected();

    this.names.RemoveSheet(sheet.id);
    this.extern_sheets.RemoveSheet(sheet.id);
    sheet.drawing?.Release(this.drawing_group);
    this.sheets.Splice(ordinal, 1);

    const count = this.sheets.length;

    if (this.window1.first_visible_tab > ordinal) {
      this.window1.first_visible_tab--;
    }
    this.window1.first_visible_tab = Math.max(0, Math.min(this.window1.first_visible_tab, count - 1));

    if (!count) {
      return;
    }

    const next = Math.min(ordinal, count - 1);

    if (was_selected && !this.sheets.list.some(test => test.IsSelected())) {
      this.SetSelectedTab(next);
    }

    if (was_active) {
      this.SetActiveSheet(next);
    }

    if (count === 1) {
      const [only] = this.sheets.list;
      only.window.active = only.window.selected = true;
    }

  }

  /**
   * remove several sheets. they're removed one at a time, from the last
   * tab to the first, so the indexes refer to the tab order before the
   * call.
   */
  public RemoveSheets(ordinals: number[]): void {
    const unique = Array.from(new Set(ordinals)).sort((a, b) => b - a);
    for (const ordinal of unique) {
      this.CheckedSheet(ordinal);
    }
    for (const ordinal of unique) {
      this.RemoveSheetAt(ordinal);
    }
  }

  /**
   * move a sheet to a new tab position. formulas and names don't change,
   * since they refer to sheets by id. the sheet keeps its active and
   * selected flags.
   */
  public SetSheetOrder(name: string, ordinal: number): void {

    const sheet = this.sheets.Find(name);
    if (!sheet) {
      throw new InvalidArgumentError(`Sheet '${name}' does not exist`);
    }

    if (!Number.isInteger(ordinal) || ordinal < 0 || ordinal >= this.sheets.length) {
      throw new InvalidArgumentError(`Sheet index (${ordinal}) is out of range (0..${this.sheets.length - 1})`);
    }

    this.sheets.Splice(this.sheets.Ordinal(sheet.id), 1);
    this.sheets.Splice(ordinal, 0, sheet);

  }

  /**
   * copy a sheet to the end of the workbook, as `Name (2)` (or the next
   * free number). built-in names scoped to the source (print area, print
   * titles) are copied to the new sheet. the copy is not selected.
   */
  public CloneSheet(ordinal: number): Sheet {

    const source = this.CheckedSheet(ordinal);

    // the drawing copy takes picture references and shape ids, so it
    // comes after anything that can refuse
    const clone = source.Clone(this.next_sheet_id, this.UniqueCloneName(source.name));
    clone.drawing = source.drawing?.Clone(this.drawing_group);

    this.next_sheet_id++;
    this.sheets.Add(clone);

    for (const name of this.names.list) {
      const code = name.record.builtin_code;
      if (name.scope !== source.id || code === undefined) {
        continue;
      }
      const copy = this.names.CreateBuiltin(code, clone.id);
      copy.record.options = name.record.options;
      copy.record.formula = name.definition.map((ptg): Ptg => {
        if ((ptg.type === 'ref3d' || ptg.type === 'area3d') && this.extern_sheets.SheetId(ptg.ixti) === source.id) {
          return { ...ptg, ixti: this.extern_sheets.IndexFor(clone.id) };
        }
        return ptg;
      });
    }

    return clone;

  }

  // --- tabs -----------------------------------------------------------------

  /** -1 only if there are no sheets */
  public GetActiveSheetIndex(): number {
    return this.sheets.list.findIndex(sheet => sheet.IsActive());
  }

  /**
   * exactly one sheet is active. this doesn't change the selection;
   * Excel will select the active sheet when the file is opened.
   */
  public SetActiveSheet(ordinal: number): void {
    this.CheckedSheet(ordinal);
    this.sheets.list.forEach((sheet, index) => sheet.window.active = (index === ordinal));
  }

  public SetSelectedTab(ordinal: number): void {
    this.SetSelectedTabs([ordinal]);
  }

  public SetSelectedTabs(ordinals: number[]): void {
    for (const ordinal of ordinals) {
      this.CheckedSheet(ordinal);
    }
    const set = new Set(ordinals);
    this.sheets.list.forEach((sheet, index) => sheet.window.selected = set.has(index));
  }

  public GetSelectedTabs(): number[] {
    return this.sheets.list.reduce((list: number[], sheet, index) =>
      sheet.IsSelected() ? [...list, index] : list, []);
  }

  public GetFirstVisibleTab(): number {
    return this.window1.first_visible_tab;
  }

  public SetFirstVisibleTab(ordinal: number): void {
    this.CheckedSheet(ordinal);
    this.window1.first_visible_tab = ordinal;
  }

  // --- names ----------------------------------------------------------------

  /** a new name with no text; give it one with SetNameName */
  public CreateName(): Name {
    return this.names.Create();
  }

  public GetNameAt(index: number): Name {
    return this.names.Get(index);
  }

  /**
   * with an ordinal, the name scoped to that sheet. otherwise the
   * workbook-level name, or if there is none, the first name with this
   * text in any scope.
   */
  public GetName(name: string, ordinal?: number): Name | undefined {
    if (ordinal !== undefined) {
      return this.names.Find(name, this.CheckedSheet(ordinal).id);
    }
    return this.names.Find(name) ?? this.names.list.find(test => test.name.toLowerCase() === name.toLowerCase());
  }

  /** index of the first name with this text, in any scope, or -1 */
  public GetNameIndex(name: string): number {
    const lower = name.toLowerCase();
    return this.names.list.findIndex(test => test.name.toLowerCase() === lower);
  }

  /**
   * remove a name. name tokens in cell formulas and other names are
   * renumbered; tokens that pointed at this name become #NAME?.
   */
  public RemoveName(target: number | Name): void {

    const index = typeof target === 'number' ? target : this.names.IndexOf(target);
    if (index < 0) {
      throw new InvalidArgumentError('Name is not in this workbook');
    }

    this.names.Remove(index);

    for (const name of this.names.list) {
      name.record.formula = RemapNameTokens(name.record.formula, index);
    }

    for (const sheet of this.sheets.list) {
      for (const cell of sheet.Cells()) {
        if (cell.type === 'formula') {
          cell.record.formula = RemapNameTokens(cell.record.formula, index);
        }
      }
    }

  }

  /**
   * set the print area, as a reference (`$A$1:$C$10`). without a sheet
   * qualifier it refers to the sheet itself.
   */
  public SetPrintArea(ordinal: number, reference: string): void {

    const sheet = this.CheckedSheet(ordinal);
    const text = reference.includes('!') ? reference : `${QuoteSheetName(sheet.name)}!${reference}`;
    const formula = this.formulas.Compile(text, sheet.id);

    const name = this.names.FindBuiltin(BuiltinCode.PrintArea, sheet.id)
      ?? this.names.CreateBuiltin(BuiltinCode.PrintArea, sheet.id);

    name.record.formula = formula;

  }

  /** print area reference, or undefined if it's not set */
  public GetPrintArea(ordinal: number): string | undefined {
    const name = this.names.FindBuiltin(BuiltinCode.PrintArea, this.CheckedSheet(ordinal).id);
    return name ? name.GetRefersToFormula() : undefined;
  }

  public RemovePrintArea(ordinal: number): void {
    const name = this.names.FindBuiltin(BuiltinCode.PrintArea, this.CheckedSheet(ordinal).id);
    if (name) {
      this.RemoveName(name);
    }
  }

  // --- styles ---------------------------------------------------------------

  /** returns the new XF index */
  public CreateCellStyle(): number {
    return this.styles.Create();
  }

  // --- workbook flags -------------------------------------------------------

  public IsHidden(): boolean {
    return this.window1.hidden;
  }

  public SetHidden(hidden: boolean): void {
    this.window1.hidden = hidden;
  }

  /**
   * mark the workbook write-reserved. Excel will ask for the password
   * (or offer read-only) when the file is opened.
   */
  public WriteProtectWorkbook(password: string, username: string): void {
    this.file_sharing = new FileSharingRecord(PasswordVerifier(password), username, 1);
    this.write_protect = new WriteProtectRecord();
  }

  public UnwriteProtectWorkbook(): void {
    this.file_sharing = undefined;
    this.write_protect = undefined;
  }

  public IsWriteProtected(): boolean {
    return !!this.write_protect;
  }

  /** check a password against the write reservation */
  public ValidateWriteProtectPassword(password: string): boolean {
    return !!this.file_sharing && this.file_sharing.verifier === PasswordVerifier(password);
  }

  // --- pictures -------------------------------------------------------------

  /** add a picture to the workbook's store. returns its 1-based index. */
  public AddPicture(image: Uint8Array, format: PictureFormat): number {
    return this.drawing_group.AddPicture(image, format);
  }

  /**
   * place a stored picture on a sheet. the sheet gets a drawing if it
   * doesn't have one. returns the new shape id.
   */
  public InsertPicture(ordinal: number, picture_index: number, anchor: PictureAnchor): number {
    const sheet = this.CheckedSheet(ordinal);
    this.drawing_group.GetReferenceCount(picture_index);
    sheet.drawing = sheet.drawing ?? SheetDrawing.Create(this.drawing_group);
    return sheet.drawing.InsertPicture(this.drawing_group, picture_index, anchor);
  }

  public GetPictureReferenceCount(picture_index: number): number {
    return this.drawing_group.GetReferenceCount(picture_index);
  }

  // --- internals ------------------------------------------------------------

  protected CheckedSheet(ordinal: number): Sheet {
    const sheet = Number.isInteger(ordinal) ? this.sheets.At(ordinal) : undefined;
    if (!sheet) {
      throw new InvalidArgumentError(this.sheets.length
        ? `Sheet index (${ordinal}) is out of range (0..${this.sheets.length - 1})`
        : `Sheet index (${ordinal}) is out of range (no sheets)`);
    }
    return sheet;
  }

  protected CheckSheetNameUnique(name: string, except?: Sheet): void {
    const existing = this.sheets.Find(name);
    if (existing && existing !== except) {
      throw new InvalidArgumentError(`The workbook already contains a sheet named '${name}'`);
    }
  }

  /**
   * `Name (2)`, or if the source is itself a numbered copy, the next
   * number. the base is shortened if the result would be too long.
   */
  protected UniqueCloneName(source: string): string {

    let base = source;
    let count = 2;

    const match = /^(.*) \((\d+)\)$/.exec(source);
    if (match) {
      base = match[1];
      count = Number(match[2]) + 1;
    }

    for (; ; count++) {
      const suffix = ` (${count})`;
      const name = (base.length + suffix.length > 31 ? base.substring(0, 31 - suffix.length) : base) + suffix;
      if (!this.sheets.Find(name)) {
        return name;
      }
    }

  }

}
