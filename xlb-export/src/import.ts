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

import { ErrorCodeToText, FormatError } from 'xlb-base-types';
import { ByteReader } from 'xlb-utils';
import {
  BIFF8_VERSION, BOFRecord, BlankRecord, BoolErrRecord, BoundSheetRecord, DimensionsRecord,
  ExternSheetRecord, FileSharingRecord, FormulaRecord, LabelRecord, LabelSSTRecord,
  MsoDrawingGroupRecord, MulRKRecord, NameRecord, NumberRecord, ParseRecord, RKRecord, SSTRecord,
  Sid, SplitRecords, StringRecord, SubstreamType, SupBookRecord, TabIdRecord, UnknownRecord,
  Window1Record, Window2Record, WriteProtectRecord, XFRecord, DecodeRK,
  type BiffRecord, type DecodeOptions,
} from 'xlb-records';
import {
  GlobalLayout, Sheet, SheetDrawing, WorkbookModel, slot_order,
  type FormulaCell, type GlobalEntry, type GlobalSlot,
} from 'xlb-data-model';

/** positional indexes into the stream. they go stale on any edit. */
const dropped_records = new Set<number>([Sid.INDEX, Sid.DBCELL, Sid.EXTSST]);

/** records that belong to the formula before them */
const formula_records = new Set<number>([Sid.SHRFMLA, Sid.ARRAY, Sid.TABLE]);

/** records that make up a sheet's drawing */
const drawing_records = new Set<number>([Sid.MSODRAWING, Sid.OBJ, Sid.TXO]);

/** records that follow an external supbook */
const link_records = new Set<number>([Sid.EXTERNNAME, Sid.XCT, Sid.CRN]);

/** index of the EOF that closes the substream starting at `start` */
const SubstreamEnd = (records: BiffRecord[], start: number): number => {
  let depth = 0;
  for (let i = start; i < records.length; i++) {
    if (records[i] instanceof BOFRecord) {
      depth++;
    }
    else if (records[i].sid === Sid.EOF && --depth === 0) {
      return i;
    }
  }
  throw new FormatError('corrupt', `Substream starting at record ${start} has no EOF`);
};

const Concat = (chunks: Uint8Array[]): Uint8Array => {
  const result = new Uint8Array(chunks.reduce((sum, chunk) => sum + chunk.length, 0));
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
};

/** global tables that can't be loaded until sheets have ids */
interface GlobalTables {
  boundsheets: BoundSheetRecord[];
  names: NameRecord[];
  supbooks: SupBookRecord[];
  supbook_records: BiffRecord[][];
  externsheet?: ExternSheetRecord;
}

/**
 * builds a model from a workbook stream. globals go into the model's
 * tables, with placeholders where they sat in the stream; each sheet's
 * block is split into cells, the drawing, and the records around them.
 */
export class Importer {

  public model = new WorkbookModel();

  /** shared strings from the file, for LABELSST cells */
  protected strings: string[] = [];

  /** the last formula cell, which STRING and SHRFMLA records attach to */
  protected formula?: FormulaCell;

  constructor(protected readonly options: Partial<DecodeOptions> = {}) {}

  public Import(stream: Uint8Array): WorkbookModel {

    const raw = SplitRecords(stream, this.options);
    const records = raw.map(record => ParseRecord(record));

    const bof = records[0];
    if (!(bof instanceof BOFRecord) || bof.substream !== SubstreamType.Globals) {
      throw new FormatError('corrupt', 'The workbook stream does not start with a globals BOF record');
    }

    if (bof.version < BIFF8_VERSION) {
      throw new FormatError('biff5',
        `The supplied workbook is in BIFF5 format (version 0x${bof.version.toString(16)}). Only BIFF8 workbooks (Excel 97 and later) are supported`);
    }

    const globals_end = SubstreamEnd(records, 0);
    const tables = this.ImportGlobals(records.slice(0, globals_end + 1));
    const { boundsheets } = tables;

    // stable ids, in tab order. names and extern sheet entries hold ids,
    // not tab indexes.

    const sheet_ids = boundsheets.map(() => this.model.AllocateSheetId());
    const SheetId = (ordinal: number): number | undefined => sheet_ids[ordinal];

    this.model.extern_sheets.Load(tables.supbooks, tables.externsheet, SheetId, tables.supbook_records);
    this.model.names.Load(tables.names, SheetId);

    boundsheets.forEach((bound, ordinal) => {

      const start = raw.findIndex(test => test.offset === bound.position);
      const sheet_bof = records[start];

      if (start <= globals_end || !(sheet_bof instanceof BOFRecord)) {
        throw new FormatError('corrupt', `Sheet '${bound.name}' does not start at offset ${bound.position}`);
      }

      const end = SubstreamEnd(records, start);
      const sheet = new Sheet(sheet_ids[ordinal], bound.name, this.model.formulas);

      sheet.bof = sheet_bof;
      sheet.visibility = bound.visibility;
      sheet.sheet_type = bound.sheet_type;

      const inner = records.slice(start + 1, end);

      if (sheet_bof.substream === SubstreamType.Worksheet) {
        this.ImportSheet(sheet, inner);
      }
      else {
        sheet.preserved = inner;
        const window = inner.find((record): record is Window2Record => record instanceof Window2Record);
        if (window) {
          sheet.window = window;
        }
      }

      this.model.AdoptSheet(sheet);

    });

    this.ImportSelection();
    return this.model;

  }

  /**
   * the globals substream. tables go into the model; everything else stays
   * in the layout, in order. tables that refer to sheets are returned.
   */
  protected ImportGlobals(records: BiffRecord[]): GlobalTables {

    const { model } = this;

    const entries: GlobalEntry[] = [];
    const Slot = (slot: GlobalSlot) => {
      if (!entries.some(entry => 'slot' in entry && entry.slot === slot)) {
        entries.push({ slot });
      }
    };

    const boundsheets: BoundSheetRecord[] = [];
    const xfs: XFRecord[] = [];
    const names: NameRecord[] = [];
    const supbooks: SupBookRecord[] = [];
    const supbook_records: BiffRecord[][] = [];
    const drawing_group: Uint8Array[] = [];

    let externsheet: ExternSheetRecord | undefined;
    let window1: Window1Record | undefined;
    let linking = false;
    let dropped = 0;

    for (const record of records) {

      if (record.sid === Sid.FILEPASS) {
        throw new FormatError('encrypted', 'The workbook is encrypted. Encrypted workbooks are not supported');
      }

      const following_supbook: boolean = linking && link_records.has(record.sid);
      linking = following_supbook || record instanceof SupBookRecord;

      if (following_supbook) {
        supbook_records[supbook_records.length - 1].push(record);
      }
      else if (dropped_records.has(record.sid)) {
        dropped++;
      }
      else if (record instanceof XFRecord) {
        Slot('styles');
        xfs.push(record);
      }
      else if (record instanceof BoundSheetRecord) {
        Slot('boundsheets');
        boundsheets.push(record);
      }
      else if (record instanceof SupBookRecord) {
        Slot('links');
        supbooks.push(record);
        supbook_records.push([]);
      }
      else if (record instanceof ExternSheetRecord) {
        Slot('links');
        externsheet = record;
      }
      else if (record instanceof NameRecord) {
        Slot('names');
        names.push(record);
      }
      else if (record instanceof MsoDrawingGroupRecord) {
        Slot('drawing-group');
        drawing_group.push(record.data);
      }
      else if (record instanceof SSTRecord) {
        Slot('sst');
        this.strings = record.strings;
      }
      else if (record instanceof Window1Record && !window1) {
        Slot('window1');
        window1 = record;
      }
      else if (record instanceof WriteProtectRecord) {
        Slot('write-protect');
        model.write_protect = record;
      }
      else if (record instanceof FileSharingRecord) {
        Slot('file-sharing');
        model.file_sharing = record;
      }
      else if (record instanceof TabIdRecord) {
        Slot('tabid');
      }
      else {
        entries.push({ record });
      }

    }

    if (dropped) {
      console.info(`dropped ${dropped} stale index record(s) from the workbook globals`);
    }

    model.layout = new GlobalLayout(entries);
    for (const slot of slot_order) {
      model.layout.Ensure(slot);
    }

    if (window1) {
      model.window1 = window1;
    }

    if (xfs.length) {
      model.styles.Load(xfs);
    }

    if (drawing_group.length) {
      model.drawing_group.Load(Concat(drawing_group));
    }

    return { boundsheets, names, supbooks, supbook_records, externsheet };

  }

  /**
   * a worksheet's block, between BOF and EOF:
   *
   *   head, DIMENSIONS, rows and cells, body, drawing, notes, WINDOW2, tail
   *
   * DIMENSIONS is regenerated on write; INDEX and DBCELL are dropped.
   */
  protected ImportSheet(sheet: Sheet, records: BiffRecord[]): void {

    type Phase = 'head' | 'body' | 'drawing' | 'notes' | 'tail';

    let phase: Phase = 'head';
    let window: Window2Record | undefined;
    let dropped = 0;
    const drawing: BiffRecord[] = [];

    this.formula = undefined;

    for (let i = 0; i < records.length; i++) {

      const record = records[i];

      // embedded charts are substreams inside the drawing

      if (record instanceof BOFRecord) {
        const end = SubstreamEnd(records, i);
        const substream = records.slice(i, end + 1);
        i = end;
        if (phase === 'tail') {
          sheet.tail.push(...substream);
        }
        else {
          drawing.push(...substream);
          phase = 'drawing';
        }
        continue;
      }

      if (dropped_records.has(record.sid)) {
        dropped++;
        continue;
      }

      if (phase === 'tail') {
        sheet.tail.push(record);
        continue;
      }

      if (record instanceof Window2Record) {
        window = record;
        phase = 'tail';
        continue;
      }

      if (record instanceof DimensionsRecord) {
        phase = phase === 'head' ? 'body' : phase;
        continue;
      }

      if (record.sid === Sid.ROW) {
        sheet.rows.push(record);
        phase = phase === 'head' ? 'body' : phase;
        continue;
      }

      if (this.ImportCell(sheet, record)) {
        phase = phase === 'head' ? 'body' : phase;
        continue;
      }

      if (drawing_records.has(record.sid) && phase !== 'notes') {
        drawing.push(record);
        phase = 'drawing';
        continue;
      }

      switch (phase) {
        case 'head':
          sheet.head.push(record);
          break;
        case 'body':
          sheet.body.push(record);
          break;
        default:
          sheet.notes.push(record);
          phase = 'notes';
          break;
      }

    }

    if (dropped) {
      console.info(`dropped ${dropped} stale index record(s) from sheet '${sheet.name}'`);
    }

    if (window) {
      sheet.window = window;
    }

    if (drawing.length) {
      sheet.drawing = SheetDrawing.FromRecords(drawing);
    }

  }

  /** returns false if this is not a cell record */
  protected ImportCell(sheet: Sheet, record: BiffRecord): boolean {

    if (record instanceof StringRecord || formula_records.has(record.sid)) {
      if (!this.formula) {
        return false;
      }
      if (record instanceof StringRecord) {
        this.formula.cached_string = record.value;
      }
      else {
        this.formula.attached.push(record);
      }
      return true;
    }

    if (record instanceof FormulaRecord) {
      this.formula = {
        type: 'formula', row: record.row, column: record.column, xf: record.xf, record, attached: [],
      };
      sheet.PutCell(this.formula);
      return true;
    }

    this.formula = undefined;

    if (record instanceof NumberRecord || record instanceof RKRecord) {
      sheet.PutCell({ type: 'number', row: record.row, column: record.column, xf: record.xf, value: record.value });
    }
    else if (record instanceof MulRKRecord) {
      for (const cell of record.cells) {
        sheet.PutCell({ type: 'number', row: record.row, column: cell.column, xf: cell.xf, value: DecodeRK(cell.rk) });
      }
    }
    else if (record instanceof LabelRecord) {
      sheet.PutCell({ type: 'string', row: record.row, column: record.column, xf: record.xf, value: record.value });
    }
    else if (record instanceof LabelSSTRecord) {
      const value = this.strings[record.index];
      if (value === undefined) {
        throw new FormatError('corrupt',
          `Cell (${record.row}, ${record.column}) on sheet '${sheet.name}' refers to shared string ${record.index}, but the table has ${this.strings.length}`);
      }
      sheet.PutCell({ type: 'string', row: record.row, column: record.column, xf: record.xf, value });
    }
    else if (record instanceof BlankRecord) {
      sheet.PutCell({ type: 'blank', row: record.row, column: record.column, xf: record.xf });
    }
    else if (record instanceof BoolErrRecord) {
      if (record.is_error) {
        sheet.PutCell({ type: 'error', row: record.row, column: record.column, xf: record.xf, value: ErrorCodeToText(record.value) });
      }
      else {
        sheet.PutCell({ type: 'boolean', row: record.row, column: record.column, xf: record.xf, value: record.value !== 0 });
      }
    }
    else if (record instanceof UnknownRecord && record.sid === Sid.MULBLANK) {

      // row, first column, one xf per cell, last column
      const length = record.data.length;
      if (length < 8 || length % 2) {
        throw new FormatError('corrupt', `MULBLANK record on sheet '${sheet.name}' has an invalid length (${length})`);
      }

      const reader = new ByteReader(record.data);
      const row = reader.ReadUInt16();
      const first = reader.ReadUInt16();
      const count = (length - 6) / 2;
      const xfs: number[] = [];
      for (let i = 0; i < count; i++) {
        xfs.push(reader.ReadUInt16());
      }

      const last = reader.ReadUInt16();
      if (last !== first + count - 1) {
        throw new FormatError('corrupt',
          `MULBLANK record on sheet '${sheet.name}' covers columns ${first}..${last} but holds ${count} cells`);
      }

      xfs.forEach((xf, index) => sheet.PutCell({ type: 'blank', row, column: first + index, xf }));

    }
    else {
      return false;
    }

    return true;

  }

  /**
   * the workbook window says which tab is active; each sheet's window says
   * whether it's selected. we keep the active flag on the sheet, so copy
   * it there. if nothing is selected, select the active sheet.
   */
  protected ImportSelection(): void {

    const sheets = this.model.sheets.list;
    if (!sheets.length) {
      return;
    }

    const active_tab = this.model.window1.active_tab < sheets.length ? this.model.window1.active_tab : 0;
    sheets.forEach((sheet, index) => sheet.window.active = (index === active_tab));

    if (!sheets.some(sheet => sheet.IsSelected())) {
      sheets[active_tab].window.selected = true;
    }

  }

}
