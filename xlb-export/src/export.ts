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

import { ErrorCodes } from 'xlb-base-types';
import {
  BlankRecord, BoolErrRecord, BoundSheetRecord, DimensionsRecord, EOFRecord, EncodeRecords,
  LabelSSTRecord, NumberRecord, StringRecord, TabIdRecord,
  type RecordBase,
} from 'xlb-records';
import { CheckSheetSize, type Cell, type GlobalSlot, type Sheet, type WorkbookModel } from 'xlb-data-model';
import { SharedStrings } from './shared-strings';

interface SheetBlock {
  records: RecordBase[];
  size: number;
}

/**
 * writes a model out as a workbook stream.
 *
 * sheet blocks are built first (that fills the shared string table), and
 * each one is checked: BOUNDSHEET offsets are computed from declared
 * sizes before anything is written. then the globals are expanded from
 * the layout, the offsets filled in, and the whole thing encoded.
 */
export class Exporter {

  constructor(protected readonly model: WorkbookModel) {}

  public Export(): Uint8Array {

    const { model } = this;
    const sheets = model.sheets.list;
    const strings = new SharedStrings();

    const blocks: SheetBlock[] = sheets.map((sheet, index) => {
      const records = this.SheetRecords(sheet, strings);
      return { records, size: CheckSheetSize(records, index) };
    });

    const boundsheets = sheets.map(sheet => new BoundSheetRecord(sheet.name, 0, sheet.visibility, sheet.sheet_type));
    const globals = model.layout.entries.flatMap(entry =>
      'slot' in entry ? this.SlotRecords(entry.slot, boundsheets, strings) : [entry.record]);

    let offset = globals.reduce((sum, record) => sum + record.RecordSize(), 0);
    blocks.forEach((block, index) => {
      boundsheets[index].position = offset;
      offset += block.size;
    });

    return EncodeRecords([...globals, ...blocks.flatMap(block => block.records)]);

  }

  /** model-owned records for one slot in the globals */
  protected SlotRecords(slot: GlobalSlot, boundsheets: BoundSheetRecord[], strings: SharedStrings): RecordBase[] {

    const { model } = this;

    switch (slot) {

      case 'write-protect':
        return model.write_protect ? [model.write_protect] : [];

      case 'file-sharing':
        return model.file_sharing ? [model.file_sharing] : [];

      case 'tabid':
        return boundsheets.length ? [new TabIdRecord(boundsheets.map((_, index) => index + 1))] : [];

      case 'window1': {
        const window = model.window1;
        window.active_tab = Math.max(0, model.GetActiveSheetIndex());
        window.selected_count = Math.max(1, model.GetSelectedTabs().length);
        window.first_visible_tab = Math.max(0, Math.min(window.first_visible_tab, boundsheets.length - 1));
        return [window];
      }

      case 'styles':
        return model.styles.records;

      case 'boundsheets':
        return boundsheets;

      case 'links':
        return model.extern_sheets.ToRecords(boundsheets.length, id => model.sheets.Ordinal(id));

      case 'names':
        return model.names.ToRecords();

      case 'drawing-group': {
        const record = model.drawing_group.ToRecord();
        return record ? [record] : [];
      }

      case 'sst':
        return [strings.ToRecord()];

    }

  }

  protected SheetRecords(sheet: Sheet, strings: SharedStrings): RecordBase[] {

    if (sheet.preserved) {
      return [sheet.bof, ...sheet.preserved, new EOFRecord()];
    }

    const dimensions = sheet.Dimensions();

    return [
      sheet.bof,
      ...sheet.head,
      new DimensionsRecord(
        dimensions?.first_row ?? 0, dimensions?.last_row ?? 0,
        dimensions?.first_column ?? 0, dimensions?.last_column ?? 0),
      ...sheet.rows,
      ...sheet.Cells().flatMap(cell => this.CellRecords(cell, strings)),
      ...sheet.body,
      ...(sheet.drawing?.ToRecords() || []),
      ...sheet.notes,
      sheet.window,
      ...sheet.tail,
      new EOFRecord(),
    ];

  }

  /**
   * numbers are always written as NUMBER (not RK). a formula is followed
   * by any shared formula or array record that came with it, then by its
   * cached string result.
   */
  protected CellRecords(cell: Cell, strings: SharedStrings): RecordBase[] {

    const { row, column, xf } = cell;

    switch (cell.type) {

      case 'number':
        return [new NumberRecord(row, column, xf, cell.value)];

      case 'string':
        return [new LabelSSTRecord(row, column, xf, strings.Ensure(cell.value))];

      case 'boolean':
        return [new BoolErrRecord(row, column, xf, cell.value ? 1 : 0, false)];

      case 'error':
        return [new BoolErrRecord(row, column, xf, ErrorCodes[cell.value], true)];

      case 'blank':
        return [new BlankRecord(row, column, xf)];

      case 'formula': {
        const record = cell.record;
        record.row = row;
        record.column = column;
        record.xf = xf;
        return [
          record,
          ...cell.attached,
          ...(record.result.type === 'string' ? [new StringRecord(cell.cached_string ?? '')] : []),
        ];
      }

    }

  }

}
