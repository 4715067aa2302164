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

import { FormatError } from 'xlb-base-types';
import { Sid } from './sid';
import {
  BOFRecord, BoundSheetRecord, EOFRecord, ExternSheetRecord, FileSharingRecord,
  MsoDrawingGroupRecord, SupBookRecord, TabIdRecord, Window1Record, WriteProtectRecord, XFRecord,
} from './records/globals';
import { NameRecord } from './records/name';
import { SSTRecord } from './records/sst';
import {
  BlankRecord, BoolErrRecord, FormulaRecord, LabelRecord, LabelSSTRecord,
  MulRKRecord, NumberRecord, RKRecord, StringRecord,
} from './records/cells';
import { DimensionsRecord, MsoDrawingRecord, ObjRecord, Window2Record } from './records/sheet';
import { UnknownRecord } from './records/unknown';

/** one record as it came off the stream, continuations merged */
export interface RawRecord {
  sid: number;

  /** merged payload */
  data: Uint8Array;

  /** payload size of the record and each CONTINUE that followed it */
  fragments: number[];

  /** offset of the record header in the stream */
  offset: number;
}

export type BiffRecord =
  | BOFRecord
  | EOFRecord
  | Window1Record
  | Window2Record
  | BoundSheetRecord
  | SupBookRecord
  | ExternSheetRecord
  | NameRecord
  | SSTRecord
  | XFRecord
  | NumberRecord
  | RKRecord
  | MulRKRecord
  | LabelRecord
  | LabelSSTRecord
  | BlankRecord
  | BoolErrRecord
  | FormulaRecord
  | StringRecord
  | DimensionsRecord
  | MsoDrawingGroupRecord
  | MsoDrawingRecord
  | ObjRecord
  | WriteProtectRecord
  | FileSharingRecord
  | TabIdRecord
  | UnknownRecord
  ;

const Construct = (raw: RawRecord): BiffRecord => {

  const data = raw.data;

  switch (raw.sid) {
    case Sid.BOF: return BOFRecord.Parse(data);
    case Sid.EOF: return new EOFRecord();
    case Sid.WINDOW1: return Window1Record.Parse(data);
    case Sid.WINDOW2: return Window2Record.Parse(data);
    case Sid.BOUNDSHEET: return BoundSheetRecord.Parse(data);
    case Sid.SUPBOOK: return SupBookRecord.Parse(data);
    case Sid.EXTERNSHEET: return ExternSheetRecord.Parse(data);
    case Sid.NAME: return NameRecord.Parse(data);
    case Sid.SST: return SSTRecord.Parse(data, raw.fragments);
    case Sid.XF: return XFRecord.Parse(data);
    case Sid.NUMBER: return NumberRecord.Parse(data);
    case Sid.RK: return RKRecord.Parse(data);
    case Sid.MULRK: return MulRKRecord.Parse(data);
    case Sid.LABEL: return LabelRecord.Parse(data);
    case Sid.LABELSST: return LabelSSTRecord.Parse(data);
    case Sid.BLANK: return BlankRecord.Parse(data);
    case Sid.BOOLERR: return BoolErrRecord.Parse(data);
    case Sid.FORMULA: return FormulaRecord.Parse(data);
    case Sid.STRING: return StringRecord.Parse(data);
    case Sid.DIMENSIONS: return DimensionsRecord.Parse(data);
    case Sid.MSODRAWINGGROUP: return MsoDrawingGroupRecord.Parse(data);
    case Sid.MSODRAWING: return MsoDrawingRecord.Parse(data);
    case Sid.OBJ: return ObjRecord.Parse(data);
    case Sid.WRITEPROTECT: return new WriteProtectRecord();
    case Sid.FILESHARING: return FileSharingRecord.Parse(data);
    case Sid.TABID: return TabIdRecord.Parse(data);
  }

  return new UnknownRecord(raw.sid, data.slice(0));

};

/**
 * build the typed variant for a raw record. a payload too short for its
 * type is a corrupt file.
 */
export const ParseRecord = (raw: RawRecord): BiffRecord => {

  let record: BiffRecord;

  try {
    record = Construct(raw);
  }
  catch (err) {
    if (err instanceof RangeError) {
      throw new FormatError('corrupt',
        `Record 0x${raw.sid.toString(16).padStart(4, '0')} at offset ${raw.offset} is truncated: ${err.message}`);
    }
    throw err;
  }

  // SST computes its own layout. other records keep their boundaries.
  if (!(record instanceof SSTRecord)) {
    record.SetFragments(raw.fragments);
  }

  return record;

};
