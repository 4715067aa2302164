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

/**
 * record type ids. this is not exhaustive; it lists the records we
 * interpret, the ones we drop, and the ones we create from scratch.
 */
export const Sid = {

  // stream structure

  BOF: 0x0809,
  EOF: 0x000a,
  CONTINUE: 0x003c,

  // workbook globals

  CODEPAGE: 0x0042,
  WINDOW1: 0x003d,
  BOUNDSHEET: 0x0085,
  SUPBOOK: 0x01ae,
  EXTERNSHEET: 0x0017,
  NAME: 0x0018,
  SST: 0x00fc,
  EXTSST: 0x00ff,
  FONT: 0x0031,
  FORMAT: 0x041e,
  XF: 0x00e0,
  STYLE: 0x0293,
  MSODRAWINGGROUP: 0x00eb,
  WRITEPROTECT: 0x0086,
  FILESHARING: 0x005b,
  WRITEACCESS: 0x005c,
  TABID: 0x013d,
  DATE1904: 0x0022,
  COUNTRY: 0x008c,
  USESELFS: 0x0160,
  FILEPASS: 0x002f,
  EXTERNNAME: 0x0023,
  XCT: 0x0059,
  CRN: 0x005a,

  // sheet

  INDEX: 0x020b,
  DIMENSIONS: 0x0200,
  ROW: 0x0208,
  DBCELL: 0x00d7,
  NUMBER: 0x0203,
  RK: 0x027e,
  MULRK: 0x00bd,
  LABEL: 0x0204,
  LABELSST: 0x00fd,
  BLANK: 0x0201,
  MULBLANK: 0x00be,
  BOOLERR: 0x0205,
  FORMULA: 0x0006,
  STRING: 0x0207,
  WINDOW2: 0x023e,
  MSODRAWING: 0x00ec,
  OBJ: 0x005d,
  TXO: 0x01b6,
  NOTE: 0x001c,
  SHRFMLA: 0x04bc,
  ARRAY: 0x0221,
  TABLE: 0x0236,

} as const;

/** BOF substream types */
export const SubstreamType = {
  Globals: 0x0005,
  Worksheet: 0x0010,
  Chart: 0x0020,
  Macro: 0x0040,
} as const;

/** BOF version field for the only generation we read and write */
export const BIFF8_VERSION = 0x0600;

/** the largest payload one record can carry. longer payloads continue. */
export const MAX_RECORD_DATA = 8224;

export const RECORD_HEADER_SIZE = 4;
