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
 * base class for errors thrown by the workbook libraries. we set `name`
 * so the class survives serialization and shows up in stack traces.
 */
export class WorkbookError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * format variants we can identify when refusing to open a file. these
 * are reported in the error message so the caller knows what they have.
 */
export type FormatVariant =
  | 'ooxml'
  | 'biff2'
  | 'biff3'
  | 'biff4'
  | 'biff5'
  | 'not-ole2'
  | 'corrupt'
  | 'encrypted'
  | 'missing-workbook';

/**
 * the file is not something we can read: wrong signature, an older
 * generation of the workbook format, or a broken container.
 */
export class FormatError extends WorkbookError {
  constructor(public readonly variant: FormatVariant, message: string) {
    super(message);
  }
}

/**
 * operation is not valid for the current state of the object, e.g. an
 * in-place write on something that was not opened from a writable file.
 */
export class InvalidStateError extends WorkbookError {}

/** bad argument: out-of-range index, duplicate or illegal name */
export class InvalidArgumentError extends WorkbookError {}

/**
 * a record (or a block of records) wrote a different number of bytes than
 * it declared. downstream offsets are computed from declared sizes, so this
 * always aborts the write.
 */
export class SizeMismatchError extends InvalidStateError {
  constructor(
    message: string,
    public readonly expected: number,
    public readonly actual: number,
    public readonly sid?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** a bounded table is full. the table is not modified. */
export class CapacityExceededError extends WorkbookError {
  constructor(message: string, public readonly limit: number) {
    super(message);
  }
}
