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
 * cell address. rows and columns are 0-based. absolute flags are the
 * `$` markers in formula text; they don't affect the address itself.
 */
export interface ICellAddress {
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;
}

/** structure represents a 2d range. */
export interface IArea {
  start: ICellAddress;
  end: ICellAddress;
}

/**
 * class represents a rectangular area on a sheet. unlike a live grid
 * we don't have infinite ranges here; the file format always stores
 * explicit row and column bounds.
 */
export class Area implements IArea {

  public static ColumnToLabel(c: number): string {
    let s = String.fromCharCode(65 + c % 26);
    while (c > 25){
      c = Math.floor(c / 26) - 1;
      s = String.fromCharCode(65 + c % 26) + s;
    }
    return s;
  }

  public static CellAddressToLabel(address: ICellAddress): string {
    return (address.absolute_column ? '$' : '')
      + this.ColumnToLabel(address.column)
      + (address.absolute_row ? '$' : '')
      + (address.row + 1);
  }

  private start_: ICellAddress;

  private end_: ICellAddress;

  /** accessor returns a _copy_ of the start address */
  public get start(): ICellAddress {
    return { ...this.start_ };
  }

  /** accessor returns a _copy_ of the end address */
  public get end(): ICellAddress {
    return { ...this.end_ };
  }

  public get rows(): number {
    return this.end_.row - this.start_.row + 1;
  }

  public get columns(): number {
    return this.end_.column - this.start_.column + 1;
  }

  constructor(start: ICellAddress, end: ICellAddress = start) {
    this.start_ = { ...start };
    this.end_ = { ...end };
  }

  /**
   * grow the area, if necessary, to include the given address. used
   * when computing sheet dimensions.
   */
  public ConsumeAddress(address: ICellAddress): void {
    if (address.row < this.start_.row) this.start_.row = address.row;
    if (address.column < this.start_.column) this.start_.column = address.column;
    if (address.row > this.end_.row) this.end_.row = address.row;
    if (address.column > this.end_.column) this.end_.column = address.column;
  }

  public toString(): string {
    return Area.CellAddressToLabel(this.start_) + ':' + Area.CellAddressToLabel(this.end_);
  }

}
