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

import type { ErrorText } from 'xlb-base-types';

export interface UnitLiteral {
  type: 'literal';
  position: number;
  value: number | string | boolean;
}

/** error literal, like #REF! or #N/A */
export interface UnitError {
  type: 'error';
  position: number;
  error: ErrorText;
}

/** empty argument in a call, as in `IF(A1,,2)` */
export interface UnitMissing {
  type: 'missing';
  position: number;
}

/** a defined name, optionally qualified with a sheet (`Sheet1!Total`) */
export interface UnitIdentifier {
  type: 'identifier';
  position: number;
  name: string;
  sheet?: string;
}

/** parenthesized expression */
export interface UnitGroup {
  type: 'group';
  position: number;
  expression: ExpressionUnit;
}

export interface UnitCall {
  type: 'call';
  position: number;
  name: string;
  args: ExpressionUnit[];
}

export interface UnitBinary {
  type: 'binary';
  position: number;
  operator: string;
  left: ExpressionUnit;
  right: ExpressionUnit;
}

/** prefix `-` and `+`, or postfix `%` */
export interface UnitUnary {
  type: 'unary';
  position: number;
  operator: '-' | '+' | '%';
  operand: ExpressionUnit;
}

/**
 * cell reference. a whole column has row Infinity and a whole row has
 * column Infinity; those only appear as the ends of a range.
 */
export interface UnitAddress {
  type: 'address';
  position: number;
  sheet?: string;
  row: number;
  column: number;
  absolute_row?: boolean;
  absolute_column?: boolean;
}

export interface UnitRange {
  type: 'range';
  position: number;
  start: UnitAddress;
  end: UnitAddress;
}

export type ExpressionUnit =
  | UnitLiteral
  | UnitError
  | UnitMissing
  | UnitIdentifier
  | UnitGroup
  | UnitCall
  | UnitBinary
  | UnitUnary
  | UnitAddress
  | UnitRange;

export interface ParseResult {
  expression?: ExpressionUnit;
  valid: boolean;
  error?: string;
  error_position?: number;
}
