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
 * operand class, in bits 5-6 of classified token ids. reference class
 * tokens are 0x2X/0x3X, value class 0x4X/0x5X, array class 0x6X/0x7X.
 */
export type PtgClass = 'reference' | 'value' | 'array';

/** one corner of a cell or area reference */
export interface CellRef {
  row: number;
  column: number;
  row_relative: boolean;
  column_relative: boolean;
}

export type BinaryOperator =
  '+' | '-' | '*' | '/' | '^' | '&' | '<' | '<=' | '=' | '>=' | '>' | '<>' | ' ' | ',' | ':';

export type UnaryOperator = '+' | '-' | '%' | '()';

export interface IntPtg { type: 'int'; value: number }
export interface NumberPtg { type: 'number'; value: number }
export interface StringPtg { type: 'string'; value: string }
export interface BoolPtg { type: 'bool'; value: boolean }
export interface ErrorPtg { type: 'error'; code: number }
export interface MissingArgPtg { type: 'missing' }

export interface BinaryPtg { type: 'binary'; operator: BinaryOperator }
export interface UnaryPtg { type: 'unary'; operator: UnaryOperator }

export interface RefPtg { type: 'ref'; cls: PtgClass; ref: CellRef }
export interface AreaPtg { type: 'area'; cls: PtgClass; first: CellRef; last: CellRef }

/** 3D tokens address a sheet through an index into the extern sheet table */
export interface Ref3dPtg { type: 'ref3d'; cls: PtgClass; ixti: number; ref: CellRef }
export interface Area3dPtg { type: 'area3d'; cls: PtgClass; ixti: number; first: CellRef; last: CellRef }

/** a reference that has been invalidated. the payload is unused. */
export interface RefErrorPtg { type: 'ref-error'; cls: PtgClass; area: boolean; ixti?: number }

export interface FuncPtg { type: 'func'; cls: PtgClass; index: number }
export interface FuncVarPtg { type: 'funcvar'; cls: PtgClass; index: number; argc: number }

/** 1-based index into the workbook's name table */
export interface NamePtg { type: 'name'; cls: PtgClass; index: number }

/**
 * control tokens. only the sum form affects rendering; the rest carry
 * jump offsets or whitespace, which stay valid as long as the tokens
 * around them keep their encoded sizes.
 */
export interface AttrPtg { type: 'attr'; options: number; data: number; jumps?: number[] }

/** memory tokens wrap a subexpression and do not render */
export interface MemPtg { type: 'mem'; id: number; bytes: Uint8Array }

/**
 * a token we don't interpret. if we know its length the raw bytes are
 * one token; if not, everything from here to the end of the formula is.
 */
export interface RawPtg { type: 'raw'; id: number; bytes: Uint8Array }

export type Ptg =
  | IntPtg
  | NumberPtg
  | StringPtg
  | BoolPtg
  | ErrorPtg
  | MissingArgPtg
  | BinaryPtg
  | UnaryPtg
  | RefPtg
  | AreaPtg
  | Ref3dPtg
  | Area3dPtg
  | RefErrorPtg
  | FuncPtg
  | FuncVarPtg
  | NamePtg
  | AttrPtg
  | MemPtg
  | RawPtg;

export const AttrFlags = {
  Volatile: 0x01,
  If: 0x02,
  Choose: 0x04,
  Skip: 0x08,
  Sum: 0x10,
  Baxcel: 0x20,
  Space: 0x40,
} as const;
