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

import { ErrorCodes, InvalidArgumentError } from 'xlb-base-types';
import {
  FunctionByName, IsFixedArity, RenderPtgs,
  type BinaryOperator, type CellRef, type Ptg, type RenderContext,
} from 'xlb-records';
import { MAX_COLUMN, MAX_ROW, Parser, type ExpressionUnit, type UnitAddress } from 'xlb-parser';
import type { ExternSheetTable } from './extern-sheet';
import type { Name, NamedRangeManager } from './named';
import type { SheetCollection } from './sheet-collection';

/** what formulas need to resolve sheets and names */
export interface FormulaContext {
  readonly sheets: SheetCollection;
  readonly extern_sheets: ExternSheetTable;
  readonly names: NamedRangeManager;
}

const binary_operators: BinaryOperator[] = [
  '+', '-', '*', '/', '^', '&', '<', '<=', '=', '>=', '>', '<>',
];

const IsBinaryOperator = (operator: string): operator is BinaryOperator => {
  return binary_operators.some(test => test === operator);
};

/** largest string constant a token can hold */
const MAX_STRING_LENGTH = 255;

/**
 * compiles formula text to tokens and renders tokens back to text.
 * sheet-qualified references compile to 3D tokens through the extern
 * sheet table (adding entries as needed); defined names compile to name
 * tokens.
 *
 * references are written in reference class and function calls in value
 * class. that's not always what Excel would write, but the workbook is
 * recalculated on load so the difference doesn't show.
 */
export class FormulaCompiler {

  public readonly parser = new Parser();

  constructor(protected readonly context: FormulaContext) {}

  /**
   * compile formula text. `scope` is the id of the sheet the formula
   * lives on (or a name is scoped to); it's used to resolve names.
   */
  public Compile(text: string, scope?: number): Ptg[] {

    const result = this.parser.Parse(text);
    if (!result.valid || !result.expression) {
      throw new InvalidArgumentError(`Invalid formula "${text}": ${result.error || 'empty expression'}`);
    }

    const ptgs: Ptg[] = [];
    this.Emit(result.expression, ptgs, scope);
    return ptgs;

  }

  public Render(ptgs: Ptg[]): string {
    return RenderPtgs(ptgs, this.RenderContext());
  }

  public RenderContext(): RenderContext {

    const { sheets, extern_sheets, names } = this.context;

    return {
      SheetName: (ixti: number) => {
        const range = extern_sheets.SheetRange(ixti);
        if (range) {
          const [first, last] = range.map(id => sheets.Name(id));
          return (first !== undefined && last !== undefined) ? `${first}:${last}` : undefined;
        }
        const id = extern_sheets.SheetId(ixti);
        return id === undefined ? undefined : sheets.Name(id);
      },
      Name: (index: number) => names.At(index - 1)?.name,
    };

  }

  protected Emit(unit: ExpressionUnit, ptgs: Ptg[], scope?: number): void {

    switch (unit.type) {

      case 'literal':
        if (typeof unit.value === 'number') {
          const value = unit.value;
          ptgs.push(Number.isInteger(value) && value >= 0 && value <= 0xffff
            ? { type: 'int', value }
            : { type: 'number', value });
        }
        else if (typeof unit.value === 'boolean') {
          ptgs.push({ type: 'bool', value: unit.value });
        }
        else {
          if (unit.value.length > MAX_STRING_LENGTH) {
            throw new InvalidArgumentError(`String literals in formulas can't be longer than ${MAX_STRING_LENGTH} characters`);
          }
          ptgs.push({ type: 'string', value: unit.value });
        }
        break;

      case 'error':
        ptgs.push({ type: 'error', code: ErrorCodes[unit.error] });
        break;

      case 'missing':
        ptgs.push({ type: 'missing' });
        break;

      case 'identifier':
        ptgs.push({ type: 'name', cls: 'reference', index: this.NameIndex(unit.name, unit.sheet, scope) });
        break;

      case 'group':
        this.Emit(unit.expression, ptgs, scope);
        ptgs.push({ type: 'unary', operator: '()' });
        break;

      case 'call': {
        const descriptor = FunctionByName(unit.name);
        if (!descriptor) {
          throw new InvalidArgumentError(`Unknown function: ${unit.name}`);
        }
        const argc = unit.args.length;
        if (argc < descriptor.min || argc > descriptor.max) {
          throw new InvalidArgumentError(
            `${descriptor.name} takes ${descriptor.min === descriptor.max ? descriptor.min : `${descriptor.min} to ${descriptor.max}`} arguments, not ${argc}`);
        }
        for (const arg of unit.args) {
          this.Emit(arg, ptgs, scope);
        }
        ptgs.push(IsFixedArity(descriptor)
          ? { type: 'func', cls: 'value', index: descriptor.index }
          : { type: 'funcvar', cls: 'value', index: descriptor.index, argc });
        break;
      }

      case 'binary':
        if (!IsBinaryOperator(unit.operator)) {
          throw new InvalidArgumentError(`Unsupported operator: ${unit.operator}`);
        }
        this.Emit(unit.left, ptgs, scope);
        this.Emit(unit.right, ptgs, scope);
        ptgs.push({ type: 'binary', operator: unit.operator });
        break;

      case 'unary':
        this.Emit(unit.operand, ptgs, scope);
        ptgs.push({ type: 'unary', operator: unit.operator });
        break;

      case 'address': {
        const ref = this.CellRef(unit);
        if (unit.sheet !== undefined) {
          ptgs.push({ type: 'ref3d', cls: 'reference', ixti: this.SheetIndex(unit.sheet), ref });
        }
        else {
          ptgs.push({ type: 'ref', cls: 'reference', ref });
        }
        break;
      }

      case 'range': {
        const first = this.CellRef(unit.start, 0);
        const last = this.CellRef(unit.end, 1);
        const sheet = unit.start.sheet ?? unit.end.sheet;
        if (sheet !== undefined) {
          ptgs.push({ type: 'area3d', cls: 'reference', ixti: this.SheetIndex(sheet), first, last });
        }
        else {
          ptgs.push({ type: 'area', cls: 'reference', first, last });
        }
        break;
      }

    }

  }

  /**
   * whole rows and columns (Infinity in the parse tree) become the first
   * or last row/column, depending on which end of the range this is.
   */
  protected CellRef(address: UnitAddress, end: 0 | 1 = 0): CellRef {
    return {
      row: address.row === Infinity ? (end ? MAX_ROW : 0) : address.row,
      column: address.column === Infinity ? (end ? MAX_COLUMN : 0) : address.column,
      row_relative: !address.absolute_row,
      column_relative: !address.absolute_column,
    };
  }

  protected SheetIndex(name: string): number {
    const id = this.context.sheets.ID(name);
    if (id === undefined) {
      throw new InvalidArgumentError(`Unknown sheet: ${name}`);
    }
    return this.context.extern_sheets.IndexFor(id);
  }

  /** 1-based name index. `Sheet1!Name` looks only at names scoped to Sheet1. */
  protected NameIndex(text: string, sheet_name: string | undefined, scope?: number): number {

    const names = this.context.names;
    let named: Name | undefined;

    if (sheet_name !== undefined) {
      const sheet = this.context.sheets.ID(sheet_name);
      named = sheet === undefined ? undefined : names.Find(text, sheet);
    }
    else {
      named = names.Lookup(text, scope);
    }

    if (!named) {
      throw new InvalidArgumentError(`Unknown name: ${sheet_name === undefined ? '' : sheet_name + '!'}${text}`);
    }

    return names.IndexOf(named) + 1;

  }

}
