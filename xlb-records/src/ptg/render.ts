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

import { Area, ErrorCodeToText } from 'xlb-base-types';
import { AttrFlags, type CellRef, type Ptg } from './ptg-types';
import { FunctionByIndex, USER_DEFINED_FUNCTION } from './functions';

/**
 * rendering needs to resolve indirect references. sheet names come from
 * the extern sheet table; `undefined` means the sheet no longer exists.
 */
export interface RenderContext {
  SheetName(ixti: number): string | undefined;
  Name(index: number): string | undefined;
}

const reserved_sheet_name = /^(TRUE|FALSE)$/i;
const cell_like_sheet_name = /^(\$?[A-Za-z]{1,3}\$?\d+|R\d*C\d*)$/i;

/**
 * sheet names with anything other than letters, digits, underscores and
 * dots need quotes, as do names that start with a digit or that could be
 * read as a cell address. embedded quotes are doubled.
 */
export const QuoteSheetName = (name: string): string => {
  if (/[^A-Za-z0-9_.]/.test(name) || /^\d/.test(name) || cell_like_sheet_name.test(name) || reserved_sheet_name.test(name)) {
    return `'${name.replace(/'/g, "''")}'`;
  }
  return name;
};

export const RenderCellRef = (ref: CellRef): string => {
  return Area.CellAddressToLabel({
    row: ref.row,
    column: ref.column,
    absolute_row: !ref.row_relative,
    absolute_column: !ref.column_relative,
  });
};

const RenderNumber = (value: number): string => {
  if (Number.isInteger(value) && Math.abs(value) < 1e15) {
    return value.toFixed(0);
  }
  return String(value).toUpperCase();
};

/**
 * render a token array as formula text. tokens are in RPN order, so this
 * is a stack machine. whitespace tokens and memory tokens are skipped;
 * output has no spaces around operators or after commas.
 */
export const RenderPtgs = (ptgs: Ptg[], context: RenderContext): string => {

  const stack: string[] = [];
  const Pop = (): string => stack.pop() ?? '';
  const PopArgs = (count: number): string[] => {
    const args: string[] = [];
    for (let i = 0; i < count; i++) {
      args.unshift(Pop());
    }
    return args;
  };

  const SheetPrefix = (ixti: number): string => {
    const name = context.SheetName(ixti);
    return name === undefined ? '#REF!' : QuoteSheetName(name) + '!';
  };

  for (const ptg of ptgs) {
    switch (ptg.type) {
      case 'int':
      case 'number':
        stack.push(RenderNumber(ptg.value));
        break;

      case 'string':
        stack.push('"' + ptg.value.replace(/"/g, '""') + '"');
        break;

      case 'bool':
        stack.push(ptg.value ? 'TRUE' : 'FALSE');
        break;

      case 'error':
        stack.push(ErrorCodeToText(ptg.code));
        break;

      case 'missing':
        stack.push('');
        break;

      case 'binary': {
        const right = Pop();
        const left = Pop();
        stack.push(left + ptg.operator + right);
        break;
      }

      case 'unary': {
        const operand = Pop();
        switch (ptg.operator) {
          case '()': stack.push(`(${operand})`); break;
          case '%': stack.push(operand + '%'); break;
          default: stack.push(ptg.operator + operand); break;
        }
        break;
      }

      case 'ref':
        stack.push(RenderCellRef(ptg.ref));
        break;

      case 'area':
        stack.push(RenderCellRef(ptg.first) + ':' + RenderCellRef(ptg.last));
        break;

      case 'ref3d':
        stack.push(SheetPrefix(ptg.ixti) + RenderCellRef(ptg.ref));
        break;

      case 'area3d':
        stack.push(SheetPrefix(ptg.ixti) + RenderCellRef(ptg.first) + ':' + RenderCellRef(ptg.last));
        break;

      case 'ref-error': {
        const name = ptg.ixti === undefined ? undefined : context.SheetName(ptg.ixti);
        stack.push(name === undefined ? '#REF!' : QuoteSheetName(name) + '!#REF!');
        break;
      }

      case 'name':
        stack.push(context.Name(ptg.index) ?? '#NAME?');
        break;

      case 'func':
      case 'funcvar': {
        const descriptor = FunctionByIndex(ptg.index);
        const count = ptg.type === 'funcvar' ? ptg.argc : (descriptor?.min ?? 0);
        const args = PopArgs(count);
        if (ptg.index === USER_DEFINED_FUNCTION) {
          const name = args.shift() ?? '';
          stack.push(`${name}(${args.join(',')})`);
        }
        else {
          stack.push(`${descriptor?.name ?? '#NAME?'}(${args.join(',')})`);
        }
        break;
      }

      case 'attr':
        if (ptg.options & AttrFlags.Sum) {
          stack.push(`SUM(${Pop()})`);
        }
        break;

      case 'mem':
        break;

      // not an error value; shows where an unread token sits
      case 'raw':
        stack.push(`<ptg 0x${ptg.id.toString(16).padStart(2, '0')}>`);
        break;
    }
  }

  return stack.join(',');

};
