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

import { ErrorCodes, IsErrorText } from 'xlb-base-types';
import type {
  ExpressionUnit, ParseResult, UnitAddress, UnitIdentifier, UnitRange,
} from './parser-types';

/** the largest row and column the file format can address */
export const MAX_ROW = 65535;
export const MAX_COLUMN = 255;

/** binary operators, loosest first. `^` is left-associative, as in Excel. */
const binary_precedence: Record<string, number> = {
  '=': 1, '<>': 1, '<': 1, '>': 1, '<=': 1, '>=': 1,
  '&': 2,
  '+': 3, '-': 3,
  '*': 4, '/': 4,
  '^': 5,
};

/** longest first, so `<=` wins over `<` */
const binary_operators = Object.keys(binary_precedence).sort((a, b) => b.length - a.length);

const error_texts = Object.keys(ErrorCodes).filter(IsErrorText)
  .sort((a, b) => b.length - a.length);

const word_character = /[A-Za-z0-9_\\.?$!\u00c0-\u024f]/;
const word_start = /[A-Za-z_\\$'\u00c0-\u024f]/;
const number_pattern = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const row_range_pattern = /^(\$?)(\d+)\s*:\s*(\$?)(\d+)/;

const cell_pattern = /^(\$?)([A-Za-z]{1,3})(\$?)(\d+)$/;
const column_pattern = /^(\$?)([A-Za-z]{1,3})$/;
const row_pattern = /^(\$?)(\d+)$/;

const ColumnIndex = (letters: string): number => {
  let column = 0;
  for (const letter of letters.toUpperCase()) {
    column = column * 26 + (letter.charCodeAt(0) - 64);
  }
  return column - 1;
};

/** thrown inside a parse pass, turned into an invalid result */
class FormulaSyntaxError extends Error {
  constructor(message: string, public readonly position: number) {
    super(message);
  }
}

/**
 * recursive-descent parser for formula text, as typed into a cell or a
 * defined name. produces an expression tree; the tree is compiled into
 * tokens elsewhere.
 *
 * precedence, tightest first: ranges, prefix `-`/`+`, postfix `%`, `^`,
 * `*` and `/`, `+` and `-`, `&`, comparisons.
 *
 * state is only used during a Parse() call, which runs synchronously,
 * so one instance can be shared.
 */
export class Parser {

  protected text = '';
  protected index = 0;

  /** parse text and return the root of the tree. a leading `=` is dropped. */
  public Parse(expression: string): ParseResult {

    let text = expression.trim();
    if (text.startsWith('=')) {
      text = text.substring(1).trim();
    }

    this.text = text;
    this.index = 0;

    if (!text.length) {
      return { valid: true };
    }

    try {
      const unit = this.Expression(0);
      this.SkipWhitespace();
      if (this.index < this.text.length) {
        throw new FormulaSyntaxError(`unexpected character: ${this.text[this.index]}`, this.index);
      }
      return { valid: true, expression: unit };
    }
    catch (err) {
      if (err instanceof FormulaSyntaxError) {
        return { valid: false, error: err.message, error_position: err.position };
      }
      throw err;
    }

  }

  /** precedence climbing over binary operators */
  protected Expression(min_precedence: number): ExpressionUnit {

    let left = this.Postfix();

    for (;;) {
      this.SkipWhitespace();
      const position = this.index;
      const operator = binary_operators.find(test => this.text.startsWith(test, position));
      if (!operator || binary_precedence[operator] < min_precedence) {
        return left;
      }
      this.index += operator.length;
      const right = this.Expression(binary_precedence[operator] + 1);
      left = { type: 'binary', position, operator, left, right };
    }

  }

  protected Postfix(): ExpressionUnit {
    let operand = this.Prefix();
    for (;;) {
      this.SkipWhitespace();
      if (this.text[this.index] !== '%') {
        return operand;
      }
      operand = { type: 'unary', position: this.index++, operator: '%', operand };
    }
  }

  protected Prefix(): ExpressionUnit {

    this.SkipWhitespace();
    const position = this.index;
    const char = this.text[position];

    if (char === '-' || char === '+') {

      // a sign directly in front of a number is part of the number
      const number = number_pattern.exec(this.text.substring(position + 1));
      if (number) {
        this.index += 1 + number[0].length;
        const value = Number(number[0]);
        return { type: 'literal', position, value: char === '-' ? -value : value };
      }

      this.index++;
      return { type: 'unary', position, operator: char, operand: this.Prefix() };
    }

    return this.Primary();

  }

  protected Primary(): ExpressionUnit {

    this.SkipWhitespace();
    const position = this.index;
    const char = this.text[position];

    if (position >= this.text.length) {
      throw new FormulaSyntaxError('unexpected end of expression', position);
    }

    if (char === '"') {
      return { type: 'literal', position, value: this.QuotedString() };
    }

    if (char === '#') {
      const upper = this.text.substring(position).toUpperCase();
      const error = error_texts.find(text => upper.startsWith(text));
      if (!error) {
        throw new FormulaSyntaxError('unknown error literal', position);
      }
      this.index += error.length;
      return { type: 'error', position, error };
    }

    if (char === '(') {
      this.index++;
      const expression = this.Expression(0);
      this.Expect(')', 'unbalanced parenthesis');
      return { type: 'group', position, expression };
    }

    if (/[\d.]/.test(char)) {
      const rest = this.text.substring(position);
      const rows = row_range_pattern.exec(rest);
      if (rows && !word_character.test(rest[rows[0].length] || '')) {
        this.index += rows[0].length;
        return this.Range(position, `${rows[1]}${rows[2]}`, `${rows[3]}${rows[4]}`);
      }
      const number = number_pattern.exec(rest);
      if (!number) {
        throw new FormulaSyntaxError(`unexpected character: ${char}`, position);
      }
      this.index += number[0].length;
      return { type: 'literal', position, value: Number(number[0]) };
    }

    if (!word_start.test(char)) {
      throw new FormulaSyntaxError(`unexpected character: ${char}`, position);
    }

    const word = this.Word();

    this.SkipWhitespace();
    if (this.text[this.index] === '(') {
      this.index++;
      return { type: 'call', position, name: word, args: this.Arguments() };
    }

    const upper = word.toUpperCase();
    if (upper === 'TRUE' || upper === 'FALSE') {
      return { type: 'literal', position, value: upper === 'TRUE' };
    }

    if (this.text[this.index] === ':') {
      this.index++;
      this.SkipWhitespace();
      const end = this.Word();
      return this.Range(position, word, end);
    }

    return this.Reference(position, word);

  }

  /** arguments after the opening parenthesis, through the closing one */
  protected Arguments(): ExpressionUnit[] {

    const args: ExpressionUnit[] = [];

    this.SkipWhitespace();
    if (this.text[this.index] === ')') {
      this.index++;
      return args;
    }

    for (;;) {
      this.SkipWhitespace();
      const char = this.text[this.index];
      args.push(char === ',' || char === ')'
        ? { type: 'missing', position: this.index }
        : this.Expression(0));

      this.SkipWhitespace();
      const next = this.text[this.index];
      if (next === ',') {
        this.index++;
      }
      else if (next === ')') {
        this.index++;
        return args;
      }
      else {
        throw new FormulaSyntaxError('unbalanced parenthesis', this.index);
      }
    }

  }

  /** cell address or name, either one possibly qualified with a sheet */
  protected Reference(position: number, word: string): UnitAddress | UnitIdentifier {

    const [sheet, local] = this.SplitSheet(word);
    const match = cell_pattern.exec(local);

    if (match) {
      const row = Number(match[4]) - 1;
      const column = ColumnIndex(match[2]);
      if (row >= 0 && row <= MAX_ROW && column <= MAX_COLUMN) {
        return {
          type: 'address', position, sheet, row, column,
          absolute_column: !!match[1], absolute_row: !!match[3],
        };
      }
    }

    return { type: 'identifier', position, name: local, sheet };

  }

  /**
   * `A1:B2`, `A:C` or `2:5`. both ends have to be the same kind; the
   * sheet, if any, is on the first.
   */
  protected Range(position: number, first: string, second: string): UnitRange {

    const [sheet, local] = this.SplitSheet(first);

    const start = this.RangeEnd(position, local);
    const end = this.RangeEnd(position, second);

    if (!start || !end || (start.row === Infinity) !== (end.row === Infinity)
        || (start.column === Infinity) !== (end.column === Infinity)) {
      throw new FormulaSyntaxError(`invalid range: ${first}:${second}`, position);
    }

    start.sheet = sheet;
    return { type: 'range', position, start, end };

  }

  protected RangeEnd(position: number, text: string): UnitAddress | undefined {

    const cell = this.Reference(position, text);
    if (cell.type === 'address' && cell.sheet === undefined) {
      return cell;
    }

    const column = column_pattern.exec(text);
    if (column) {
      const index = ColumnIndex(column[2]);
      return index <= MAX_COLUMN ? {
        type: 'address', position, row: Infinity, column: index, absolute_column: !!column[1],
      } : undefined;
    }

    const row = row_pattern.exec(text);
    if (row) {
      const index = Number(row[2]) - 1;
      return (index >= 0 && index <= MAX_ROW) ? {
        type: 'address', position, row: index, column: Infinity, absolute_row: !!row[1],
      } : undefined;
    }

    return undefined;

  }

  /** split `'my sheet'!A1` into its sheet name (unquoted) and the rest */
  protected SplitSheet(word: string): [string | undefined, string] {

    const bang = word.lastIndexOf('!');
    if (bang <= 0) {
      return [undefined, word];
    }

    let sheet = word.substring(0, bang);
    if (sheet.startsWith('\'') && sheet.endsWith('\'') && sheet.length > 1) {
      sheet = sheet.substring(1, sheet.length - 1).replace(/''/g, '\'');
    }

    return [sheet, word.substring(bang + 1)];

  }

  /**
   * a run of name characters. a leading quoted part (a sheet name) may
   * hold anything, with embedded quotes doubled.
   */
  protected Word(): string {

    const start = this.index;

    if (this.text[this.index] === '\'') {
      this.index++;
      for (;;) {
        const close = this.text.indexOf('\'', this.index);
        if (close < 0) {
          throw new FormulaSyntaxError('unbalanced single quote', start);
        }
        this.index = close + 1;
        if (this.text[this.index] !== '\'') {
          break;
        }
        this.index++;
      }
    }

    while (this.index < this.text.length && word_character.test(this.text[this.index])) {
      this.index++;
    }

    if (this.index === start) {
      throw new FormulaSyntaxError('expected a reference', start);
    }

    return this.text.substring(start, this.index);

  }

  /** string literal with embedded quotes doubled */
  protected QuotedString(): string {

    const start = this.index++;
    let value = '';

    for (;;) {
      const close = this.text.indexOf('"', this.index);
      if (close < 0) {
        throw new FormulaSyntaxError('unterminated string', start);
      }
      value += this.text.substring(this.index, close);
      this.index = close + 1;
      if (this.text[this.index] !== '"') {
        return value;
      }
      value += '"';
      this.index++;
    }

  }

  protected Expect(char: string, message: string): void {
    this.SkipWhitespace();
    if (this.text[this.index] !== char) {
      throw new FormulaSyntaxError(message, this.index);
    }
    this.index++;
  }

  protected SkipWhitespace(): void {
    while (this.index < this.text.length && /[ \t\r\n ]/.test(this.text[this.index])) {
      this.index++;
    }
  }

}
