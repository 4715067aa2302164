import { Parser, type ExpressionUnit } from '../src';

const parser = new Parser();

/** compact rendering of a tree, for comparisons */
const Shape = (unit: ExpressionUnit | undefined): string => {
  if (!unit) { return ''; }
  switch (unit.type) {
    case 'literal': return typeof unit.value === 'string' ? `"${unit.value}"` : String(unit.value);
    case 'error': return unit.error;
    case 'missing': return '_';
    case 'identifier': return `${unit.sheet ? unit.sheet + '!' : ''}${unit.name}`;
    case 'address': return `${unit.sheet ? unit.sheet + '!' : ''}[${unit.row},${unit.column}]`;
    case 'range': return `${Shape(unit.start)}:${Shape(unit.end)}`;
    case 'binary': return `(${Shape(unit.left)} ${unit.operator} ${Shape(unit.right)})`;
    case 'unary': return unit.operator === '%' ? `${Shape(unit.operand)}%` : `${unit.operator}${Shape(unit.operand)}`;
    case 'group': return `{${Shape(unit.expression)}}`;
    case 'call': return `${unit.name}(${unit.args.map(Shape).join(', ')})`;
  }
};

describe('basic parsing', () => {

  test('3 + 4', () => {
    const result = parser.Parse('3 + 4');
    expect(result.valid).toBeTruthy();
    expect(Shape(result.expression)).toBe('(3 + 4)');
  });

  test('/ 2', () => {
    const result = parser.Parse('/ 2');
    expect(result.valid).toBeFalsy();
  });

  test('leading = is dropped', () => {
    expect(Shape(parser.Parse('=A1').expression)).toBe('[0,0]');
  });

  test('trailing text is an error', () => {
    const result = parser.Parse('A1 B1');
    expect(result.valid).toBe(false);
    expect(result.error).toBe('unexpected character: B');
    expect(result.error_position).toBe(3);
  });

});

describe('precedence', () => {

  test('multiplication binds tighter than addition', () => {
    expect(Shape(parser.Parse('1+2*3').expression)).toBe('(1 + (2 * 3))');
    expect(Shape(parser.Parse('1*2+3').expression)).toBe('((1 * 2) + 3)');
  });

  test('chains reorder all the way down', () => {
    expect(Shape(parser.Parse('1+2*3^4').expression)).toBe('(1 + (2 * (3 ^ 4)))');
  });

  test('same precedence is left to right', () => {
    expect(Shape(parser.Parse('1-2-3').expression)).toBe('((1 - 2) - 3)');
  });

  test('explicit groups are kept', () => {
    expect(Shape(parser.Parse('(1+2)*3').expression)).toBe('({(1 + 2)} * 3)');
  });

  test('unary minus', () => {
    expect(Shape(parser.Parse('-SUM(1,2)').expression)).toBe('-SUM(1, 2)');
    expect(Shape(parser.Parse('-A1*2').expression)).toBe('(-[0,0] * 2)');
  });

  test('comparisons are loosest', () => {
    expect(Shape(parser.Parse('A1&"x"<>B1+1').expression)).toBe('(([0,0] & "x") <> ([0,1] + 1))');
    expect(Shape(parser.Parse('1<=2').expression)).toBe('(1 <= 2)');
  });

  test('percent applies to any operand', () => {
    expect(Shape(parser.Parse('A1%').expression)).toBe('[0,0]%');
    expect(Shape(parser.Parse('(A1+1)%').expression)).toBe('{([0,0] + 1)}%');
    expect(Shape(parser.Parse('SUM(A1)%%').expression)).toBe('SUM([0,0])%%');
  });

  test('percent binds tighter than power', () => {
    expect(Shape(parser.Parse('2^A1%').expression)).toBe('(2 ^ [0,0]%)');
    expect(Shape(parser.Parse('1+A1%*2').expression)).toBe('(1 + ([0,0]% * 2))');
  });

  test('signs bind tighter than power', () => {
    expect(Shape(parser.Parse('-A1^2').expression)).toBe('(-[0,0] ^ 2)');
    expect(Shape(parser.Parse('2^-1').expression)).toBe('(2 ^ -1)');
  });

});

describe('references', () => {

  test('absolute and relative', () => {
    const result = parser.Parse('$B$3');
    const unit = result.expression;
    expect(unit?.type).toBe('address');
    if (unit?.type === 'address') {
      expect(unit.row).toBe(2);
      expect(unit.column).toBe(1);
      expect(unit.absolute_row).toBe(true);
      expect(unit.absolute_column).toBe(true);
    }
  });

  test('quoted sheet names', () => {
    expect(Shape(parser.Parse("'first sheet'!D1").expression)).toBe('first sheet![0,3]');
    expect(Shape(parser.Parse("'O''Brien'!A1").expression)).toBe("O'Brien![0,0]");
  });

  test('ranges', () => {
    expect(Shape(parser.Parse('Sheet1!$A$3:$A$4').expression)).toBe('Sheet1![2,0]:[3,0]');
    expect(Shape(parser.Parse('A:C').expression)).toBe('[Infinity,0]:[Infinity,2]');
    expect(Shape(parser.Parse('2:5').expression)).toBe('[1,Infinity]:[4,Infinity]');
  });

  test('names are identifiers', () => {
    expect(Shape(parser.Parse('Rates*2').expression)).toBe('(Rates * 2)');
    expect(Shape(parser.Parse("'my sheet'!Rates").expression)).toBe('my sheet!Rates');
  });

  test('mismatched range ends', () => {
    const result = parser.Parse('A1:C');
    expect(result.valid).toBe(false);
    expect(result.error).toBe('invalid range: A1:C');
  });

  test('columns past the format limit are names', () => {
    expect(parser.Parse('XYZ1').expression?.type).toBe('identifier');
  });

});

describe('literals', () => {

  const decimals = [1, 1.11, 2.2343, 123819238, -6, -7.77, -0.00012];

  decimals.forEach((decimal) => {
    const as_string = decimal.toString();
    test(as_string, () => {
      const result = parser.Parse(as_string);
      const unit = result.expression;
      expect(unit?.type).toBe('literal');
      expect(Number(unit?.type === 'literal' ? unit.value : NaN)).toBeCloseTo(decimal);
    });
  });

  test('percent and exponent', () => {
    expect(Shape(parser.Parse('50%').expression)).toBe('50%');
    const exponent = parser.Parse('1e3').expression;
    expect(exponent?.type === 'literal' && exponent.value).toBe(1000);
  });

  test('strings with embedded quotes', () => {
    const unit = parser.Parse('"say ""hi"""').expression;
    expect(unit?.type === 'literal' && unit.value).toBe('say "hi"');
  });

  test('booleans and errors', () => {
    expect(Shape(parser.Parse('IF(TRUE,#N/A,false)').expression)).toBe('IF(true, #N/A, false)');
  });

  test('missing arguments', () => {
    expect(Shape(parser.Parse('IF(A1,,2)').expression)).toBe('IF([0,0], _, 2)');
  });

  test('unterminated string', () => {
    expect(parser.Parse('"abc').valid).toBe(false);
  });

  test('unbalanced parenthesis', () => {
    expect(parser.Parse('SUM(1,2').valid).toBe(false);
    expect(parser.Parse('(1+2').valid).toBe(false);
  });

});
