
import {
  Area, CapacityExceededError, ErrorCodeToText, ErrorCodes, FormatError, InvalidStateError, IsErrorText,
  SizeMismatchError, WorkbookError,
} from '../src';

test('column labels', () => {
  expect(Area.ColumnToLabel(0)).toEqual('A');
  expect(Area.ColumnToLabel(25)).toEqual('Z');
  expect(Area.ColumnToLabel(26)).toEqual('AA');
  expect(Area.ColumnToLabel(255)).toEqual('IV');
  expect(Area.ColumnToLabel(701)).toEqual('ZZ');
  expect(Area.ColumnToLabel(702)).toEqual('AAA');
});

test('address labels', () => {
  expect(Area.CellAddressToLabel({ row: 4, column: 2 })).toEqual('C5');
  expect(Area.CellAddressToLabel({ row: 4, column: 2, absolute_row: true })).toEqual('C$5');
  expect(Area.CellAddressToLabel({ row: 0, column: 0, absolute_row: true, absolute_column: true })).toEqual('$A$1');
});

test('area grows to include addresses', () => {

  const area = new Area({ row: 3, column: 2 });
  expect(area.rows).toEqual(1);
  expect(area.columns).toEqual(1);

  area.ConsumeAddress({ row: 1, column: 5 });
  area.ConsumeAddress({ row: 7, column: 0 });

  expect(area.start).toEqual({ row: 1, column: 0 });
  expect(area.end).toEqual({ row: 7, column: 5 });
  expect(area.rows).toEqual(7);
  expect(area.columns).toEqual(6);
  expect(area.toString()).toEqual('A2:F8');

});

test('accessors return copies', () => {
  const area = new Area({ row: 1, column: 1 }, { row: 2, column: 2 });
  const start = area.start;
  start.row = 100;
  expect(area.start.row).toEqual(1);
});

test('error codes', () => {
  expect(ErrorCodes['#DIV/0!']).toEqual(0x07);
  expect(ErrorCodeToText(0x17)).toEqual('#REF!');
  expect(ErrorCodeToText(0x99)).toEqual('#N/A');
  expect(IsErrorText('#NAME?')).toBeTruthy();
  expect(IsErrorText('#name?')).toBeFalsy();
  expect(IsErrorText(7)).toBeFalsy();
});

test('error classes', () => {

  const format = new FormatError('biff5', 'old file');
  expect(format).toBeInstanceOf(WorkbookError);
  expect(format.name).toEqual('FormatError');
  expect(format.variant).toEqual('biff5');
  expect(format.message).toEqual('old file');

  const mismatch = new SizeMismatchError('sizes differ', 20, 16, 0x0203);
  expect(mismatch).toBeInstanceOf(InvalidStateError);
  expect(mismatch.name).toEqual('SizeMismatchError');
  expect([mismatch.expected, mismatch.actual, mismatch.sid]).toEqual([20, 16, 0x0203]);

  const capacity = new CapacityExceededError('full', 4030);
  expect(capacity.limit).toEqual(4030);
  expect(capacity).toBeInstanceOf(Error);

});
