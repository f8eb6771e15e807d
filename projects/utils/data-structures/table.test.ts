import { Table } from './table.js';

test('toDebugStr()', () => {
  let table: Table<number | string> = Table.init(2, 3, () => 0);
  table.setCell(1, 1, 354);
  table.setCell(0, 2, 'x');
  expect(table.toDebugStr()).toBe('0  0    x\n0  354  0');
});

test('setCell() rejects cells outside the grid', () => {
  let table = Table.init(1, 1, () => '');
  expect(() => table.setCell(1, 0, 'a')).toThrow(
    'TableIndexError: Invalid row 1. Must be between 0 and 1 exclusive'
  );
  expect(() => table.setCell(0, -1, 'a')).toThrow(
    'TableIndexError: Invalid col -1. Must be between 0 and 1 exclusive'
  );
});
