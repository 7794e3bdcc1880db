import { describe, it, expect } from 'vitest';
import { renderGridTable } from './table.js';

describe('renderGridTable', () => {
  it('should size columns to the widest cell', () => {
    const table = renderGridTable(
      ['#', 'Name'],
      [
        ['1', 'ab'],
        ['10', 'c'],
      ],
      ['right', 'left']
    );

    expect(table.split('\n')).toEqual([
      '+----+------+',
      '|  # | Name |',
      '+====+======+',
      '|  1 | ab   |',
      '+----+------+',
      '| 10 | c    |',
      '+----+------+',
    ]);
  });

  it('should default to left alignment', () => {
    const table = renderGridTable(['Value'], [['7']]);

    expect(table.split('\n')[3]).toBe('| 7     |');
  });

  it('should render headers alone when there are no rows', () => {
    expect(renderGridTable(['A', 'B'], []).split('\n')).toEqual([
      '+---+---+',
      '| A | B |',
      '+---+---+',
    ]);
  });
});
