import { formatRow, getColumnWidth, getMaxFieldLength, renderTable } from '../table';

describe('getMaxFieldLength', () => {
  it('measures stringified numbers and strings', () => {
    expect(getMaxFieldLength([[12345, 'ab'], ['abc']])).toBe(5);
  });

  it('counts an emoji as one character', () => {
    expect(getMaxFieldLength([['😀😀😀']])).toBe(3);
  });

  it('returns 0 for no rows', () => {
    expect(getMaxFieldLength([])).toBe(0);
  });
});

describe('renderTable', () => {
  it('uses one width for every column', () => {
    const table = renderTable(['ID', 'User'], [[7, 'root']]);

    expect(table.width).toBe(6);
    expect(table.header).toBe('ID    User  ');
    expect(table.body).toEqual(['7     root  ']);
  });

  it('takes the width from the header when it is the widest', () => {
    expect(getColumnWidth(['Last Login'], [['x']])).toBe(12);
  });

  it('widens every column for one long field', () => {
    const table = renderTable(['ID', 'Home'], [[0, '/var/lib/very-long-home']]);

    expect(table.width).toBe(25);
    expect(table.header).toBe('ID'.padEnd(25) + 'Home'.padEnd(25));
  });

  it('measures and pads by characters, not UTF-16 units', () => {
    const table = renderTable(['ID', '😀😀'], [[1, 'é']]);

    expect(table.width).toBe(4);
    expect(table.header).toBe('ID  😀😀  ');
    expect(table.body).toEqual(['1   é   ']);
  });

  it('renders just the header for an empty body', () => {
    const table = renderTable(['ID', 'User'], []);

    expect(table.header).toBe('ID    User  ');
    expect(table.body).toEqual([]);
  });
});

describe('formatRow', () => {
  it('does not cut values longer than the width', () => {
    expect(formatRow(['abcdef', 'x'], 3)).toBe('abcdefx  ');
  });
});
