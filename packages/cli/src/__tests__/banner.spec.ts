import pc from 'picocolors';
import { createPrinter } from '../banner';

describe('createPrinter', () => {
  let lines: string[];
  const printer = () => createPrinter({ colors: pc.createColors(false), write: (line) => lines.push(line) });

  beforeEach(() => {
    lines = [];
  });

  it('prints the banner with the version', () => {
    printer().printBanner('1.2.3');
    expect(lines).toEqual(['', '  userscope', '  v1.2.3', '']);
  });

  it('prints the version line', () => {
    printer().printVersion('1.2.3');
    expect(lines).toEqual(['Version: 1.2.3']);
  });

  it('prefixes errors, warnings and info', () => {
    const p = printer();
    p.printError('Unable to open /etc/group (no such file)');
    p.printWarning('Login history unavailable');
    p.printInfo('USERSCOPE_DEFS_FILE: Required');

    expect(lines).toEqual([
      '  ✗ Unable to open /etc/group (no such file)',
      '  ! Login history unavailable',
      '  USERSCOPE_DEFS_FILE: Required',
    ]);
  });

  it('prints the header line before the body lines', () => {
    printer().printTable({ width: 4, header: 'ID  ', body: ['0   ', '1   '] });
    expect(lines).toEqual(['ID  ', '0   ', '1   ']);
  });

  it('colors table lines when colors are enabled', () => {
    const colored = createPrinter({ colors: pc.createColors(true), write: (line) => lines.push(line) });

    colored.printTable({ width: 4, header: 'ID  ', body: ['0   '] });

    expect(lines).toEqual(['\x1b[32mID  \x1b[39m', '\x1b[36m0   \x1b[39m']);
  });

  it('writes to console.log by default', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    createPrinter({ colors: pc.createColors(false) }).printLabel('Showing all users');

    expect(log.mock.calls).toEqual([['Showing all users'], ['']]);
    log.mockRestore();
  });
});
