import pc from 'picocolors';
import type { RenderedTable } from '@userscope/core';

export type Colors = ReturnType<typeof pc.createColors>;

export interface Printer {
  printBanner(version: string): void;
  printVersion(version: string): void;
  printLabel(label: string): void;
  printTable(table: RenderedTable): void;
  printError(message: string): void;
  printWarning(message: string): void;
  printInfo(message: string): void;
}

export interface PrinterOptions {
  colors?: Colors;
  write?: (line: string) => void;
}

export function createPrinter(options: PrinterOptions = {}): Printer {
  const c = options.colors ?? pc;
  const write = options.write ?? ((line: string) => console.log(line));

  return {
    /**
     * Print the startup banner
     */
    printBanner(version) {
      write('');
      write(c.cyan(c.bold('  userscope')));
      write(c.dim(`  v${version}`));
      write('');
    },

    printVersion(version) {
      write(c.green(`Version: ${version}`));
    },

    /**
     * Print which accounts the following table covers
     */
    printLabel(label) {
      write(c.magenta(label));
      write('');
    },

    printTable(table) {
      write(c.green(table.header));
      for (const line of table.body) {
        write(c.cyan(line));
      }
    },

    printError(message) {
      write(c.red(`  ✗ ${message}`));
    },

    printWarning(message) {
      write(c.yellow(`  ! ${message}`));
    },

    printInfo(message) {
      write(c.dim(`  ${message}`));
    },
  };
}
