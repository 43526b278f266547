import { ReportContext, buildReport, renderTable } from '@userscope/core';
import type { Printer } from './banner';
import { SourceError } from './errors';
import type { LoginHistoryQuery } from './last-query';
import { loadSources } from './sources';
import type { CLIOptions, ReportSelection, SourceConfig } from './types';

/**
 * Map command line flags onto a report. The first scope flag given wins,
 * checked in the order system, standard, all.
 */
export function selectReport(options: CLIOptions): ReportSelection {
  const verbosity = options.showFull ? 'full' : 'standard';

  if (options.systemUsers) {
    return { mode: 'system', verbosity, label: 'Showing system users' };
  }
  if (options.users) {
    return { mode: 'regular', verbosity, label: 'Showing standard users' };
  }
  if (options.allUsers) {
    return { mode: 'all', verbosity, label: 'Showing all users' };
  }
  return { mode: 'regular', verbosity, label: 'Default: Showing standard users' };
}

export function printReport(context: ReportContext, selection: ReportSelection, printer: Printer): void {
  printer.printLabel(selection.label);

  const report = buildReport(context, selection.mode, selection.verbosity);
  printer.printTable(renderTable(report.header, report.rows));
}

export interface RunDeps {
  config: SourceConfig;
  queryLoginHistory: LoginHistoryQuery;
  printer: Printer;
}

/**
 * Load every source, then print the selected report.
 * Resolves to the process exit code.
 */
export async function runReport(options: CLIOptions, deps: RunDeps): Promise<number> {
  const { config, queryLoginHistory, printer } = deps;
  const selection = selectReport(options);

  let context: ReportContext;
  try {
    context = await loadSources(config, {
      queryLoginHistory,
      warn: (message) => printer.printWarning(message),
    });
  } catch (error) {
    if (error instanceof SourceError) {
      printer.printError(error.describe());
      return 1;
    }
    throw error;
  }

  printReport(context, selection, printer);
  return 0;
}
