import { readFileSync } from 'fs';
import {
  LoginHistoryIndex,
  ParseError,
  PrivilegeResolver,
  ReportContext,
  loadThresholds,
  parseAccountDatabase,
} from '@userscope/core';
import { SourceError } from './errors';
import type { LoginHistoryQuery } from './last-query';
import type { SourceConfig } from './types';

export interface SourceLoaderDeps {
  queryLoginHistory: LoginHistoryQuery;
  warn: (message: string) => void;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read a required source in full, once
 */
export function readLines(path: string): string[] {
  try {
    return readFileSync(path, 'utf-8').split('\n');
  } catch (error) {
    throw SourceError.unreadable(path, toError(error));
  }
}

function parseWith<T>(path: string, lines: string[], parse: (lines: string[]) => T): T {
  try {
    return parse(lines);
  } catch (error) {
    if (error instanceof ParseError) {
      throw SourceError.malformed(path, error);
    }
    throw error;
  }
}

/**
 * Build the read-only report context from the system databases.
 * Every required source must be readable; login history is best effort.
 */
export async function loadSources(config: SourceConfig, deps: SourceLoaderDeps): Promise<ReportContext> {
  const passwdLines = readLines(config.passwdFile);
  const groupLines = readLines(config.groupFile);
  const thresholds = parseWith(config.defsFile, readLines(config.defsFile), loadThresholds);
  const sudoersLines = readLines(config.sudoersFile);

  const accounts = parseWith(config.passwdFile, passwdLines, parseAccountDatabase);

  const history = await deps.queryLoginHistory(config.wtmpFile);
  let logins: LoginHistoryIndex;
  if (history.ok) {
    logins = LoginHistoryIndex.fromLines(history.lines);
  } else {
    deps.warn(`Login history unavailable, last logins will show as not found: ${history.reason}`);
    logins = LoginHistoryIndex.empty();
  }

  return {
    accounts: Object.freeze(accounts),
    thresholds: Object.freeze(thresholds),
    privileges: new PrivilegeResolver(sudoersLines, groupLines),
    logins,
  };
}
