import type { Account, ReportMode, Verbosity } from './types/accounts';
import {
  FullRow,
  HEADER_FULL,
  HEADER_STANDARD,
  ReportContext,
  ReportRow,
  StandardRow,
  SudoFlag,
} from './types/report';
import { classifyAccounts } from './classifier';
import { charLength } from './table';

const COMMENT_LIMIT = 18;
const COMMENT_KEEP = 16;
const EMPTY_COMMENT = 'None';

/**
 * Shorten the comment (GECOS) field so a single long entry does not widen
 * every column of the table.
 */
export function truncateComment(comment: string): string {
  const truncated =
    charLength(comment) > COMMENT_LIMIT ? `${Array.from(comment).slice(0, COMMENT_KEEP).join('')}..` : comment;
  return truncated === '' ? EMPTY_COMMENT : truncated;
}

export function headerFor(verbosity: Verbosity): readonly string[] {
  return verbosity === 'full' ? HEADER_FULL : HEADER_STANDARD;
}

function buildRow(account: Account, context: ReportContext, verbosity: Verbosity): ReportRow {
  const sudo: SudoFlag = context.privileges.isPrivileged(account.name) ? 'yes' : 'no';
  const lastLogin = context.logins.lastLogin(account.name);

  if (verbosity === 'full') {
    const row: FullRow = [
      account.id,
      account.name,
      account.groupId,
      truncateComment(account.comment),
      account.homeDirectory,
      account.shell,
      sudo,
      lastLogin,
    ];
    return row;
  }

  const row: StandardRow = [account.id, account.name, account.homeDirectory, account.shell, sudo, lastLogin];
  return row;
}

export interface Report {
  mode: ReportMode;
  verbosity: Verbosity;
  header: readonly string[];
  rows: ReportRow[];
}

export function buildReport(context: ReportContext, mode: ReportMode, verbosity: Verbosity): Report {
  const accounts = classifyAccounts(context.accounts, context.thresholds, mode);

  return {
    mode,
    verbosity,
    header: headerFor(verbosity),
    rows: accounts.map((account) => buildRow(account, context, verbosity)),
  };
}
