import type { Account } from './types/accounts';
import { ParseError } from './errors';

const PASSWD_FIELDS = 7;
const INTEGER = /^[+-]?\d+$/;

function parseId(value: string, label: string, line: number): number {
  if (!INTEGER.test(value)) {
    throw new ParseError(`${label} "${value}" is not a number`, line);
  }
  const id = parseInt(value, 10);
  if (!Number.isSafeInteger(id)) {
    throw new ParseError(`${label} "${value}" is out of range`, line);
  }
  return id;
}

/**
 * Parse passwd(5) records: name:password:uid:gid:comment:home:shell.
 * Blank lines are skipped; anything else that does not fit the format is an error.
 */
export function parseAccountDatabase(lines: readonly string[]): Account[] {
  const accounts: Account[] = [];

  lines.forEach((raw, index) => {
    const line = raw.replace(/\r$/, '');
    if (!line.trim()) return;

    const lineNumber = index + 1;
    const fields = line.split(':');
    if (fields.length !== PASSWD_FIELDS) {
      throw new ParseError(`expected ${PASSWD_FIELDS} fields, found ${fields.length}`, lineNumber);
    }

    const [name, , uid, gid, comment, homeDirectory, shell] = fields;
    if (!name) {
      throw new ParseError('empty account name', lineNumber);
    }

    accounts.push({
      id: parseId(uid, 'uid', lineNumber),
      name,
      groupId: parseId(gid, 'gid', lineNumber),
      comment,
      homeDirectory,
      shell,
    });
  });

  return accounts;
}
