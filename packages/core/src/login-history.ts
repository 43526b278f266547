import type { LoginRecord } from './types/accounts';
import type { LoginLookup } from './types/report';

export const NO_LOGIN_FOUND = 'None found';

// name, terminal, host, then weekday month day time
const MIN_FIELDS = 7;

export function parseLoginHistory(lines: readonly string[]): LoginRecord[] {
  const records: LoginRecord[] = [];

  for (const line of lines) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < MIN_FIELDS) continue;

    records.push({
      name: fields[0],
      fields: [fields[3], fields[4], fields[5], fields[6]],
    });
  }

  return records;
}

/**
 * Login history in the order the history source printed it, most recent first.
 * Lookups return the first entry for a name.
 */
export class LoginHistoryIndex implements LoginLookup {
  private readonly records: readonly LoginRecord[];

  constructor(records: readonly LoginRecord[]) {
    this.records = Object.freeze([...records]);
  }

  static fromLines(lines: readonly string[]): LoginHistoryIndex {
    return new LoginHistoryIndex(parseLoginHistory(lines));
  }

  static empty(): LoginHistoryIndex {
    return new LoginHistoryIndex([]);
  }

  get size(): number {
    return this.records.length;
  }

  lastLogin(name: string): string {
    const record = this.records.find((entry) => entry.name === name);
    return record ? record.fields.join(' ') : NO_LOGIN_FOUND;
  }
}
