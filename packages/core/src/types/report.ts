import type { Account, ThresholdSet } from './accounts';

export type SudoFlag = 'yes' | 'no';

export type StandardRow = [
  id: number,
  name: string,
  home: string,
  shell: string,
  sudo: SudoFlag,
  lastLogin: string,
];

export type FullRow = [
  id: number,
  name: string,
  groupId: number,
  comment: string,
  home: string,
  shell: string,
  sudo: SudoFlag,
  lastLogin: string,
];

export type ReportRow = StandardRow | FullRow;

export type TableCell = string | number;

export const HEADER_STANDARD: readonly string[] = ['ID', 'User', 'Home', 'Shell', 'Sudo', 'Last Login'];

export const HEADER_FULL: readonly string[] = [
  'ID',
  'User',
  'Group ID',
  'GECOS',
  'Home',
  'Shell',
  'Sudo',
  'Last Login',
];

export interface PrivilegeLookup {
  isPrivileged(name: string): boolean;
}

export interface LoginLookup {
  lastLogin(name: string): string;
}

/**
 * Everything the report needs, built once at startup and shared read-only
 */
export interface ReportContext {
  accounts: readonly Account[];
  thresholds: Readonly<ThresholdSet>;
  privileges: PrivilegeLookup;
  logins: LoginLookup;
}
