import type { Account, ReportMode, ThresholdSet } from './types/accounts';

export function isSystemAccount(account: Account, thresholds: ThresholdSet): boolean {
  // no lower bound: anything at or below the ceiling counts as a system account
  return account.id <= thresholds.systemMax;
}

export function isRegularAccount(account: Account, thresholds: ThresholdSet): boolean {
  return thresholds.regularMin <= account.id && account.id <= thresholds.regularMax;
}

export function classifyAccounts(
  accounts: readonly Account[],
  thresholds: ThresholdSet,
  mode: ReportMode,
): Account[] {
  switch (mode) {
    case 'system':
      return accounts.filter((account) => isSystemAccount(account, thresholds));
    case 'regular':
      return accounts.filter((account) => isRegularAccount(account, thresholds));
    case 'all':
      return [...accounts];
  }
}
