export interface Account {
  id: number;
  name: string;
  groupId: number;
  comment: string;
  homeDirectory: string;
  shell: string;
}

export interface ThresholdSet {
  regularMin: number;
  regularMax: number;
  systemMin: number;
  systemMax: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ThresholdSet> = Object.freeze({
  regularMin: 1000,
  regularMax: 60000,
  systemMin: 0,
  systemMax: 999,
});

export interface LoginRecord {
  name: string;
  // weekday, month, day, time as printed by the history source
  fields: readonly [string, string, string, string];
}

export type ReportMode = 'system' | 'regular' | 'all';

export type Verbosity = 'standard' | 'full';
