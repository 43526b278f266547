/**
 * Configuration interfaces for the userscope CLI
 */

import type { ReportMode, Verbosity } from '@userscope/core';

export interface SourceConfig {
  passwdFile: string;
  groupFile: string;
  sudoersFile: string;
  defsFile: string;
  wtmpFile: string;
  lastCommand: string;
  lastTimeoutMs: number;
}

export interface CLIOptions {
  version?: boolean;
  systemUsers?: boolean;
  users?: boolean;
  allUsers?: boolean;
  showFull?: boolean;
}

export interface ReportSelection {
  mode: ReportMode;
  verbosity: Verbosity;
  label: string;
}

export const VERSION = '1.0.0';
