import { DEFAULT_THRESHOLDS, ThresholdSet } from './types/accounts';
import { ParseError } from './errors';

const THRESHOLD_KEYS: Record<string, keyof ThresholdSet> = {
  UID_MIN: 'regularMin',
  UID_MAX: 'regularMax',
  SYS_UID_MIN: 'systemMin',
  SYS_UID_MAX: 'systemMax',
};

const INTEGER = /^[+-]?\d+$/;

/**
 * Read account id boundaries from login.defs-style `KEY VALUE` lines.
 * Keys that are not present keep their default; unknown keys are ignored.
 * A recognized key without an integer value fails the whole load.
 */
export function loadThresholds(lines: readonly string[]): ThresholdSet {
  const thresholds: ThresholdSet = { ...DEFAULT_THRESHOLDS };

  lines.forEach((raw, index) => {
    const line = raw.trim();
    if (!line) return;

    const [key, value] = line.split(/\s+/);
    const field = Object.prototype.hasOwnProperty.call(THRESHOLD_KEYS, key) ? THRESHOLD_KEYS[key] : undefined;
    if (!field) return;

    if (value === undefined || !INTEGER.test(value)) {
      throw new ParseError(`${key} must be an integer, got ${value === undefined ? 'nothing' : `"${value}"`}`, index + 1);
    }
    const parsed = parseInt(value, 10);
    if (!Number.isSafeInteger(parsed)) {
      throw new ParseError(`${key} value ${value} is out of range`, index + 1);
    }
    thresholds[field] = parsed;
  });

  return thresholds;
}
