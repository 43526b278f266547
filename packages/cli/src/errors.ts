export type SourceErrorCategory =
  | 'not_found'
  | 'permission_denied'
  | 'is_directory'
  | 'unknown';

export function categorizeSourceError(error: Error): SourceErrorCategory {
  const msg = error.message || '';

  if (/ENOENT/.test(msg)) return 'not_found';
  if (/EACCES|EPERM/.test(msg)) return 'permission_denied';
  if (/EISDIR/.test(msg)) return 'is_directory';

  return 'unknown';
}

const CATEGORY_TEXT: Record<SourceErrorCategory, string> = {
  not_found: 'no such file',
  permission_denied: 'permission denied',
  is_directory: 'is a directory',
  unknown: 'read failed',
};

export type SourceErrorKind = 'unreadable' | 'malformed';

/**
 * A required system database could not be read or understood.
 * The run stops before any report is produced.
 */
export class SourceError extends Error {
  constructor(
    readonly kind: SourceErrorKind,
    readonly path: string,
    readonly reason: string,
  ) {
    super(kind === 'unreadable' ? `Unable to open ${path}` : `Malformed ${path}`);
    this.name = 'SourceError';
  }

  static unreadable(path: string, cause: Error): SourceError {
    return new SourceError('unreadable', path, CATEGORY_TEXT[categorizeSourceError(cause)]);
  }

  static malformed(path: string, cause: Error): SourceError {
    return new SourceError('malformed', path, cause.message);
  }

  describe(): string {
    return `${this.message} (${this.reason})`;
  }
}
