/**
 * Raised when a line of a system database cannot be interpreted.
 * `line` is 1-based and refers to the original input, blank lines included.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    readonly line: number,
  ) {
    super(`line ${line}: ${message}`);
    this.name = 'ParseError';
  }
}
