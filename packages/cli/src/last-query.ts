import { execFile } from 'child_process';
import { TextDecoder } from 'util';

export type LoginHistoryResult = { ok: true; lines: string[] } | { ok: false; reason: string };

/**
 * Produces the raw login history lines for a wtmp-style log.
 * Never rejects: failures come back as `{ ok: false }`.
 */
export type LoginHistoryQuery = (logPath: string) => Promise<LoginHistoryResult>;

export type CommandRunner = (command: string, args: string[], timeoutMs: number) => Promise<Buffer>;

export interface LastQueryOptions {
  command?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

const DEFAULT_TIMEOUT_MS = 10000;
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/**
 * Run a command to completion and collect its standard output
 */
export function runCommand(
  command: string,
  args: string[],
  timeoutMs: number,
  maxOutputBytes: number = MAX_OUTPUT_BYTES,
): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    execFile(
      command,
      args,
      { encoding: 'buffer', timeout: timeoutMs, maxBuffer: maxOutputBytes, windowsHide: true },
      (error, stdout) => {
        if (error) {
          // the child is also killed when it overruns maxBuffer; code is typed numeric in older @types/node
          if (String(error.code) === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
            reject(new Error(`${command} output exceeded ${maxOutputBytes} bytes`));
          } else if (error.killed) {
            reject(new Error(`${command} timed out after ${timeoutMs}ms`));
          } else {
            reject(error);
          }
          return;
        }
        resolve(stdout);
      },
    );
  });
}

// full user names, numeric addresses, read from the given file
export function buildLastArgs(logPath: string): string[] {
  return ['-w', '-i', '-f', logPath];
}

export function decodeOutput(stdout: Buffer): string {
  return new TextDecoder('utf-8', { fatal: true }).decode(stdout);
}

export function createLastQuery(options: LastQueryOptions = {}): LoginHistoryQuery {
  const command = options.command ?? 'last';
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const run = options.run ?? runCommand;

  return async (logPath) => {
    let stdout: Buffer;
    try {
      stdout = await run(command, buildLastArgs(logPath), timeoutMs);
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }

    let text: string;
    try {
      text = decodeOutput(stdout);
    } catch {
      return { ok: false, reason: `${command} output is not valid UTF-8` };
    }

    return { ok: true, lines: text.split('\n') };
  };
}
