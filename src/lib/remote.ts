import { execFile } from 'child_process';
import { logger } from './logger.js';
import type { RemoteError, RemoteErrorKind, RemoteResult } from './types.js';

export interface RemoteExecutor {
  execute(host: string, command: string, timeoutMs?: number): Promise<RemoteResult>;
}

export interface SshOptions {
  binary: string;
  username: string;
  timeoutSeconds: number;
  keyFile: string;
  options: string[]; // passed to ssh verbatim, before the target
}

export type ProcessOutcome =
  | { status: 'exited'; exitCode: number; stdout: string; stderr: string }
  | { status: 'timeout'; stdout: string; stderr: string }
  | { status: 'failed'; message: string; stderr: string };

export type ProcessRunner = (file: string, args: string[], timeoutMs: number) => Promise<ProcessOutcome>;

const MAX_OUTPUT_BYTES = 4 * 1024 * 1024;

export const runProcess: ProcessRunner = (file, args, timeoutMs) => {
  return new Promise(resolve => {
    try {
      execFile(
        file,
        args,
        { encoding: 'utf8', timeout: timeoutMs, maxBuffer: MAX_OUTPUT_BYTES, windowsHide: true },
        (err, stdout, stderr) => {
          if (!err) {
            resolve({ status: 'exited', exitCode: 0, stdout, stderr });
            return;
          }

          if (err.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
            resolve({ status: 'failed', message: 'output too large', stderr });
          } else if (err.killed) {
            // execFile only kills the child on its own when the timeout fires
            resolve({ status: 'timeout', stdout, stderr });
          } else if (typeof err.code === 'number') {
            resolve({ status: 'exited', exitCode: err.code, stdout, stderr });
          } else if (err.signal) {
            resolve({ status: 'failed', message: `terminated by ${err.signal}`, stderr });
          } else {
            // spawn errors like ENOENT when ssh isn't installed
            resolve({ status: 'failed', message: err.message, stderr });
          }
        }
      );
    } catch (err) {
      // execFile throws synchronously on bad arguments, e.g. a NUL byte in the command
      resolve({ status: 'failed', message: err instanceof Error ? err.message : String(err), stderr: '' });
    }
  });
};

function remoteError(kind: RemoteErrorKind, host: string, message: string): RemoteResult {
  return { ok: false, error: { kind, host, message } };
}

// ssh reports its own connection problems on stderr with exit 255,
// everything else is the remote command's business
export function classifyFailure(host: string, stderr: string): RemoteError {
  if (stderr.includes('Could not resolve hostname')) {
    return { kind: 'UnknownHost', host, message: `Unknown host: ${host}` };
  }
  if (stderr.includes('Connection refused')) {
    return { kind: 'ConnectionRefused', host, message: `Connection refused to ${host}` };
  }
  if (stderr.includes('Permission denied')) {
    return { kind: 'PermissionDenied', host, message: `Permission denied for ${host}` };
  }
  return { kind: 'RemoteCommandError', host, message: `SSH error: ${stderr.trim()}` };
}

export class SshExecutor implements RemoteExecutor {
  private options: SshOptions;
  private run: ProcessRunner;

  constructor(options: SshOptions, run: ProcessRunner = runProcess) {
    this.options = options;
    this.run = run;
  }

  buildArgs(host: string, command: string): string[] {
    const args = [...this.options.options, '-o', `ConnectTimeout=${this.options.timeoutSeconds}`];

    if (this.options.keyFile) {
      args.push('-i', this.options.keyFile);
    }

    args.push(this.options.username ? `${this.options.username}@${host}` : host);
    args.push(command);
    return args;
  }

  async execute(
    host: string,
    command: string,
    timeoutMs: number = this.options.timeoutSeconds * 1000
  ): Promise<RemoteResult> {
    const outcome = await this.run(this.options.binary, this.buildArgs(host, command), timeoutMs);

    switch (outcome.status) {
      case 'timeout':
        logger.debug({ host, command, timeoutMs }, 'remote command timed out');
        return remoteError('Timeout', host, `Connection timeout to ${host}`);

      case 'failed':
        logger.debug({ host, command, reason: outcome.message }, 'could not run ssh');
        return remoteError('RemoteCommandError', host, `SSH error: ${outcome.message}`);

      case 'exited':
        if (outcome.exitCode !== 0) {
          const error = classifyFailure(host, outcome.stderr);
          logger.debug({ host, command, exitCode: outcome.exitCode, kind: error.kind }, 'remote command failed');
          return { ok: false, error };
        }
        return { ok: true, output: outcome.stdout.trim() };
    }
  }
}
