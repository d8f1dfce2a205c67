/**
 * Transfer primitive backed by the rclone command line tool
 */

import { spawn } from 'child_process';
import { mkdir } from 'fs/promises';
import { setTimeout as delay } from 'timers/promises';
import pRetry, { AbortError } from 'p-retry';
import { errorMessage, logger } from '../logger.js';
import type { TransferPrimitive, TransferRequest, TransferResult } from '../types.js';

export interface CommandResult {
  exitCode: number | null;
  stderr: string;
  timedOut: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: { timeoutMs: number; signal?: AbortSignal }
) => Promise<CommandResult>;

export interface RcloneTransferOptions {
  remote: string;
  command?: string;
  extraArgs?: string[];
  retries?: number;
  /** Wait before retry n is n times this */
  retryDelayMs?: number;
  timeoutMs?: number;
  runCommand?: CommandRunner;
}

const STDERR_TAIL = 2000;

export class TransferCommandError extends Error {
  constructor(message: string, readonly exitCode: number | null) {
    super(message);
    this.name = 'TransferCommandError';
  }
}

export const spawnCommand: CommandRunner = (command, args, { timeoutMs, signal }) =>
  new Promise((resolvePromise, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });
    let stderr = '';
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGTERM');
    }, timeoutMs);

    const onAbort = () => child.kill('SIGTERM');
    signal?.addEventListener('abort', onAbort, { once: true });

    child.stderr?.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL);
    });

    child.on('error', error => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      reject(error);
    });

    child.on('close', code => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolvePromise({ exitCode: code, stderr, timedOut });
    });
  });

export class RcloneTransfer implements TransferPrimitive {
  private readonly command: string;
  private readonly extraArgs: string[];
  private readonly retries: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly runCommand: CommandRunner;

  constructor(private readonly options: RcloneTransferOptions) {
    this.command = options.command ?? 'rclone';
    this.extraArgs = options.extraArgs ?? [];
    this.retries = Math.max(0, options.retries ?? 3);
    this.retryDelayMs = Math.max(0, options.retryDelayMs ?? 15000);
    this.timeoutMs = options.timeoutMs ?? 6 * 60 * 60 * 1000;
    this.runCommand = options.runCommand ?? spawnCommand;
  }

  buildArgs(request: TransferRequest): string[] {
    const args = ['copy', `${this.options.remote}:`, request.destination];
    if (request.link.remoteId) {
      args.push(`--drive-root-folder-id=${request.link.remoteId}`);
    }
    return [...args, ...this.extraArgs];
  }

  async transfer(request: TransferRequest, signal?: AbortSignal): Promise<TransferResult> {
    if (!request.link.remoteId) {
      return { ok: false, exitCode: null, detail: `No folder id in link ${request.link.url}` };
    }

    await mkdir(request.destination, { recursive: true });
    const args = this.buildArgs(request);
    const context = `${request.course} / ${request.assetType}`;

    try {
      const exitCode = await pRetry(
        async () => {
          if (signal?.aborted) {
            throw new AbortError('Transfer cancelled');
          }
          const result = await this.runCommand(this.command, args, { timeoutMs: this.timeoutMs, signal });
          if (signal?.aborted) {
            throw new AbortError('Transfer cancelled');
          }
          if (result.timedOut) {
            throw new TransferCommandError(`Timed out after ${this.timeoutMs}ms`, result.exitCode);
          }
          if (result.exitCode !== 0) {
            const stderr = result.stderr.trim();
            throw new TransferCommandError(
              `${this.command} exited with ${result.exitCode}${stderr ? `: ${stderr}` : ''}`,
              result.exitCode
            );
          }
          return result.exitCode;
        },
        {
          retries: this.retries,
          minTimeout: 0,
          maxTimeout: 0,
          onFailedAttempt: async error => {
            logger.warn(
              `Transfer attempt ${error.attemptNumber} failed for ${context}: ${error.message}`,
              { retriesLeft: error.retriesLeft },
              'RcloneTransfer'
            );
            if (error.retriesLeft > 0 && this.retryDelayMs > 0) {
              await delay(this.retryDelayMs * error.attemptNumber, undefined, { signal });
            }
          },
        }
      );
      return { ok: true, exitCode };
    } catch (error) {
      const exitCode = error instanceof TransferCommandError ? error.exitCode : null;
      return { ok: false, exitCode, detail: errorMessage(error) };
    }
  }
}
