import { spawn, type ChildProcess } from 'child_process';
import { existsSync, statSync } from 'fs';
import { ProcessingError, ToolTimeoutError, ToolUnavailableError } from '../errors/index';
import { debug } from '../output/logger';
import type { CommandOutput, CommandRequest } from './types';

// Process groups exist only on POSIX
const USE_PROCESS_GROUP = process.platform !== 'win32';

/*
 * Spawns a tool and buffers both output streams. On timeout the whole
 * process group is killed and the promise rejects once the child has
 * exited, without waiting for descendants that still hold the pipes.
 */
export function runCommand(request: CommandRequest): Promise<CommandOutput> {
  return new Promise((resolve, reject) => {
    // spawn reports a missing cwd as ENOENT, which reads like a missing binary
    if (request.cwd !== undefined && !isDirectory(request.cwd)) {
      reject(new ProcessingError(`${request.tool}: working directory does not exist: ${request.cwd}`));
      return;
    }

    const child = spawn(request.command, request.args, {
      cwd: request.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      detached: USE_PROCESS_GROUP,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    let timedOut = false;
    let spawnError: NodeJS.ErrnoException | undefined;

    const settle = (finish: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      finish();
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killTree(child);
      child.stdout.destroy();
      child.stderr.destroy();
    }, request.timeoutMs);

    child.stdout.on('data', (data: Buffer) => {
      stdout.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr.push(data);
    });

    child.on('error', (error: NodeJS.ErrnoException) => {
      spawnError = error;
      // A process that never started emits no 'close'
      if (child.pid === undefined) {
        settle(() => reject(toSpawnError(request, error)));
      }
    });

    child.on('exit', () => {
      if (timedOut) {
        settle(() => reject(new ToolTimeoutError(request.tool, request.timeoutMs)));
      }
    });

    child.on('close', (code: number | null) => {
      settle(() => {
        if (timedOut) {
          reject(new ToolTimeoutError(request.tool, request.timeoutMs));
        } else if (spawnError) {
          reject(toSpawnError(request, spawnError));
        } else {
          resolve({
            exitCode: code,
            stdout: Buffer.concat(stdout).toString('utf8'),
            stderr: Buffer.concat(stderr).toString('utf8'),
          });
        }
      });
    });
  });
}

function isDirectory(dir: string): boolean {
  return existsSync(dir) && statSync(dir).isDirectory();
}

function killTree(child: ChildProcess): void {
  if (USE_PROCESS_GROUP && child.pid !== undefined) {
    try {
      process.kill(-child.pid, 'SIGKILL');
      return;
    } catch (e: unknown) {
      debug(`process group ${child.pid} already gone: ${e instanceof Error ? e.message : String(e)}`);
    }
  }
  child.kill('SIGKILL');
}

function toSpawnError(request: CommandRequest, error: NodeJS.ErrnoException): Error {
  if (error.code === 'ENOENT') {
    return new ToolUnavailableError(request.tool, request.command);
  }
  return new ProcessingError(`Failed to spawn ${request.tool}: ${error.message}`);
}
