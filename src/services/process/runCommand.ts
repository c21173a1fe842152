import { spawn } from 'node:child_process';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdin?: string;
  timeoutMs?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions
) => Promise<CommandResult>;

/**
 * Spawns a helper (osascript, pbcopy, the input-source tool) and settles once:
 * on a zero exit, a non-zero exit, a spawn error or the timeout, whichever
 * comes first.
 */
export const runCommand: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const startedAt = Date.now();
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: 'pipe'
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timeoutHandle: NodeJS.Timeout | undefined;

    const settle = (error: Error | undefined): void => {
      if (settled) {
        return;
      }

      settled = true;
      if (timeoutHandle) {
        clearTimeout(timeoutHandle);
      }

      if (error) {
        reject(error);
        return;
      }

      resolve({ stdout, stderr, durationMs: Date.now() - startedAt });
    };

    if (options.timeoutMs && options.timeoutMs > 0) {
      timeoutHandle = setTimeout(() => {
        child.kill('SIGKILL');
        settle(new Error(`Command timed out after ${options.timeoutMs}ms: ${command}`));
      }, options.timeoutMs);
    }

    child.stdout.on('data', (chunk) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk) => {
      stderr += chunk.toString();
    });

    child.on('error', (error) => {
      settle(error);
    });

    child.on('close', (code) => {
      if (code !== 0) {
        const suffix = stderr.trim() ? `\n${stderr.trim()}` : '';
        settle(new Error(`Command failed (${code}): ${command}${suffix}`));
        return;
      }

      settle(undefined);
    });

    if (options.stdin !== undefined) {
      child.stdin.end(options.stdin);
    }
  });
