import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);
const DEFAULT_TIMEOUT_MS = 60_000;
const MAX_OUTPUT_LENGTH = 2_000;

export interface CommandOutput {
  stdout: string;
  stderr: string;
}

/** Runs an executable without a shell. Rejects on spawn failure or non-zero exit. */
export type CommandRunner = (executable: string, args: readonly string[]) => Promise<CommandOutput>;

interface ExecError extends Error {
  code?: number | string;
  stderr?: string;
}

function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_LENGTH) {
    return output;
  }
  return `${output.slice(0, MAX_OUTPUT_LENGTH)}\n...[truncated]`;
}

export function createCommandRunner(timeoutMs: number = DEFAULT_TIMEOUT_MS): CommandRunner {
  return async (executable, args) => {
    const { stdout, stderr } = await execFileAsync(executable, [...args], {
      timeout: timeoutMs,
      windowsHide: true,
      encoding: 'utf8',
    });
    return { stdout: truncateOutput(stdout), stderr: truncateOutput(stderr) };
  };
}

/** Exit code (or spawn error code such as 'ENOENT') of a failed command. */
export function commandErrorCode(err: unknown): number | string | undefined {
  if (!(err instanceof Error)) return undefined;
  const execError: ExecError = err;
  return execError.code;
}

/** Human-readable reason for a failed command, preferring the tool's stderr. */
export function describeCommandError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);

  const execError: ExecError = err;
  if (execError.code === 'ENOENT') {
    return 'executable not found';
  }
  const stderr = execError.stderr?.trim();
  return stderr ? truncateOutput(stderr) : execError.message;
}
