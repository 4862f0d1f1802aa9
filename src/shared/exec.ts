import execa, { type ExecaReturnValue } from 'execa';
import { GenApiError, GenApiErrorCode } from './errors.js';

export interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  signal?: string;
}

export interface RunOptions {
  cwd?: string;
  // 'inherit' hands the terminal to the child; stdout/stderr come back empty.
  stdio?: 'inherit' | 'pipe';
}

export type Runner = (commandLine: string, options?: RunOptions) => Promise<ExecResult>;

// Runs a complete command line through the system shell, exactly as given.
// Interpolated values are not escaped.
export async function run(commandLine: string, options?: RunOptions): Promise<ExecResult> {
  let result: ExecaReturnValue;
  try {
    result = await execa(commandLine, {
      shell: true,
      cwd: options?.cwd,
      stdio: options?.stdio ?? 'pipe',
      reject: false,
    });
  } catch (err) {
    throw new GenApiError(GenApiErrorCode.SPAWN_FAILED, `Command failed to spawn: ${commandLine}`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  // With reject: false a spawn error resolves instead of throwing; it carries neither
  // an exit code nor a signal.
  const hasExitCode = typeof result.exitCode === 'number';
  if (!hasExitCode && !result.signal) {
    throw new GenApiError(GenApiErrorCode.SPAWN_FAILED, `Command failed to spawn: ${commandLine}`, {
      command: result.command,
    });
  }

  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: hasExitCode ? result.exitCode : 128,
    signal: result.signal ?? undefined,
  };
}
