import execa from 'execa';

export interface ExecResult {
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal or never started */
  exitCode: number | null;
  signal?: string;
  command: string;
}

export interface ExecOptions {
  /** Share the parent's stdio instead of capturing output */
  inherit?: boolean;
}

export type ExecFn = (command: string, args: string[], options?: ExecOptions) => Promise<ExecResult>;

/**
 * Run a command without rejecting on non-zero exit
 * Throws only when the child cannot be spawned synchronously
 */
export const run: ExecFn = async (command, args, options) => {
  const result = await execa(command, args, {
    stdio: options?.inherit ? 'inherit' : 'pipe',
    reject: false,
  });
  return {
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
    exitCode: typeof result.exitCode === 'number' ? result.exitCode : null,
    signal: result.signal ?? undefined,
    command: result.command,
  };
};
