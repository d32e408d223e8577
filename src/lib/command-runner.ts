import { spawn } from 'child_process';
import { CommandError } from '../installers/types';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  input?: string;
}

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

/**
 * Runs a process to completion, feeding `input` on stdin and capturing output.
 * A non-zero exit is returned to the caller; failing to start rejects.
 */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      child.stdout.setEncoding('utf8');
      child.stderr.setEncoding('utf8');
      child.stdout.on('data', (chunk: string) => (stdout += chunk));
      child.stderr.on('data', (chunk: string) => (stderr += chunk));

      child.on('error', error => {
        reject(new CommandError(`Failed to start ${command}: ${error.message}`, command, null));
      });
      child.on('close', exitCode => resolve({ exitCode, stdout, stderr }));
      // EPIPE when the process exits without reading its input
      child.stdin.on('error', error => {
        reject(new CommandError(`Failed to write input to ${command}: ${error.message}`, command, null));
      });

      child.stdin.end(options.input ?? '');
    });
  }
}

/**
 * Run and throw CommandError on a non-zero exit
 */
export async function runChecked(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandError(
      `${[command, ...args].join(' ')} exited with code ${result.exitCode}`,
      command,
      result.exitCode,
      { stdout: result.stdout, stderr: result.stderr }
    );
  }
  return result;
}
