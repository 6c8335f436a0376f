import { spawn, type ChildProcess } from 'child_process';
import readline from 'readline';
import { FatalEnvironmentError } from '../../utils/errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  code: number;
}

export interface RunOptions {
  // Called for every complete stdout line as it arrives
  onLine?: (line: string) => void;
}

const running = new Set<ChildProcess>();

/**
 * Runs an external tool and collects its output. A missing executable is
 * reported as a FatalEnvironmentError; a non-zero exit is left to the caller.
 *
 * The tool gets its own process group, so a Ctrl+C at the terminal reaches
 * only this process. Use killRunningCommands to stop it.
 */
export function runCommand(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], detached: true, windowsHide: true });
    running.add(proc);
    const lines: string[] = [];
    let stderr = '';

    const reader = readline.createInterface({ input: proc.stdout });
    reader.on('line', (line) => {
      lines.push(line);
      options.onLine?.(line);
    });

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    proc.on('error', (err: NodeJS.ErrnoException) => {
      running.delete(proc);
      if (err.code === 'ENOENT') {
        reject(new FatalEnvironmentError(`"${command}" was not found. Install it or pass its path explicitly.`, { cause: err }));
      } else {
        reject(err);
      }
    });

    proc.on('close', (code) => {
      running.delete(proc);
      resolve({ stdout: lines.join('\n'), stderr, code: code ?? 1 });
    });
  });
}

export function killRunningCommands(): void {
  for (const proc of running) {
    proc.kill('SIGTERM');
  }
}

// Last meaningful line of a tool's stderr, for user-facing messages
export function summarizeStderr(stderr: string): string {
  const lines = stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  const errorLine = [...lines].reverse().find((line) => line.startsWith('ERROR:'));
  return (errorLine ?? lines[lines.length - 1] ?? '').slice(0, 500);
}
