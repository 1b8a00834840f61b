import { spawn } from 'node:child_process';

export class CommandError extends Error {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(command: string, args: readonly string[], exitCode: number, stderr: Buffer) {
    super(`Command "${command} ${args.join(' ')}" failed with exit code ${exitCode}`);
    this.name = 'CommandError';
    this.command = command;
    this.args = [...args];
    this.exitCode = exitCode;
    this.stderr = stderr.toString('utf8');
  }
}

/** Runs `command`, piping `input` to its stdin, and resolves with its stdout. */
export const pipeToCommand = async (
  command: string,
  args: readonly string[],
  input: Uint8Array,
): Promise<Buffer> => {
  const child = spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'] });
  const stdoutChunks: Buffer[] = [];
  const stderrChunks: Buffer[] = [];
  child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
  child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.once('error', reject);
    child.once('close', (code) => resolve(code ?? -1));
    child.stdin.end(input);
  });

  if (exitCode !== 0) {
    throw new CommandError(command, args, exitCode, Buffer.concat(stderrChunks));
  }
  return Buffer.concat(stdoutChunks);
};
