import { execFile } from 'child_process';
import { z } from 'zod';
import { logger } from '../utils/logger.js';

// Input schemas for the bash tool
export const runCommandInputSchema = z.object({
  command: z
    .string()
    .min(1)
    .max(10000)
    .describe('Shell command to run with bash -c'),
  timeout_ms: z
    .number()
    .int()
    .min(1)
    .max(300000)
    .optional()
    .describe('Kill the command after this many milliseconds (default: server setting)'),
  cwd: z
    .string()
    .min(1)
    .max(4096)
    .optional()
    .describe('Working directory (default: the server process working directory)'),
});

export type RunCommandInput = z.infer<typeof runCommandInputSchema>;

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  truncated: boolean;
}

export interface RunOptions {
  timeoutMs: number;
  maxOutputBytes: number;
  cwd?: string;
}

export type CommandRunner = (command: string, options: RunOptions) => Promise<CommandResult>;

/**
 * Run a command through `bash -c`. A non-zero exit, a timeout or an output overflow
 * resolve with a result; only a failure to start the shell rejects.
 */
export const runShellCommand: CommandRunner = (command, options) =>
  new Promise((resolve, reject) => {
    execFile(
      'bash',
      ['-c', command],
      {
        cwd: options.cwd,
        timeout: options.timeoutMs,
        maxBuffer: options.maxOutputBytes,
        encoding: 'utf8',
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0, signal: null, timedOut: false, truncated: false });
          return;
        }

        const signal = error.signal ?? null;

        if (error.code === 'ERR_CHILD_PROCESS_STDIO_MAXBUFFER') {
          resolve({ stdout, stderr, exitCode: null, signal, timedOut: false, truncated: true });
          return;
        }

        if (error.killed) {
          resolve({ stdout, stderr, exitCode: null, signal, timedOut: true, truncated: false });
          return;
        }

        if (typeof error.code === 'number') {
          resolve({ stdout, stderr, exitCode: error.code, signal, timedOut: false, truncated: false });
          return;
        }

        if (signal) {
          resolve({ stdout, stderr, exitCode: null, signal, timedOut: false, truncated: false });
          return;
        }

        reject(error);
      }
    );
  });

// Tool definitions for MCP
export const bashToolDefinitions = [
  {
    name: 'bash',
    description:
      'Run a shell command on the server with bash -c and return its stdout, stderr and exit code. ' +
      'Commands run non-interactively; anything reading from stdin receives EOF.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        command: {
          type: 'string',
          description: 'Shell command to run with bash -c',
        },
        timeout_ms: {
          type: 'number',
          description: 'Kill the command after this many milliseconds (1-300000)',
        },
        cwd: {
          type: 'string',
          description: 'Working directory for the command',
        },
      },
      required: ['command'],
    },
  },
];

export interface BashToolsOptions {
  defaultTimeoutMs: number;
  maxOutputBytes: number;
}

// Tool implementations
export class BashTools {
  constructor(
    private readonly options: BashToolsOptions,
    private readonly runner: CommandRunner = runShellCommand,
  ) {}

  /**
   * Run a shell command
   */
  async runCommand(input: RunCommandInput): Promise<CommandResult> {
    const validated = runCommandInputSchema.parse(input);

    const started = Date.now();
    const result = await this.runner(validated.command, {
      timeoutMs: validated.timeout_ms ?? this.options.defaultTimeoutMs,
      maxOutputBytes: this.options.maxOutputBytes,
      cwd: validated.cwd,
    });

    logger.debug(
      { exitCode: result.exitCode, timedOut: result.timedOut, durationMs: Date.now() - started },
      'Command finished'
    );

    return result;
  }
}
