// Sandbox launcher
// Starts one short-lived Node.js process per execution and exchanges a single JSON message with it

import { spawn } from 'node:child_process';
import { tmpdir } from 'node:os';
import { z } from 'zod';
import { RUNNER_SOURCE } from './runner-source.js';

export interface RunnerRequest {
  script: string;
  /** Module specifier -> absolute entry path, loaded before the script runs */
  modules: Record<string, string>;
  modulesGlobal: string;
  outputName: string;
  timeoutMs: number;
}

const RunnerReplySchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    hasResult: z.boolean(),
    result: z.string(),
    printed: z.array(z.string()),
  }),
  z.object({
    ok: z.literal(false),
    errorName: z.string(),
    error: z.string(),
  }),
]);

export type RunnerReply = z.infer<typeof RunnerReplySchema>;

export interface SandboxLauncher {
  launch(request: RunnerRequest): Promise<RunnerReply>;
}

export interface ProcessLauncherOptions {
  memoryMb: number;
  /** Run the child under Node's permission model; fs reads are granted only to `readPaths` */
  permissionModel: boolean;
  readPaths?: string[];
  /** Extra time the child gets on top of the script timeout for start-up and module loading */
  graceMs?: number;
  maxReplyBytes?: number;
}

const DEFAULT_GRACE_MS = 5000;
const DEFAULT_MAX_REPLY_BYTES = 1024 * 1024;

export class ProcessSandboxLauncher implements SandboxLauncher {
  private readonly options: ProcessLauncherOptions;

  constructor(options: ProcessLauncherOptions) {
    this.options = options;
  }

  buildArgs(): string[] {
    const args = ['--no-warnings', `--max-old-space-size=${this.options.memoryMb}`];
    if (this.options.permissionModel) {
      args.push('--experimental-permission');
      for (const path of this.options.readPaths ?? []) {
        args.push(`--allow-fs-read=${path}`);
      }
    }
    args.push('-e', RUNNER_SOURCE);
    return args;
  }

  launch(request: RunnerRequest): Promise<RunnerReply> {
    const maxReplyBytes = this.options.maxReplyBytes ?? DEFAULT_MAX_REPLY_BYTES;
    const killAfterMs = request.timeoutMs + (this.options.graceMs ?? DEFAULT_GRACE_MS);

    return new Promise<RunnerReply>((resolve, reject) => {
      const child = spawn(process.execPath, this.buildArgs(), {
        cwd: tmpdir(),
        env: {},
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];
      let received = 0;
      let failure: RunnerReply | null = null;

      const timer = setTimeout(() => {
        failure = { ok: false, errorName: 'TimeoutError', error: `Execution exceeded ${killAfterMs}ms` };
        child.kill('SIGKILL');
      }, killAfterMs);

      child.stdout.on('data', (chunk: Buffer) => {
        received += chunk.length;
        if (received > maxReplyBytes) {
          failure = { ok: false, errorName: 'RangeError', error: `Output exceeded ${maxReplyBytes} bytes` };
          child.kill('SIGKILL');
          return;
        }
        stdout.push(chunk);
      });
      child.stderr.on('data', (chunk: Buffer) => {
        stderr.push(chunk);
      });

      child.on('error', error => {
        clearTimeout(timer);
        reject(error);
      });

      child.on('close', (code, signal) => {
        clearTimeout(timer);
        if (failure) {
          resolve(failure);
          return;
        }

        const raw = Buffer.concat(stdout).toString('utf8');
        let parsed: unknown;
        try {
          parsed = JSON.parse(raw);
        } catch {
          parsed = undefined;
        }

        const reply = RunnerReplySchema.safeParse(parsed);
        if (reply.success) {
          resolve(reply.data);
          return;
        }

        // The child died before replying: out of memory, permission denial while loading, or a signal
        const detail = Buffer.concat(stderr).toString('utf8').trim().split('\n').slice(-3).join('\n');
        resolve({
          ok: false,
          errorName: 'ProcessError',
          error: detail || `Sandbox process exited with ${signal ?? `code ${code}`}`,
        });
      });

      // The child may exit before reading stdin (EPIPE); the close handler reports the exit
      child.stdin.on('error', error => {
        stderr.push(Buffer.from(error.message));
      });
      child.stdin.end(JSON.stringify(request));
    });
  }
}
