// Sandbox Executor
// Runs untrusted JavaScript in a separate Node.js process with a module allow-list and a timeout

import { existsSync, readFileSync } from 'node:fs';
import { createRequire } from 'node:module';
import { dirname, join, sep } from 'node:path';
import { z } from 'zod';
import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/errors.js';
import { errorResult, okResult, type ExecutionResult } from '../tools/types.js';
import { guardCode, MODULES_GLOBAL } from './import-guard.js';
import { ProcessSandboxLauncher, type RunnerReply, type SandboxLauncher } from './launcher.js';

// Variable the code assigns its answer to
export const RESULT_VARIABLE = 'result';
export const NO_RESULT_MESSAGE = 'Code executed successfully (no result)';

export interface SandboxExecutorOptions {
  allowedModules: string[];
  timeoutMs: number;
  maxOutputLength: number;
  memoryMb: number;
  permissionModel: boolean;
  logger: Logger;
  launcher?: SandboxLauncher;
  /** Module specifier -> absolute path of a standalone bundle; defaults to `createBundleResolver()` */
  resolveModule?: (name: string) => string;
}

const PackageManifestSchema = z.object({
  name: z.string().optional(),
  unpkg: z.string().optional(),
  jsdelivr: z.string().optional(),
  browser: z.unknown().optional(),
});

/**
 * Resolve packages to the single-file build they publish for script tags
 * (`unpkg`, `jsdelivr` or a string `browser` field). The sandbox evaluates that
 * file inside its own context, so it must not require anything.
 */
export function createBundleResolver(base: string | URL = import.meta.url): (name: string) => string {
  const require = createRequire(base);

  return name => {
    let dir = dirname(require.resolve(name));
    for (;;) {
      const manifestPath = join(dir, 'package.json');
      if (existsSync(manifestPath)) {
        const manifest = PackageManifestSchema.parse(JSON.parse(readFileSync(manifestPath, 'utf8')));
        if (manifest.name === name) {
          const bundle = manifest.unpkg ?? manifest.jsdelivr ?? (typeof manifest.browser === 'string' ? manifest.browser : undefined);
          if (!bundle) {
            throw new Error(`Package '${name}' publishes no standalone bundle`);
          }
          return join(dir, bundle);
        }
      }
      const parent = dirname(dir);
      if (parent === dir) {
        throw new Error(`Cannot find the package.json of '${name}'`);
      }
      dir = parent;
    }
  };
}

// Printed lines come first; a result assigned alongside them is labelled
export function formatSandboxOutput(hasResult: boolean, result: string, printed: readonly string[]): string {
  const text = printed.join('\n');
  if (!hasResult) return text || NO_RESULT_MESSAGE;
  return text ? `${text}\n\nResult: ${result}` : result;
}

// Directory the permission model must let the child read for a resolved module entry
function readPathFor(entry: string): string {
  const marker = `${sep}node_modules${sep}`;
  const index = entry.indexOf(marker);
  const root = index === -1 ? dirname(entry) : entry.slice(0, index + marker.length - 1);
  return join(root, '*');
}

export class SandboxExecutor {
  private readonly allowedModules: string[];
  private readonly timeoutMs: number;
  private readonly maxOutputLength: number;
  private readonly logger: Logger;
  private readonly launcher: SandboxLauncher;
  private readonly modulePaths = new Map<string, string>();

  constructor(options: SandboxExecutorOptions) {
    this.allowedModules = options.allowedModules;
    this.timeoutMs = options.timeoutMs;
    this.maxOutputLength = options.maxOutputLength;
    this.logger = options.logger.child({ component: 'sandbox' });

    const resolveModule = options.resolveModule ?? createBundleResolver();
    for (const name of this.allowedModules) {
      try {
        this.modulePaths.set(name, resolveModule(name));
      } catch (error) {
        this.logger.warn({ module: name, error: errorMessage(error) }, 'Allowed module could not be resolved');
      }
    }

    this.launcher =
      options.launcher ??
      new ProcessSandboxLauncher({
        memoryMb: options.memoryMb,
        permissionModel: options.permissionModel,
        readPaths: [...new Set(Array.from(this.modulePaths.values(), readPathFor))],
      });
  }

  /**
   * Run `code` and report what it printed and the value it left in `result`.
   *
   * Never throws: refused code is a ValidationError, anything that goes wrong
   * while running it is an ApplicationError.
   */
  async run(code: string): Promise<ExecutionResult> {
    const startTime = Date.now();

    if (!code.trim()) {
      return errorResult('ValidationError', 'Code is required');
    }

    const guarded = guardCode(code, this.allowedModules);
    if (!guarded.ok) {
      this.logger.warn({ reason: guarded.reason }, 'Sandbox refused code');
      return errorResult('ValidationError', guarded.reason);
    }

    const modules: Record<string, string> = {};
    for (const name of guarded.modules) {
      const path = this.modulePaths.get(name);
      if (!path) {
        return errorResult('ApplicationError', `Module '${name}' is allowed but not installed`);
      }
      modules[name] = path;
    }

    let reply: RunnerReply;
    try {
      reply = await this.launcher.launch({
        script: guarded.script,
        modules,
        modulesGlobal: MODULES_GLOBAL,
        outputName: RESULT_VARIABLE,
        timeoutMs: this.timeoutMs,
      });
    } catch (error) {
      this.logger.error({ error: errorMessage(error) }, 'Sandbox process failed to start');
      return errorResult('ApplicationError', `Sandbox failed to start: ${errorMessage(error)}`, {
        durationMs: Date.now() - startTime,
      });
    }

    const durationMs = Date.now() - startTime;

    if (!reply.ok) {
      this.logger.debug({ errorName: reply.errorName, durationMs }, 'Sandboxed code failed');
      return errorResult('ApplicationError', `${reply.errorName}: ${reply.error}`, { durationMs });
    }

    return okResult(this.truncate(formatSandboxOutput(reply.hasResult, reply.result, reply.printed)), { durationMs });
  }

  private truncate(text: string): string {
    if (text.length <= this.maxOutputLength) return text;
    return text.slice(0, this.maxOutputLength) + '\n...[output truncated]';
  }
}
