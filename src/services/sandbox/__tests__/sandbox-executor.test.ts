import { describe, it, expect, vi } from 'vitest';
import { existsSync, mkdirSync, mkdtempSync, realpathSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  NO_RESULT_MESSAGE,
  SandboxExecutor,
  createBundleResolver,
  formatSandboxOutput,
  type SandboxExecutorOptions,
} from '../sandbox-executor.js';
import { ProcessSandboxLauncher, type SandboxLauncher } from '../launcher.js';
import { createLogger } from '../../../utils/logger.js';

const logger = createLogger({ level: 'silent', pretty: false });

function createExecutor(overrides: Partial<SandboxExecutorOptions> = {}) {
  return new SandboxExecutor({
    allowedModules: ['mathjs'],
    timeoutMs: 2000,
    maxOutputLength: 5000,
    memoryMb: 128,
    permissionModel: true,
    logger,
    ...overrides,
  });
}

// A package under a temporary node_modules whose standalone bundle doubles numbers
function createBundledPackage(manifest: Record<string, string> = { unpkg: 'dist/doubler.js' }) {
  const root = realpathSync(mkdtempSync(join(tmpdir(), 'sandbox-bundle-')));
  const packageDir = join(root, 'node_modules', 'doubler');
  mkdirSync(join(packageDir, 'dist'), { recursive: true });
  writeFileSync(join(packageDir, 'package.json'), JSON.stringify({ name: 'doubler', main: 'index.js', ...manifest }));
  writeFileSync(join(packageDir, 'index.js'), "module.exports = require('./dist/doubler.js');\n");
  writeFileSync(join(packageDir, 'dist', 'doubler.js'), 'module.exports = { double: function (x) { return x * 2; } };\n');
  return { base: join(root, 'index.js'), packageDir };
}

function createFakeLauncher() {
  return { launch: vi.fn<SandboxLauncher['launch']>() };
}

describe('SandboxExecutor', () => {
  describe('in a child process', () => {
    it('should return the value assigned to result', async () => {
      const result = await createExecutor().run('const result = 6 * 7;');

      expect(result.status).toBe('ok');
      expect(result.output).toBe('42');
    });

    it('should return string results verbatim', async () => {
      const result = await createExecutor().run("const result = 'total: ' + [1, 2, 3].reduce((a, b) => a + b, 0);");

      expect(result.output).toBe('total: 6');
    });

    it('should serialize object results as JSON', async () => {
      const result = await createExecutor().run('const result = { total: 3, items: [1, 2] };');

      expect(result.output).toBe('{"total":3,"items":[1,2]}');
    });

    it('should report a fixed message when no result was assigned', async () => {
      const result = await createExecutor().run('const x = 1;');

      expect(result).toEqual({ status: 'ok', output: NO_RESULT_MESSAGE, metadata: { durationMs: expect.any(Number) } });
    });

    it('should return printed lines before a labelled result', async () => {
      const result = await createExecutor().run("console.log('hello', 2);\nconst result = 1;");

      expect(result.output).toBe('hello 2\n\nResult: 1');
    });

    it('should return printed lines when no result was assigned', async () => {
      const result = await createExecutor().run("console.log('total', { n: 3 });\nconsole.log('done');");

      expect(result).toEqual({ status: 'ok', output: 'total {"n":3}\ndone', metadata: { durationMs: expect.any(Number) } });
    });

    it('should not let functions it is given build code in another realm', async () => {
      const code = [
        'function reach(fn) {',
        "  try { return fn.constructor('return typeof process')(); } catch (error) { return error.name; }",
        '}',
        'const result = [reach(console.log), reach(require)].join(",");',
      ].join('\n');

      const result = await createExecutor().run(code);

      expect(result.output).toBe('EvalError,EvalError');
    });

    it('should load allowed modules inside the sandbox', async () => {
      const { base } = createBundledPackage();
      const executor = createExecutor({
        allowedModules: ['doubler'],
        permissionModel: false,
        resolveModule: createBundleResolver(base),
      });
      const code = [
        "import { double } from 'doubler';",
        'let escaped;',
        "try { escaped = double.constructor('return typeof process')(); } catch (error) { escaped = error.name; }",
        'const result = [double(21), escaped].join(",");',
      ].join('\n');

      const result = await executor.run(code);

      expect(result.output).toBe('42,EvalError');
    });

    it('should stop promise chains that run past the timeout', async () => {
      const result = await createExecutor({ timeoutMs: 300 }).run(
        'const result = 42;\nPromise.resolve().then(function spin() { for (;;) {} });',
      );

      expect(result.status).toBe('error');
      expect(result.output).toBe('Error: Script execution timed out after 300ms');
      expect(result.metadata?.durationMs).toBeLessThan(5000);
    });

    it('should run resolved promise callbacks before reading the result', async () => {
      const result = await createExecutor().run(
        "let result = 'pending';\nPromise.resolve('settled').then(value => { result = value; });",
      );

      expect(result.output).toBe('settled');
    });

    it('should not expose host globals', async () => {
      const result = await createExecutor().run(
        "const result = [typeof process, typeof fetch, typeof setTimeout].join(',');",
      );

      expect(result.output).toBe('undefined,undefined,undefined');
    });

    it('should refuse code generation from strings', async () => {
      const result = await createExecutor().run("const result = eval('1 + 1');");

      expect(result.status).toBe('error');
      expect(result.errorKind).toBe('ApplicationError');
      expect(result.output).toMatch(/^EvalError: /);
    });

    it('should report runtime errors as application errors', async () => {
      const result = await createExecutor().run('const result = missing + 1;');

      expect(result.status).toBe('error');
      expect(result.errorKind).toBe('ApplicationError');
      expect(result.output).toBe('ReferenceError: missing is not defined');
    });

    it('should stop code that runs past the timeout', async () => {
      const result = await createExecutor({ timeoutMs: 300 }).run('while (true) {}');

      expect(result.status).toBe('error');
      expect(result.errorKind).toBe('ApplicationError');
      expect(result.output).toBe('Error: Script execution timed out after 300ms');
    });

    it('should load an allowed module through import', async () => {
      const result = await createExecutor({ permissionModel: false }).run(
        "import { sqrt } from 'mathjs';\nconst result = sqrt(1764);",
      );

      expect(result.status).toBe('ok');
      expect(result.output).toBe('42');
    });

    it('should load an allowed module through require', async () => {
      const result = await createExecutor({ permissionModel: false }).run(
        "const { evaluate } = require('mathjs');\nconst result = evaluate('2 ^ 10');",
      );

      expect(result.output).toBe('1024');
    });

    it('should not let module functions build code in another realm', async () => {
      const code = [
        "import { add } from 'mathjs';",
        'let result;',
        "try { result = add.constructor('return typeof process')(); } catch (error) { result = error.name; }",
      ].join('\n');

      const result = await createExecutor({ permissionModel: false }).run(code);

      expect(result.output).toBe('EvalError');
    });

    it('should never run code that imports a disallowed module', async () => {
      const marker = join(tmpdir(), `sandbox-marker-${process.pid}-${Date.now()}`);
      const code = `import fs from 'node:fs';\nfs.writeFileSync(${JSON.stringify(marker)}, 'written');`;

      const result = await createExecutor().run(code);

      expect(result).toEqual({
        status: 'error',
        errorKind: 'ValidationError',
        output: "Security Error: Module 'node:fs' not allowed. Permitted modules: mathjs",
      });
      expect(existsSync(marker)).toBe(false);
    });
  });

  describe('with a fake launcher', () => {
    it('should not launch a process for refused code', async () => {
      const launcher = createFakeLauncher();
      const executor = createExecutor({ launcher });

      const result = await executor.run("import fs from 'node:fs';\nfs.writeFileSync('/tmp/x', 'y');");

      expect(result.errorKind).toBe('ValidationError');
      expect(launcher.launch).not.toHaveBeenCalled();
    });

    it('should pass the rewritten script and resolved module paths to the launcher', async () => {
      const launcher = createFakeLauncher();
      launcher.launch.mockResolvedValue({ ok: true, hasResult: true, result: '2', printed: [] });
      const executor = createExecutor({
        launcher,
        resolveModule: name => `/deps/node_modules/${name}/index.js`,
      });

      const result = await executor.run("import { sqrt } from 'mathjs'; const result = sqrt(4);");

      expect(result.output).toBe('2');
      expect(launcher.launch).toHaveBeenCalledWith({
        script: 'const { "sqrt": sqrt } = __modules["mathjs"]; const result = sqrt(4);',
        modules: { mathjs: '/deps/node_modules/mathjs/index.js' },
        modulesGlobal: '__modules',
        outputName: 'result',
        timeoutMs: 2000,
      });
    });

    it('should report an allowed module that cannot be resolved', async () => {
      const launcher = createFakeLauncher();
      const executor = createExecutor({
        launcher,
        resolveModule: name => {
          throw new Error(`Cannot find module '${name}'`);
        },
      });

      const result = await executor.run("import { sqrt } from 'mathjs';");

      expect(result).toEqual({
        status: 'error',
        errorKind: 'ApplicationError',
        output: "Module 'mathjs' is allowed but not installed",
      });
      expect(launcher.launch).not.toHaveBeenCalled();
    });

    it('should truncate printed output together with the result', async () => {
      const launcher = createFakeLauncher();
      launcher.launch.mockResolvedValue({ ok: true, hasResult: true, result: '7', printed: ['abcdefghijkl'] });

      const result = await createExecutor({ launcher, maxOutputLength: 10 }).run("console.log('abcdefghijkl');");

      expect(result.output).toBe('abcdefghij\n...[output truncated]');
    });

    it('should truncate long results', async () => {
      const launcher = createFakeLauncher();
      launcher.launch.mockResolvedValue({ ok: true, hasResult: true, result: 'x'.repeat(50), printed: [] });

      const result = await createExecutor({ launcher, maxOutputLength: 10 }).run("const result = 'x'.repeat(50);");

      expect(result.output).toBe('xxxxxxxxxx\n...[output truncated]');
    });

    it('should report a process that fails to start', async () => {
      const launcher = createFakeLauncher();
      launcher.launch.mockRejectedValue(new Error('spawn ENOENT'));

      const result = await createExecutor({ launcher }).run('const result = 1;');

      expect(result.errorKind).toBe('ApplicationError');
      expect(result.output).toBe('Sandbox failed to start: spawn ENOENT');
    });

    it('should reject empty code', async () => {
      const launcher = createFakeLauncher();

      const result = await createExecutor({ launcher }).run('   ');

      expect(result).toEqual({ status: 'error', errorKind: 'ValidationError', output: 'Code is required' });
    });
  });
});

describe('formatSandboxOutput', () => {
  it('should use the result alone when nothing was printed', () => {
    expect(formatSandboxOutput(true, '42', [])).toBe('42');
  });

  it('should fall back to the fixed message when there is nothing to report', () => {
    expect(formatSandboxOutput(false, '', [])).toBe(NO_RESULT_MESSAGE);
  });

  it('should label the result after printed lines', () => {
    expect(formatSandboxOutput(true, '3', ['a', 'b'])).toBe('a\nb\n\nResult: 3');
  });
});

describe('createBundleResolver', () => {
  it('should resolve the standalone bundle a package publishes', () => {
    const { base, packageDir } = createBundledPackage();

    expect(createBundleResolver(base)('doubler')).toBe(join(packageDir, 'dist', 'doubler.js'));
  });

  it('should accept a string browser field', () => {
    const { base, packageDir } = createBundledPackage({ browser: 'dist/doubler.js' });

    expect(createBundleResolver(base)('doubler')).toBe(join(packageDir, 'dist', 'doubler.js'));
  });

  it('should refuse packages without a standalone bundle', () => {
    const { base } = createBundledPackage({});

    expect(() => createBundleResolver(base)('doubler')).toThrow("Package 'doubler' publishes no standalone bundle");
  });
});

describe('ProcessSandboxLauncher', () => {
  it('should enable the permission model with the granted read paths', () => {
    const launcher = new ProcessSandboxLauncher({
      memoryMb: 64,
      permissionModel: true,
      readPaths: ['/deps/node_modules/*'],
    });

    expect(launcher.buildArgs().slice(0, 4)).toEqual([
      '--no-warnings',
      '--max-old-space-size=64',
      '--experimental-permission',
      '--allow-fs-read=/deps/node_modules/*',
    ]);
  });

  it('should leave the permission flags out when disabled', () => {
    const launcher = new ProcessSandboxLauncher({ memoryMb: 64, permissionModel: false });

    expect(launcher.buildArgs().slice(0, 3)).toEqual(['--no-warnings', '--max-old-space-size=64', '-e']);
  });
});
