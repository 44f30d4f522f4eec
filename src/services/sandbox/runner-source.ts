// Sandbox runner
// Script evaluated by the child Node.js process with `node -e`. It reads one request from stdin,
// runs the code in a fresh vm context and writes one JSON reply to stdout.
// Nothing created by the host realm is handed to the context: console, require, the module table
// and the allowed modules are all compiled inside it.

export const RUNNER_SOURCE = String.raw`
'use strict';
const fs = require('node:fs');
const vm = require('node:vm');

const STATE_GLOBAL = '__sandbox';

// Compiled from its source text inside the context, so it closes over nothing from this process
function prelude(modulesGlobal, stateGlobal) {
  const stringify = JSON.stringify;
  const toText = String;
  const defineProperty = Object.defineProperty;
  const hasOwn = Object.prototype.hasOwnProperty;
  const modules = Object.create(null);
  const printed = [];

  function serialize(value) {
    if (typeof value === 'string') return value;
    if (typeof value === 'bigint') return toText(value);
    if (typeof value === 'function') return '[function]';
    try {
      const json = stringify(value);
      return json === undefined ? toText(value) : json;
    } catch (error) {
      return toText(value);
    }
  }

  function log(...args) {
    let line = '';
    for (let i = 0; i < args.length; i++) {
      line += (i > 0 ? ' ' : '') + serialize(args[i]);
    }
    printed[printed.length] = line;
  }

  function require(name) {
    if (hasOwn.call(modules, name)) return modules[name];
    throw new Error("Module '" + name + "' not allowed");
  }

  function load(name, factory) {
    const module = { exports: {} };
    factory.call(module.exports, module, module.exports, globalThis);
    modules[name] = module.exports;
  }

  function collect(value) {
    const hasResult = value !== undefined;
    return stringify({ hasResult: hasResult, result: hasResult ? serialize(value) : '', printed: printed });
  }

  defineProperty(globalThis, modulesGlobal, { value: modules });
  defineProperty(globalThis, stateGlobal, { value: { collect: collect } });
  globalThis.console = { log: log, info: log, warn: log, error: log };
  globalThis.require = require;
  return load;
}

function run(input) {
  const request = JSON.parse(input);
  const context = vm.createContext(Object.create(null), {
    name: 'sandbox',
    codeGeneration: { strings: false, wasm: false },
    microtaskMode: 'afterEvaluate',
  });
  const options = { filename: 'sandbox.js', timeout: request.timeoutMs };

  const load = vm.runInContext('(' + prelude.toString() + ')', context)(request.modulesGlobal, STATE_GLOBAL);
  for (const name of Object.keys(request.modules)) {
    const entry = request.modules[name];
    // Standalone bundles only: they run as CommonJS with no require of their own
    const source = fs.readFileSync(entry, 'utf8');
    const factory = vm.runInContext('(function (module, exports, self) {' + source + '\n})', context, { filename: entry });
    load(name, factory);
  }

  vm.runInContext(request.script, context, options);

  // Top-level const and let are not properties of the context, so read the variable with a second script
  const name = request.outputName;
  const collected = vm.runInContext(
    STATE_GLOBAL + '.collect(typeof ' + name + " === 'undefined' ? undefined : " + name + ')',
    context,
    options,
  );
  if (typeof collected !== 'string') {
    throw new TypeError('Sandbox state could not be read');
  }
  const state = JSON.parse(collected);
  return { ok: true, hasResult: state.hasResult, result: state.result, printed: state.printed };
}

let input = '';
process.stdin.setEncoding('utf8');
process.stdin.on('data', (chunk) => {
  input += chunk;
});
process.stdin.on('end', () => {
  let reply;
  try {
    reply = run(input);
  } catch (error) {
    const isObject = error !== null && typeof error === 'object';
    reply = {
      ok: false,
      errorName: isObject && typeof error.name === 'string' ? error.name : 'Error',
      error: isObject && typeof error.message === 'string' ? error.message : String(error),
    };
  }
  process.stdout.write(JSON.stringify(reply));
});
`;
