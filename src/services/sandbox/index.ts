// Sandbox Module - Main exports

export {
  SandboxExecutor,
  RESULT_VARIABLE,
  NO_RESULT_MESSAGE,
  createBundleResolver,
  formatSandboxOutput,
} from './sandbox-executor.js';
export type { SandboxExecutorOptions } from './sandbox-executor.js';
export { ProcessSandboxLauncher } from './launcher.js';
export type { SandboxLauncher, RunnerRequest, RunnerReply, ProcessLauncherOptions } from './launcher.js';
export { guardCode, MODULES_GLOBAL } from './import-guard.js';
export type { GuardOutcome } from './import-guard.js';
