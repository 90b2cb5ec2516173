export { createPowerShellRunner, nodeExecFile } from './runner';
export { scriptPath, buildArgs, parseScriptOutput, isRecord } from './helpers';
export type { BridgeScript, PowerShellRunner, PowerShellRunnerConfig, ExecFileFn, ExecOptions, ExecCallback } from './types';
