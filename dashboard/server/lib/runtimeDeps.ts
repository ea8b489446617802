import { spawnSync } from 'node:child_process';
import { getConfiguredSimCommand } from './config';

export interface RuntimeDependencyResult {
  available: boolean;
  versionOutput: string;
  error?: string;
}

export interface RuntimeDependencyStatus {
  simulator: RuntimeDependencyResult;
  simulatorCommand: string;
}

type VersionCheck = (command: string, args: string[]) => RuntimeDependencyResult;

export function runVersionCheck(command: string, args: string[]): RuntimeDependencyResult {
  const result = spawnSync(command, args, { encoding: 'utf-8' });
  if (result.error) {
    return {
      available: false,
      versionOutput: '',
      error: result.error.message
    };
  }

  const combinedOutput = `${result.stdout ?? ''}\n${result.stderr ?? ''}`.trim();
  if (result.status !== 0) {
    return {
      available: false,
      versionOutput: combinedOutput,
      error: `Command exited with status ${result.status ?? 'unknown'}.`
    };
  }

  return {
    available: true,
    versionOutput: combinedOutput
  };
}

export function checkRuntimeDependencies(
  simulatorCommand = getConfiguredSimCommand(),
  check: VersionCheck = runVersionCheck
): RuntimeDependencyStatus {
  return {
    simulator: check(simulatorCommand, ['--version']),
    simulatorCommand
  };
}
