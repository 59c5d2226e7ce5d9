import type { TetherConfig } from '../../config/runtime-config.js';
import type { Runner, SubprocessRunnerOptions } from '../runner.js';
import { ClaudeRunner } from './claude.js';
import { CodexRunner } from './codex.js';

export { ClaudeRunner } from './claude.js';
export { CodexRunner } from './codex.js';

export type EngineRunnerOptions = Omit<SubprocessRunnerOptions, 'cancelGraceMs' | 'maxConsecutiveMalformedLines'>;

/** Builds the runner set for every enabled engine. Called again on config reload. */
export function createEngineRunners(config: TetherConfig, options: EngineRunnerOptions): Map<string, Runner> {
  const runnerOptions: SubprocessRunnerOptions = {
    ...options,
    cancelGraceMs: config.orchestrator.cancelGraceMs,
    maxConsecutiveMalformedLines: config.runner.maxConsecutiveMalformedLines
  };
  const runners = new Map<string, Runner>();
  if (config.engines.claude.enabled) {
    runners.set('claude', new ClaudeRunner(config.engines.claude, runnerOptions));
  }
  if (config.engines.codex.enabled) {
    runners.set('codex', new CodexRunner(config.engines.codex, runnerOptions));
  }
  return runners;
}
