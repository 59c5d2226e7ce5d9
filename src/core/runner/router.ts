import { constants, promises as fs } from 'node:fs';
import { delimiter, isAbsolute, join } from 'node:path';
import type { Clock, StructuredLogger } from '../kernel/contracts.js';
import { systemClock } from '../kernel/contracts.js';
import { EngineUnavailableError, UnknownEngineError } from '../errors.js';
import type { Runner } from './runner.js';

/** Resolves `true` when `command` can be executed. */
export type AvailabilityProbe = (command: string) => Promise<boolean>;

async function isExecutable(path: string): Promise<boolean> {
  try {
    await fs.access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/** Looks `command` up on `PATH` the way a shell would. */
export function createPathProbe(pathEnv: string = process.env.PATH ?? ''): AvailabilityProbe {
  return async (command) => {
    if (command.includes('/') || isAbsolute(command)) {
      return isExecutable(command);
    }
    for (const dir of pathEnv.split(delimiter)) {
      if (dir && (await isExecutable(join(dir, command)))) {
        return true;
      }
    }
    return false;
  };
}

interface CachedAvailability {
  available: boolean;
  checkedAt: number;
}

export interface RouterOptions {
  availabilityTtlMs: number;
  probe?: AvailabilityProbe;
  clock?: Clock;
  logger?: StructuredLogger;
}

/**
 * Maps engine ids to runners. Resolution only selects an implementation; it
 * never spawns anything.
 */
export class Router {
  private runners: Map<string, Runner>;
  private readonly availability = new Map<string, CachedAvailability>();
  private readonly probe: AvailabilityProbe;
  private readonly clock: Clock;

  constructor(
    runners: Map<string, Runner>,
    private readonly options: RouterOptions
  ) {
    this.runners = new Map(runners);
    this.probe = options.probe ?? createPathProbe();
    this.clock = options.clock ?? systemClock;
  }

  engines(): string[] {
    return [...this.runners.keys()];
  }

  has(engine: string): boolean {
    return this.runners.has(engine);
  }

  /** The registered runner, without an availability check. */
  get(engine: string): Runner | undefined {
    return this.runners.get(engine);
  }

  async resolve(engine: string): Promise<Runner> {
    const runner = this.runners.get(engine);
    if (!runner) {
      throw new UnknownEngineError(engine);
    }
    if (!(await this.isAvailable(runner))) {
      throw new EngineUnavailableError(engine, runner.command);
    }
    return runner;
  }

  invalidate(): void {
    this.availability.clear();
  }

  /** Swaps the registry, e.g. after a config reload. */
  reload(runners: Map<string, Runner>): void {
    this.runners = new Map(runners);
    this.invalidate();
  }

  private async isAvailable(runner: Runner): Promise<boolean> {
    const now = this.clock();
    const cached = this.availability.get(runner.command);
    if (cached && now - cached.checkedAt < this.options.availabilityTtlMs) {
      return cached.available;
    }
    const available = await this.probe(runner.command);
    this.availability.set(runner.command, { available, checkedAt: now });
    if (!available) {
      this.options.logger?.warn('Engine binary not found', { engine: runner.engine, command: runner.command });
    }
    return available;
  }
}
