import { AgoraConfig, Generator } from '../types';
import { validateConfig } from '../config';
import { ConfigError } from './errors';
import { OllamaGenerator } from './generator';
import { Logger, defaultLogger } from './logger';
import { SimulationLoop } from './loop';
import { createActionPolicy } from './policy';
import { createRng } from './random';
import { RecordStore } from './record_store';
import { loadRoster } from './roster';
import { seedIfEmpty } from './seed';

export interface SimulationSetup {
  store: RecordStore;
  loop: SimulationLoop;
  /** Topics written by seeding; 0 when the store already had content */
  seeded: number;
}

export interface SimulationSetupOptions {
  logger?: Logger;
  generator?: Generator;
}

/**
 * Store for a configuration, without touching the disk
 */
export function createStore(config: AgoraConfig, logger: Logger = defaultLogger): RecordStore {
  return new RecordStore(config.storeDir, { logger });
}

/**
 * Everything the `run` command needs: validates the config, loads the roster,
 * seeds an empty store, and builds the loop. Seeding happens here, before the
 * loop exists, so it can never interleave with loop writes.
 */
export async function createSimulation(
  config: AgoraConfig,
  options: SimulationSetupOptions = {}
): Promise<SimulationSetup> {
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }

  const logger = options.logger ?? defaultLogger;
  const store = createStore(config, logger);
  const roster = await loadRoster(config.rosterPath);
  logger.log(`Loaded ${roster.length} agents`);

  const seeded = await seedIfEmpty(store, config.seedPath, { logger });

  const generator = options.generator ?? new OllamaGenerator(config.generator, logger);
  const loop = new SimulationLoop(
    {
      store,
      generator,
      roster,
      policy: createActionPolicy({ originateProbability: config.simulation.originateProbability }),
      rng: createRng(config.simulation.seed),
      logger,
    },
    {
      recentLimit: config.simulation.recentLimit,
      intervalMs: config.simulation.intervalMs,
      jitterMs: config.simulation.jitterMs,
    }
  );

  return { store, loop, seeded };
}
