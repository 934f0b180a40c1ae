import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'yaml';
import { AgoraConfig, AgoraConfigOverride } from '../types';
import { Logger, defaultLogger } from '../core/logger';
import { DEFAULT_ORIGINATE_PROBABILITY } from '../core/policy';
import { describeErrors, validateConfigOverride } from '../core/schemas';
import { ROSTER_PATH, SEED_PATH, STORE_DIR } from './state-paths';

/**
 * Default configuration for Agora
 */
const DEFAULT_CONFIG: AgoraConfig = {
  storeDir: STORE_DIR,
  seedPath: SEED_PATH,
  rosterPath: ROSTER_PATH,
  simulation: {
    recentLimit: 5,
    originateProbability: DEFAULT_ORIGINATE_PROBABILITY,
    intervalMs: 5000,
    jitterMs: 0,
  },
  generator: {
    baseUrl: 'http://localhost:11434',
    model: 'llama3.1:8b',
    timeoutMs: 120000,
  },
  server: {
    port: 8080,
  },
};

/**
 * Configuration file paths to search (in order)
 */
const CONFIG_PATHS = ['.agora/config.yml', '.agora/config.yaml', 'agora.yml', 'agora.yaml'];

/**
 * Load Agora configuration from file (or defaults), then apply environment
 * overrides. Relative paths in the result are resolved against `basePath`.
 */
export function loadConfig(
  basePath?: string,
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = defaultLogger
): AgoraConfig {
  const base = basePath || process.cwd();
  let config = getDefaultConfig();

  for (const configPath of CONFIG_PATHS.map((p) => path.resolve(base, p))) {
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        const parsed: unknown = yaml.parse(content) ?? {};
        if (validateConfigOverride(parsed)) {
          config = mergeConfig(config, parsed);
        } else {
          logger.warn(
            `Warning: Ignoring invalid config at ${configPath}: ${describeErrors(validateConfigOverride.errors)}`
          );
        }
      } catch (error) {
        logger.warn(`Warning: Failed to parse config at ${configPath}: ${String(error)}`);
      }
      break;
    }
  }

  return resolvePaths(applyEnvOverrides(config, env), base);
}

/**
 * Merge a file override over a base configuration; sections merge key by key
 */
export function mergeConfig(defaults: AgoraConfig, override: AgoraConfigOverride): AgoraConfig {
  return {
    storeDir: override.storeDir ?? defaults.storeDir,
    seedPath: override.seedPath ?? defaults.seedPath,
    rosterPath: override.rosterPath ?? defaults.rosterPath,
    simulation: { ...defaults.simulation, ...override.simulation },
    generator: { ...defaults.generator, ...override.generator },
    server: { ...defaults.server, ...override.server },
  };
}

/**
 * Environment variables win over file values
 */
export function applyEnvOverrides(config: AgoraConfig, env: NodeJS.ProcessEnv): AgoraConfig {
  const next = cloneConfig(config);

  if (env.AGORA_STORE_DIR) next.storeDir = env.AGORA_STORE_DIR;
  if (env.AGORA_SEED_PATH) next.seedPath = env.AGORA_SEED_PATH;
  if (env.AGORA_ROSTER_PATH) next.rosterPath = env.AGORA_ROSTER_PATH;
  if (env.AGORA_GENERATOR_URL) next.generator.baseUrl = env.AGORA_GENERATOR_URL;
  if (env.AGORA_GENERATOR_MODEL) next.generator.model = env.AGORA_GENERATOR_MODEL;
  if (env.AGORA_SEED) {
    const seed = parseInt(env.AGORA_SEED, 10);
    if (!isNaN(seed)) next.simulation.seed = seed;
  }

  return next;
}

/**
 * Get the default configuration (deep copy)
 */
export function getDefaultConfig(): AgoraConfig {
  return cloneConfig(DEFAULT_CONFIG);
}

/**
 * Validate configuration
 */
export function validateConfig(config: AgoraConfig): string[] {
  const errors: string[] = [];
  const { simulation, generator, server } = config;

  if (!config.storeDir) {
    errors.push('storeDir must not be empty.');
  }
  if (!Number.isInteger(simulation.recentLimit) || simulation.recentLimit < 0) {
    errors.push(`Invalid recentLimit: ${simulation.recentLimit}. Must be a non-negative integer.`);
  }
  if (
    typeof simulation.originateProbability !== 'number' ||
    simulation.originateProbability < 0 ||
    simulation.originateProbability > 1
  ) {
    errors.push(
      `Invalid originateProbability: ${simulation.originateProbability}. Must be between 0 and 1.`
    );
  }
  if (!(simulation.intervalMs >= 0) || !(simulation.jitterMs >= 0)) {
    errors.push('intervalMs and jitterMs must be non-negative.');
  }
  if (!(generator.timeoutMs > 0)) {
    errors.push(`Invalid generator timeout: ${generator.timeoutMs}. Must be positive.`);
  }
  if (!isHttpUrl(generator.baseUrl)) {
    errors.push(`Invalid generator URL: ${generator.baseUrl}.`);
  }
  if (!Number.isInteger(server.port) || server.port < 0 || server.port > 65535) {
    errors.push(`Invalid server port: ${server.port}.`);
  }

  return errors;
}

function resolvePaths(config: AgoraConfig, base: string): AgoraConfig {
  return {
    ...config,
    storeDir: path.resolve(base, config.storeDir),
    seedPath: path.resolve(base, config.seedPath),
    rosterPath: path.resolve(base, config.rosterPath),
  };
}

function cloneConfig(config: AgoraConfig): AgoraConfig {
  return {
    storeDir: config.storeDir,
    seedPath: config.seedPath,
    rosterPath: config.rosterPath,
    simulation: { ...config.simulation },
    generator: { ...config.generator },
    server: { ...config.server },
  };
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}
