import * as path from 'path';

/**
 * Default on-disk layout, relative to the working directory.
 * These only seed the default configuration; the core receives paths through
 * the config value and never reads these constants itself.
 */
export const DATA_DIR = 'data';

/**
 * Topic store root.
 * Contract: JSON topic files at any depth, named `<slug>-<key>.json`.
 */
export const STORE_DIR = path.join(DATA_DIR, 'community');

/**
 * Seed file applied once to an empty store.
 */
export const SEED_PATH = path.join(DATA_DIR, 'config.json');

/**
 * Actor roster.
 */
export const ROSTER_PATH = path.join(DATA_DIR, 'agents.json');
