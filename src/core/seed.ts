import * as fs from 'fs';
import { Clock, SeedSpec, Topic } from '../types';
import { SeedSpecError } from './errors';
import { Logger, defaultLogger } from './logger';
import { RecordStore } from './record_store';
import { describeErrors, validateSeedSpec } from './schemas';

/** Author recorded on topics that came from the seed file */
export const SEED_AUTHOR = 'seed';

export interface SeedOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Read and validate a seed file
 */
export async function loadSeedSpec(seedPath: string): Promise<SeedSpec> {
  let data: unknown;
  try {
    data = JSON.parse(await fs.promises.readFile(seedPath, 'utf-8'));
  } catch (error) {
    throw new SeedSpecError(`Failed to load seed file ${seedPath}: ${String(error)}`, seedPath);
  }

  if (!validateSeedSpec(data)) {
    throw new SeedSpecError(
      `Invalid seed file ${seedPath}: ${describeErrors(validateSeedSpec.errors)}`,
      seedPath
    );
  }
  return data;
}

/**
 * Populate an empty store from the seed file.
 *
 * Any entry in the root (of any kind) counts as "already seeded" and nothing is
 * written. A failure part-way leaves the topics saved so far in place.
 *
 * @returns the number of topics written
 */
export async function seedIfEmpty(
  store: RecordStore,
  seedPath: string,
  options: SeedOptions = {}
): Promise<number> {
  const logger = options.logger ?? defaultLogger;
  const clock = options.clock ?? (() => new Date());

  if (!(await store.isEmpty())) {
    return 0;
  }
  await store.ensureRoot();

  const spec = await loadSeedSpec(seedPath);
  logger.log(`Seeding community with ${spec.seed_topics.length} topics for domain: ${spec.domain}`);

  const createdAt = clock().toISOString();
  for (const entry of spec.seed_topics) {
    const topic: Topic = {
      title: entry.title,
      body: entry.body,
      author: entry.author ?? SEED_AUTHOR,
      tags: [...entry.tags],
      createdAt,
      upvotes: 0,
      downvotes: 0,
      replies: [],
    };
    await store.save(topic);
  }

  return spec.seed_topics.length;
}
