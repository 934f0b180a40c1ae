#!/usr/bin/env node

import { Command } from 'commander';
import { loadConfig, validateConfig } from '../config';
import { startServer } from '../api';
import { createSimulation, createStore } from '../core/agora';
import { ConfigError, isAgoraError } from '../core/errors';
import { OllamaGenerator } from '../core/generator';
import { defaultLogger } from '../core/logger';
import { seedIfEmpty } from '../core/seed';
import { AgoraConfig } from '../types';
import { parseCount } from './options';

const program = new Command();
const storeLogger = defaultLogger.child('Store');

program
  .name('agora')
  .description('Agora - simulated discussion community')
  .version('1.0.0')
  .option('-C, --dir <dir>', 'Base directory for config and data', process.cwd());

function getConfig(): AgoraConfig {
  const { dir } = program.opts<{ dir: string }>();
  const config = loadConfig(dir);
  const errors = validateConfig(config);
  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
  return config;
}

/**
 * Run command - seed if needed, then start the simulation loop
 */
program
  .command('run')
  .description('Start the simulation loop (Ctrl+C to stop)')
  .option('-n, --iterations <n>', 'Stop after n iterations')
  .option('--seed <n>', 'Random seed for a reproducible run')
  .action(async (options: { iterations?: string; seed?: string }) => {
    const config = getConfig();
    if (options.seed !== undefined) {
      config.simulation.seed = parseCount(options.seed, 'seed');
    }

    console.log('\n🚀 Starting Agora simulator...\n');
    const { loop, seeded } = await createSimulation(config, { logger: defaultLogger });
    if (seeded > 0) {
      console.log(`🌱 Seeded ${seeded} topics into ${config.storeDir}`);
    }

    const stop = () => loop.stop();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    await loop.start({
      maxIterations:
        options.iterations !== undefined ? parseCount(options.iterations, 'iterations') : undefined,
    });

    process.removeListener('SIGINT', stop);
    process.removeListener('SIGTERM', stop);

    const stats = loop.getStats();
    console.log(
      `\nIterations: ${stats.iterations}  Succeeded: ${stats.succeeded}  Failed: ${stats.failed}\n`
    );
  });

/**
 * Seed command
 */
program
  .command('seed')
  .description('Seed the store from the seed file if it is empty')
  .action(async () => {
    const config = getConfig();
    const written = await seedIfEmpty(createStore(config, storeLogger), config.seedPath, {
      logger: storeLogger,
    });

    if (written > 0) {
      console.log(`\n🌱 Seeded ${written} topics into ${config.storeDir}\n`);
    } else {
      console.log(`\nStore at ${config.storeDir} is not empty. Nothing seeded.\n`);
    }
  });

/**
 * List command
 */
program
  .command('list')
  .description('List topics, newest first')
  .option('-l, --limit <n>', 'Show only the n newest topics', '20')
  .action(async (options: { limit: string }) => {
    const config = getConfig();
    const limit = parseCount(options.limit, 'limit');
    const summaries = await createStore(config).listAll();
    const shown = limit > 0 ? summaries.slice(0, limit) : summaries;

    if (shown.length === 0) {
      console.log('\nNo topics yet. The community is quiet.\n');
      return;
    }

    console.log(`\n=== Topics (${shown.length} of ${summaries.length}) ===\n`);
    shown.forEach((topic) => {
      console.log(`💬 ${topic.snippet}`);
      console.log(`   by ${topic.author} at ${topic.createdAt} | ${topic.replyCount} replies`);
      if (topic.tags.length > 0) {
        console.log(`   Tags: ${topic.tags.join(', ')}`);
      }
      console.log(`   Location: ${topic.location}`);
      console.log('');
    });
  });

/**
 * Show command
 */
program
  .command('show')
  .description('Show one topic with its replies')
  .argument('<location>', 'Store-relative path of the topic')
  .action(async (location: string) => {
    const config = getConfig();
    const topic = await createStore(config).getByLocation(location);

    console.log(`\n=== ${topic.title} ===\n`);
    console.log(`Author:  ${topic.author}`);
    console.log(`Created: ${topic.createdAt}`);
    console.log(`Votes:   +${topic.upvotes} / -${topic.downvotes}`);
    if (topic.tags.length > 0) {
      console.log(`Tags:    ${topic.tags.join(', ')}`);
    }
    console.log(`\n${topic.body}\n`);

    if (topic.replies.length > 0) {
      console.log(`Replies (${topic.replies.length}):`);
      topic.replies.forEach((reply, i) => {
        console.log(`  ${i + 1}. ${reply.author} (${reply.createdAt}): ${reply.content}`);
      });
      console.log('');
    }
  });

/**
 * Server command
 */
program
  .command('serve')
  .description('Start the read-only HTTP API')
  .option('-p, --port <port>', 'Port to listen on')
  .action(async (options: { port?: string }) => {
    const config = getConfig();
    const port = options.port !== undefined ? parseCount(options.port, 'port') : config.server.port;
    console.log('\n🚀 Starting Agora server...\n');
    await startServer(createStore(config, storeLogger), port, defaultLogger.child('Server'));
  });

/**
 * Check command
 */
program
  .command('check')
  .description('Check that the text generator is reachable')
  .action(async () => {
    const config = getConfig();
    const generator = new OllamaGenerator(config.generator, defaultLogger.child('Generator'));
    const available = await generator.isAvailable();

    if (available) {
      console.log(`\n✅ Generator reachable at ${config.generator.baseUrl} (model ${config.generator.model})\n`);
    } else {
      console.log(`\n❌ Generator not reachable at ${config.generator.baseUrl}\n`);
      process.exitCode = 1;
    }
  });

/**
 * Config command
 */
program
  .command('config')
  .description('Show the effective configuration')
  .action(() => {
    const config = getConfig();

    console.log('\n=== Agora Configuration ===\n');
    console.log(`Store:      ${config.storeDir}`);
    console.log(`Seed file:  ${config.seedPath}`);
    console.log(`Roster:     ${config.rosterPath}`);
    console.log('\nSimulation:');
    console.log(`  Recent topics read:    ${config.simulation.recentLimit}`);
    console.log(`  Originate probability: ${config.simulation.originateProbability}`);
    console.log(`  Interval:              ${config.simulation.intervalMs}ms (+ up to ${config.simulation.jitterMs}ms)`);
    if (config.simulation.seed !== undefined) {
      console.log(`  Random seed:           ${config.simulation.seed}`);
    }
    console.log('\nGenerator:');
    console.log(`  URL:     ${config.generator.baseUrl}`);
    console.log(`  Model:   ${config.generator.model}`);
    console.log(`  Timeout: ${config.generator.timeoutMs}ms`);
    console.log(`\nServer port: ${config.server.port}\n`);
  });

program.parseAsync().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`\n❌ ${isAgoraError(error) ? `[${error.code}] ` : ''}${message}\n`);
  process.exitCode = 1;
});
