import { setTimeout } from 'timers/promises';
import {
  Action,
  Actor,
  Clock,
  Generator,
  LoopStats,
  Reply,
  Rng,
  TickOutcome,
  Topic,
} from '../types';
import { GeneratorError, RosterError } from './errors';
import { Logger, defaultLogger } from './logger';
import { ActionPolicy, decide } from './policy';
import { buildOriginatePrompt, buildReplyPrompt, preview } from './prompts';
import { pickOne } from './random';
import { RecordStore } from './record_store';

export interface SimulationDeps {
  store: RecordStore;
  generator: Generator;
  roster: readonly Actor[];
  policy?: ActionPolicy;
  rng?: Rng;
  clock?: Clock;
  logger?: Logger;
}

export interface SimulationOptions {
  /** How many of the newest topics an actor reads before acting */
  recentLimit?: number;
  intervalMs?: number;
  /** Upper bound of the random extra delay added to each interval */
  jitterMs?: number;
}

export interface StartOptions {
  maxIterations?: number;
}

/**
 * The actor action loop.
 *
 * Strictly sequential: one actor acts per iteration, then the loop sleeps.
 * A failed iteration is logged and skipped; since every write goes through the
 * store's atomic save, a failure never leaves a record half-written.
 */
export class SimulationLoop {
  private running = false;
  /** True from start() until its loop has fully exited, including after stop() */
  private active = false;
  private abort?: AbortController;
  private stats: LoopStats = { iterations: 0, succeeded: 0, failed: 0 };

  private readonly store: RecordStore;
  private readonly generator: Generator;
  private readonly roster: readonly Actor[];
  private readonly policy: ActionPolicy;
  private readonly rng: Rng;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly recentLimit: number;
  private readonly intervalMs: number;
  private readonly jitterMs: number;

  constructor(deps: SimulationDeps, options: SimulationOptions = {}) {
    this.store = deps.store;
    this.generator = deps.generator;
    this.roster = deps.roster;
    this.policy = deps.policy ?? decide;
    this.rng = deps.rng ?? Math.random;
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger ?? defaultLogger;
    this.recentLimit = options.recentLimit ?? 5;
    this.intervalMs = options.intervalMs ?? 5000;
    this.jitterMs = options.jitterMs ?? 0;
  }

  /**
   * Run iterations until stopped or `maxIterations` is reached. A call while a
   * previous run is still active is ignored, so there is only ever one writer.
   */
  async start(options: StartOptions = {}): Promise<void> {
    if (this.active) {
      this.logger.warn('Simulation already running; ignoring start()');
      return;
    }
    this.active = true;
    this.running = true;
    this.abort = new AbortController();
    const signal = this.abort.signal;
    let remaining = options.maxIterations ?? Infinity;

    this.logger.log('Simulation starting...');

    while (this.running && remaining > 0) {
      await this.runIteration();
      remaining--;

      if (this.running && remaining > 0) {
        try {
          await setTimeout(this.nextDelay(), undefined, { signal });
        } catch (error) {
          if (!signal.aborted) throw error;
        }
      }
    }

    this.running = false;
    this.active = false;
    this.logger.log('Simulation stopped.');
  }

  /**
   * Finish the current iteration and stop; a pending sleep ends immediately
   */
  stop(): void {
    if (!this.running) return;
    this.running = false;
    this.abort?.abort();
    this.logger.log('Simulation stopping...');
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): LoopStats {
    return { ...this.stats };
  }

  /**
   * One iteration: pick an actor, read recent topics, decide, act
   */
  async tick(): Promise<TickOutcome> {
    if (this.roster.length === 0) {
      throw new RosterError('Roster is empty');
    }
    const actor = pickOne(this.roster, this.rng);
    this.logger.log(`${actor.name} (${actor.style}) is thinking...`);

    const recent = await this.store.scanRecent(this.recentLimit);
    this.logger.log(`Found ${recent.length} recent topics`);

    const action = this.policy(actor, recent, this.rng);
    this.logger.log(`Decided to: ${action.kind}`);

    const location = await this.perform(actor, action);
    return { actor, action: action.kind, location };
  }

  private async runIteration(): Promise<void> {
    this.stats.iterations++;
    try {
      const outcome = await this.tick();
      this.stats.succeeded++;
      this.stats.lastActivity = this.clock();
      this.logger.log(`${outcome.actor.name} ${outcome.action === 'originate' ? 'created' : 'replied to'} ${outcome.location}`);
    } catch (error) {
      this.stats.failed++;
      this.logger.error(`Iteration ${this.stats.iterations} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async perform(actor: Actor, action: Action): Promise<string> {
    switch (action.kind) {
      case 'originate': {
        const content = await this.generateText(buildOriginatePrompt(actor));
        const topic: Topic = {
          title: content,
          body: content,
          author: actor.id,
          createdAt: this.clock().toISOString(),
          tags: [],
          upvotes: 0,
          downvotes: 0,
          replies: [],
        };
        return this.store.save(topic);
      }
      case 'respond': {
        const target = action.target;
        this.logger.log(`Replying to '${preview(target.title)}' (by ${target.author}) with ${target.replies.length} existing replies`);

        const content = await this.generateText(buildReplyPrompt(actor, target));
        const reply: Reply = {
          author: actor.id,
          content,
          createdAt: this.clock().toISOString(),
        };
        const updated = await this.store.appendReplyAt(target.location, reply);
        return updated.location;
      }
    }
  }

  private async generateText(prompt: string): Promise<string> {
    const content = (await this.generator.generate(prompt)).trim();
    if (content === '') {
      throw new GeneratorError('Generator returned empty text');
    }
    return content;
  }

  private nextDelay(): number {
    return this.intervalMs + Math.floor(this.rng() * (this.jitterMs + 1));
  }
}
