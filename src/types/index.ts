/**
 * A reply attached to a topic. Immutable once appended; identified only by
 * its position in the topic's reply list.
 */
export interface Reply {
  author: string;
  content: string;
  createdAt: string;
}

/**
 * A discussion thread as held in memory.
 *
 * `location` is assigned by the RecordStore (on first save or on load) and is
 * never written to disk.
 */
export interface Topic {
  title: string;
  body: string;
  author: string; // actor id or SEED_AUTHOR
  createdAt: string;
  tags: string[];
  upvotes: number;
  downvotes: number;
  replies: Reply[];
  location?: string;
}

/**
 * The serialized form of a topic: everything except `location`.
 */
export type TopicDocument = Omit<Topic, 'location'>;

/**
 * A topic read back from the store, so its location is known
 */
export type StoredTopic = Topic & { location: string };

/**
 * Read-only view of a topic for listings
 */
export interface TopicSummary {
  title: string;
  author: string;
  createdAt: string;
  snippet: string;
  tags: string[];
  replyCount: number;
  location: string;
}

/**
 * One entry of the seed file
 */
export interface SeedEntry {
  title: string;
  body: string;
  author?: string;
  tags: string[];
}

/**
 * Declarative bootstrap input for an empty store.
 * Field names follow the seed file format.
 */
export interface SeedSpec {
  domain: string;
  tags: string[];
  seed_topics: SeedEntry[];
}

/**
 * A persona driving the simulation. Traits are in [0, 1].
 */
export interface Actor {
  id: string;
  name: string;
  style: string;
  courage: number;
  empathy: number;
  elegance: number;
}

/**
 * What an actor does in one loop iteration
 */
export type Action = { kind: 'originate' } | { kind: 'respond'; target: StoredTopic };

/**
 * Source of uniform random values in [0, 1)
 */
export type Rng = () => number;

/**
 * Source of timestamps for new topics and replies
 */
export type Clock = () => Date;

/**
 * Text generation backend
 */
export interface Generator {
  generate(prompt: string): Promise<string>;
  isAvailable(): Promise<boolean>;
}

/**
 * Result of a single loop iteration
 */
export interface TickOutcome {
  actor: Actor;
  action: Action['kind'];
  location: string;
}

/**
 * Generator backend settings
 */
export interface GeneratorConfig {
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

/**
 * Simulation loop settings
 */
export interface SimulationConfig {
  recentLimit: number;
  originateProbability: number;
  intervalMs: number;
  jitterMs: number;
  seed?: number;
}

/**
 * Agora configuration
 */
export interface AgoraConfig {
  storeDir: string;
  seedPath: string;
  rosterPath: string;
  simulation: SimulationConfig;
  generator: GeneratorConfig;
  server: {
    port: number;
  };
}

/**
 * Partial configuration as read from a config file
 */
export interface AgoraConfigOverride {
  storeDir?: string;
  seedPath?: string;
  rosterPath?: string;
  simulation?: Partial<SimulationConfig>;
  generator?: Partial<GeneratorConfig>;
  server?: Partial<AgoraConfig['server']>;
}

/**
 * Counters reported by the simulation loop
 */
export interface LoopStats {
  iterations: number;
  succeeded: number;
  failed: number;
  lastActivity?: Date;
}
