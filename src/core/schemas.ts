/**
 * JSON schemas for the files Agora reads.
 * These are the validation gates between raw JSON on disk and the typed model.
 */
import Ajv from 'ajv';
import addFormats from 'ajv-formats';
import { Actor, AgoraConfigOverride, Reply, SeedSpec, TopicDocument } from '../types';

const ReplySchema = {
  type: 'object',
  properties: {
    author: { type: 'string' },
    content: { type: 'string' },
    createdAt: { type: 'string', format: 'date-time' },
  },
  required: ['author', 'content', 'createdAt'],
  additionalProperties: true,
};

export const TopicSchema = {
  type: 'object',
  properties: {
    title: { type: 'string' },
    body: { type: 'string' },
    author: { type: 'string' },
    createdAt: { type: 'string', format: 'date-time' },
    tags: { type: 'array', items: { type: 'string' }, default: [] },
    upvotes: { type: 'integer', minimum: 0, default: 0 },
    downvotes: { type: 'integer', minimum: 0, default: 0 },
    replies: { type: 'array', items: ReplySchema, default: [] },
  },
  required: ['title', 'body', 'author', 'createdAt'],
  additionalProperties: true,
};

export const SeedSpecSchema = {
  type: 'object',
  properties: {
    domain: { type: 'string' },
    tags: { type: 'array', items: { type: 'string' }, default: [] },
    seed_topics: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          title: { type: 'string', minLength: 1 },
          body: { type: 'string' },
          author: { type: 'string', minLength: 1 },
          tags: { type: 'array', items: { type: 'string' }, default: [] },
        },
        required: ['title', 'body'],
      },
    },
  },
  required: ['domain', 'seed_topics'],
};

const traitSchema = { type: 'number', minimum: 0, maximum: 1 };

export const RosterSchema = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1 },
      name: { type: 'string', minLength: 1 },
      style: { type: 'string' },
      courage: traitSchema,
      empathy: traitSchema,
      elegance: traitSchema,
    },
    required: ['id', 'name', 'style', 'courage', 'empathy', 'elegance'],
  },
};

export const ConfigOverrideSchema = {
  type: 'object',
  properties: {
    storeDir: { type: 'string', minLength: 1 },
    seedPath: { type: 'string', minLength: 1 },
    rosterPath: { type: 'string', minLength: 1 },
    simulation: {
      type: 'object',
      properties: {
        recentLimit: { type: 'integer' },
        originateProbability: { type: 'number' },
        intervalMs: { type: 'number' },
        jitterMs: { type: 'number' },
        seed: { type: 'integer' },
      },
      additionalProperties: false,
    },
    generator: {
      type: 'object',
      properties: {
        baseUrl: { type: 'string', format: 'uri' },
        model: { type: 'string', minLength: 1 },
        timeoutMs: { type: 'number' },
      },
      additionalProperties: false,
    },
    server: {
      type: 'object',
      properties: {
        port: { type: 'integer' },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
};

const ajv = new Ajv({ allErrors: true, useDefaults: true });
addFormats(ajv);

export const validateTopicDocument = ajv.compile<TopicDocument>(TopicSchema);
export const validateSeedSpec = ajv.compile<SeedSpec>(SeedSpecSchema);
export const validateRoster = ajv.compile<Actor[]>(RosterSchema);
export const validateConfigOverride = ajv.compile<AgoraConfigOverride>(ConfigOverrideSchema);

/**
 * Older record files carry `timestamp` instead of `createdAt`, on the topic and
 * on each reply. Rename in place before validation, normalized to UTC.
 */
export function upgradeLegacyFields(data: unknown): unknown {
  if (!isPlainObject(data)) return data;

  renameTimestamp(data);
  if (Array.isArray(data.replies)) {
    for (const reply of data.replies) {
      if (isPlainObject(reply)) renameTimestamp(reply);
    }
  }
  return data;
}

/**
 * Human-readable summary of the last validation failure
 */
export function describeErrors(errors: typeof ajv.errors): string {
  if (!errors || errors.length === 0) return 'unknown validation error';
  return errors.map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`).join(', ');
}

/**
 * Copy of a topic document carrying only the serialized fields, in a fixed order
 */
export function toTopicDocument(topic: TopicDocument): TopicDocument {
  return {
    title: topic.title,
    body: topic.body,
    author: topic.author,
    createdAt: topic.createdAt,
    tags: [...topic.tags],
    upvotes: topic.upvotes,
    downvotes: topic.downvotes,
    replies: topic.replies.map(
      (r): Reply => ({ author: r.author, content: r.content, createdAt: r.createdAt })
    ),
  };
}

function renameTimestamp(obj: Record<string, unknown>): void {
  if (obj.createdAt === undefined && typeof obj.timestamp === 'string') {
    obj.createdAt = toUtcTimestamp(obj.timestamp);
    delete obj.timestamp;
  }
}

/**
 * `toISOString()` form of a timestamp; unparseable values are kept as written
 */
function toUtcTimestamp(value: string): string {
  const ms = Date.parse(value);
  return isNaN(ms) ? value : new Date(ms).toISOString();
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
