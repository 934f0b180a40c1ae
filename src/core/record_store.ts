import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { Reply, StoredTopic, Topic, TopicSummary } from '../types';
import { RecordFormatError, StoreIoError, TopicNotFoundError } from './errors';
import { Logger, defaultLogger } from './logger';
import { resolveStorePath, toLocation } from './path_resolver';
import {
  describeErrors,
  toTopicDocument,
  upgradeLegacyFields,
  validateTopicDocument,
} from './schemas';

export const RECORD_EXTENSION = '.json';
export const TEMP_SUFFIX = '.tmp';
export const SLUG_MAX_LENGTH = 50;

const SNIPPET_MAX_LENGTH = 160;
const KEY_LENGTH = 8;
const MAX_KEY_ATTEMPTS = 5;

export interface RecordStoreOptions {
  logger?: Logger;
  /** Source of opaque ids used to keep locations unique */
  idFactory?: () => string;
}

/**
 * File-backed topic store.
 *
 * Each topic is one JSON document somewhere under `root`. Writes go to a
 * sibling `.tmp` file first and are renamed into place, so a reader sees either
 * the previous or the new content of a file, never a partial one.
 *
 * Mutations of one record within this process are serialized per location.
 * Several processes writing to the same root are not coordinated.
 */
export class RecordStore {
  readonly root: string;
  private readonly logger: Logger;
  private readonly idFactory: () => string;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(root: string, options: RecordStoreOptions = {}) {
    this.root = path.resolve(root);
    this.logger = options.logger ?? defaultLogger;
    this.idFactory = options.idFactory ?? (() => uuidv4());
  }

  /**
   * Every readable topic under the root, newest first.
   * Files that fail to parse or validate are left out.
   */
  async scan(): Promise<StoredTopic[]> {
    const files = await this.listRecordFiles(this.root);
    const topics: StoredTopic[] = [];

    for (const file of files) {
      const topic = await this.tryReadTopic(file);
      if (topic) topics.push(topic);
    }

    // createdAt is fixed-width ISO-8601, so string order is time order
    return topics.sort((a, b) => {
      if (a.createdAt !== b.createdAt) return a.createdAt < b.createdAt ? 1 : -1;
      return a.location < b.location ? -1 : a.location > b.location ? 1 : 0;
    });
  }

  /**
   * The `limit` newest topics; `limit <= 0` returns all of them
   */
  async scanRecent(limit: number): Promise<StoredTopic[]> {
    const topics = await this.scan();
    return limit > 0 ? topics.slice(0, limit) : topics;
  }

  /**
   * Persist a topic and return its location.
   * A topic that fails the record schema is rejected with RecordFormatError
   * and nothing is written.
   *
   * A topic that already has a location overwrites that file. A new topic gets
   * `<slug>-<key>.json` directly under the root, where the key comes from the
   * id factory and is redrawn while the file name is taken.
   */
  async save(topic: Topic): Promise<string> {
    // Never write a document that a later scan would skip
    const document = toTopicDocument(topic);
    if (!validateTopicDocument(document)) {
      throw new RecordFormatError(
        topic.location ?? deriveSlug(topic.title),
        describeErrors(validateTopicDocument.errors)
      );
    }

    const target =
      topic.location !== undefined
        ? resolveStorePath(this.root, topic.location)
        : await this.allocatePath(topic.title);

    await this.writeAtomic(target, JSON.stringify(document, null, 2));

    topic.location = toLocation(this.root, target);
    return topic.location;
  }

  /**
   * Append a reply to the newest topic whose title matches exactly
   */
  async appendReply(title: string, reply: Reply): Promise<StoredTopic> {
    const topics = await this.scan();
    const match = topics.find((t) => t.title === title);
    if (!match) {
      throw new TopicNotFoundError(title);
    }
    return this.appendReplyAt(match.location, reply);
  }

  /**
   * Append a reply to the topic stored at `location`.
   * The record is re-read under the location's lock so concurrent appends from
   * this process do not drop each other's replies.
   */
  async appendReplyAt(location: string, reply: Reply): Promise<StoredTopic> {
    const key = toLocation(this.root, resolveStorePath(this.root, location));

    return this.withLock(key, async () => {
      const topic = await this.loadByRelativePath(key);
      topic.replies.push({ author: reply.author, content: reply.content, createdAt: reply.createdAt });
      await this.save(topic);
      return topic;
    });
  }

  /**
   * Load one topic by its store-relative path. Never reads outside the root.
   */
  async loadByRelativePath(relPath: string): Promise<StoredTopic> {
    const absolutePath = resolveStorePath(this.root, relPath);
    return this.readTopic(absolutePath);
  }

  /**
   * True when the root is missing or contains no entries at all
   */
  async isEmpty(): Promise<boolean> {
    try {
      const entries = await fs.promises.readdir(this.root);
      return entries.length === 0;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) return true;
      throw new StoreIoError(`Failed to list ${this.root}`, this.root, error);
    }
  }

  async ensureRoot(): Promise<void> {
    try {
      await fs.promises.mkdir(this.root, { recursive: true });
    } catch (error) {
      throw new StoreIoError(`Failed to create ${this.root}`, this.root, error);
    }
  }

  async listAll(): Promise<TopicSummary[]> {
    const topics = await this.scan();
    return topics.map(summarize);
  }

  async getByLocation(relPath: string): Promise<StoredTopic> {
    return this.loadByRelativePath(relPath);
  }

  private async listRecordFiles(dir: string): Promise<string[]> {
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (error) {
      // Root not created yet, or a directory removed while walking
      if (hasErrorCode(error, 'ENOENT')) return [];
      throw new StoreIoError(`Failed to list ${dir}`, dir, error);
    }

    const files: string[] = [];
    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        files.push(...(await this.listRecordFiles(fullPath)));
      } else if (entry.isFile() && entry.name.toLowerCase().endsWith(RECORD_EXTENSION)) {
        files.push(fullPath);
      }
    }
    return files;
  }

  private async tryReadTopic(file: string): Promise<StoredTopic | undefined> {
    try {
      return await this.readTopic(file);
    } catch {
      // Corrupt or vanished files are left out of a scan
      return undefined;
    }
  }

  private async readTopic(absolutePath: string): Promise<StoredTopic> {
    const location = toLocation(this.root, absolutePath);

    let content: string;
    try {
      content = await fs.promises.readFile(absolutePath, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT') || hasErrorCode(error, 'EISDIR')) {
        throw new TopicNotFoundError(location);
      }
      throw new StoreIoError(`Failed to read ${location}`, absolutePath, error);
    }

    let data: unknown;
    try {
      data = upgradeLegacyFields(JSON.parse(content));
    } catch (error) {
      throw new RecordFormatError(location, error instanceof Error ? error.message : String(error));
    }

    if (!validateTopicDocument(data)) {
      throw new RecordFormatError(location, describeErrors(validateTopicDocument.errors));
    }

    return { ...toTopicDocument(data), location };
  }

  private async allocatePath(title: string): Promise<string> {
    await this.ensureRoot();
    const slug = deriveSlug(title);

    for (let attempt = 0; attempt < MAX_KEY_ATTEMPTS; attempt++) {
      const key = this.idFactory().replace(/-/g, '').slice(0, KEY_LENGTH);
      const candidate = path.join(this.root, `${slug}-${key}${RECORD_EXTENSION}`);
      if (!(await pathExists(candidate))) return candidate;
    }

    const fallback = path.join(this.root, `${slug}-${this.idFactory()}${RECORD_EXTENSION}`);
    this.logger.warn(`Location keys for "${slug}" kept colliding, using ${path.basename(fallback)}`);
    return fallback;
  }

  private async writeAtomic(target: string, data: string): Promise<void> {
    const tempPath = `${target}${TEMP_SUFFIX}`;

    try {
      await fs.promises.mkdir(path.dirname(target), { recursive: true });
      await fs.promises.writeFile(tempPath, data, 'utf-8');
      await fs.promises.rename(tempPath, target);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        this.logger.warn(`Failed to remove ${tempPath}: ${String(cleanupError)}`);
      });
      throw new StoreIoError(`Failed to write ${toLocation(this.root, target)}`, target, error);
    }
  }

  private async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined
    );
    this.locks.set(key, tail);

    try {
      return await run;
    } finally {
      if (this.locks.get(key) === tail) this.locks.delete(key);
    }
  }
}

/**
 * File name stem for a title: lower-cased, spaces to underscores, apostrophes,
 * separators and characters that are unsafe in file names removed, cut to
 * SLUG_MAX_LENGTH code points.
 */
export function deriveSlug(title: string): string {
  const cleaned = title
    .toLowerCase()
    .replace(/ /g, '_')
    .replace(/'/g, '')
    .replace(/[/\\<>:"|?*\u0000-\u001f\u007f]/g, '');

  const slug = Array.from(cleaned).slice(0, SLUG_MAX_LENGTH).join('');
  return slug === '' ? 'topic' : slug;
}

export function buildSnippet(body: string): string {
  const trimmed = body.trim();
  const chars = Array.from(trimmed);
  if (chars.length <= SNIPPET_MAX_LENGTH) return trimmed;
  return `${chars.slice(0, SNIPPET_MAX_LENGTH - 3).join('')}...`;
}

function summarize(topic: StoredTopic): TopicSummary {
  return {
    title: topic.title,
    author: topic.author,
    createdAt: topic.createdAt,
    snippet: buildSnippet(topic.body),
    tags: [...topic.tags],
    replyCount: topic.replies.length,
    location: topic.location,
  };
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return false;
    throw new StoreIoError(`Failed to check ${filePath}`, filePath, error);
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}
