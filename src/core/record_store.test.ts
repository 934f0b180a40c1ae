import * as fs from 'fs';
import * as path from 'path';
import { RecordStore, buildSnippet, deriveSlug } from './record_store';
import { PathEscapeError, RecordFormatError, TopicNotFoundError } from './errors';
import { Reply } from '../types';
import {
  createTempDir,
  createTestStore,
  makeTopic,
  removeTempDir,
  writeJson,
} from '../../tests/helpers/store';

describe('RecordStore', () => {
  let tempDir: string;
  let root: string;
  let store: RecordStore;

  beforeEach(() => {
    tempDir = createTempDir();
    root = path.join(tempDir, 'community');
    store = createTestStore(root);
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  describe('save', () => {
    it('should write the serialized topic and assign a location', async () => {
      const topic = makeTopic({ title: 'T', tags: ['x'] });

      const location = await store.save(topic);

      expect(location).toBe('t-00000001.json');
      expect(topic.location).toBe('t-00000001.json');
      const content = fs.readFileSync(path.join(root, location), 'utf-8');
      expect(content).toBe(
        JSON.stringify(
          {
            title: 'T',
            body: 'Body',
            author: 'a',
            createdAt: '2024-01-01T00:00:00.000Z',
            tags: ['x'],
            upvotes: 0,
            downvotes: 0,
            replies: [],
          },
          null,
          2
        )
      );
    });

    it('should never serialize the location', async () => {
      const topic = makeTopic();
      await store.save(topic);
      await store.save(topic);

      const data = JSON.parse(fs.readFileSync(path.join(root, 't-00000001.json'), 'utf-8'));
      expect(data).not.toHaveProperty('location');
    });

    it('should create a missing root', async () => {
      const deepStore = createTestStore(path.join(tempDir, 'a', 'b', 'c'));
      await deepStore.save(makeTopic());
      expect(fs.existsSync(path.join(tempDir, 'a', 'b', 'c', 't-00000001.json'))).toBe(true);
    });

    it('should rewrite the same file when the topic already has a location', async () => {
      const topic = makeTopic();
      await store.save(topic);

      topic.body = 'Edited';
      const location = await store.save(topic);

      expect(location).toBe('t-00000001.json');
      expect(fs.readdirSync(root)).toEqual(['t-00000001.json']);
      const loaded = await store.loadByRelativePath(location);
      expect(loaded.body).toBe('Edited');
    });

    it('should give identical titles distinct locations', async () => {
      const first = await store.save(makeTopic({ title: 'Same title' }));
      const second = await store.save(makeTopic({ title: 'Same title' }));

      expect(first).toBe('same_title-00000001.json');
      expect(second).toBe('same_title-00000002.json');
      expect(await store.scan()).toHaveLength(2);
    });

    it('should give long titles that share a prefix distinct locations', async () => {
      const prefix = 'p'.repeat(60);
      await store.save(makeTopic({ title: `${prefix} one` }));
      await store.save(makeTopic({ title: `${prefix} two` }));

      expect((await store.scan()).map((t) => t.title).sort()).toEqual([`${prefix} one`, `${prefix} two`]);
    });

    it('should draw a new key when the file name is taken', async () => {
      writeJson(path.join(root, 't-00000001.json'), { unrelated: true });

      const location = await store.save(makeTopic());

      expect(location).toBe('t-00000002.json');
      expect(JSON.parse(fs.readFileSync(path.join(root, 't-00000001.json'), 'utf-8'))).toEqual({
        unrelated: true,
      });
    });

    it('should refuse a topic the record schema rejects without writing', async () => {
      await expect(
        store.save(makeTopic({ title: 'Dated', createdAt: '2024-01-01' }))
      ).rejects.toBeInstanceOf(RecordFormatError);
      await expect(store.save(makeTopic({ upvotes: -1 }))).rejects.toMatchObject({
        code: 'RECORD_FORMAT',
      });

      expect(fs.existsSync(root)).toBe(false);
      await expect(store.scan()).resolves.toEqual([]);
    });

    it('should leave an existing record untouched when an update is invalid', async () => {
      const topic = makeTopic({ title: 'Kept' });
      const location = await store.save(topic);

      topic.createdAt = 'not a date';
      await expect(store.save(topic)).rejects.toBeInstanceOf(RecordFormatError);

      const loaded = await store.loadByRelativePath(location);
      expect(loaded.createdAt).toBe('2024-01-01T00:00:00.000Z');
    });

    it('should reject a location outside the root', async () => {
      const topic = makeTopic({ location: '../escape.json' });
      await expect(store.save(topic)).rejects.toBeInstanceOf(PathEscapeError);
      expect(fs.existsSync(path.join(tempDir, 'escape.json'))).toBe(false);
    });
  });

  describe('scan', () => {
    it('should return an empty list when the root does not exist', async () => {
      await expect(store.scan()).resolves.toEqual([]);
    });

    it('should order topics by createdAt, newest first', async () => {
      await store.save(makeTopic({ title: 'middle', createdAt: '2024-01-02T00:00:00.000Z' }));
      await store.save(makeTopic({ title: 'newest', createdAt: '2024-01-03T00:00:00.000Z' }));
      await store.save(makeTopic({ title: 'oldest', createdAt: '2024-01-01T00:00:00.000Z' }));

      const topics = await store.scan();

      expect(topics.map((t) => t.title)).toEqual(['newest', 'middle', 'oldest']);
    });

    it('should order equal timestamps by location', async () => {
      await store.save(makeTopic({ title: 'b' }));
      await store.save(makeTopic({ title: 'a' }));

      const topics = await store.scan();

      expect(topics.map((t) => t.location)).toEqual(['a-00000002.json', 'b-00000001.json']);
    });

    it('should skip files that are not valid JSON', async () => {
      await store.save(makeTopic({ title: 'good' }));
      fs.writeFileSync(path.join(root, 'broken.json'), '{ "title": "half');

      const topics = await store.scan();

      expect(topics).toHaveLength(1);
      expect(topics[0].title).toBe('good');
    });

    it('should skip files that do not match the topic schema', async () => {
      writeJson(path.join(root, 'wrong.json'), { title: 42, body: 'b', author: 'a', createdAt: 'x' });
      writeJson(path.join(root, 'negative.json'), {
        title: 't',
        body: 'b',
        author: 'a',
        createdAt: '2024-01-01T00:00:00.000Z',
        upvotes: -1,
      });

      await expect(store.scan()).resolves.toEqual([]);
    });

    it('should find topics at any depth with a case-insensitive suffix', async () => {
      writeJson(path.join(root, 'sub', 'deep', 'Upper.JSON'), {
        title: 'Deep',
        body: 'b',
        author: 'a',
        createdAt: '2024-01-01T00:00:00.000Z',
      });
      fs.writeFileSync(path.join(root, 'sub', 'notes.txt'), 'not a topic');

      const topics = await store.scan();

      expect(topics).toHaveLength(1);
      expect(topics[0].location).toBe('sub/deep/Upper.JSON');
    });

    it('should ignore leftover temp files', async () => {
      await store.save(makeTopic({ title: 'kept' }));
      fs.writeFileSync(
        path.join(root, 'kept-00000001.json.tmp'),
        JSON.stringify(makeTopic({ title: 'half-written' }))
      );

      const topics = await store.scan();

      expect(topics.map((t) => t.title)).toEqual(['kept']);
    });

    it('should load documents using the older timestamp field', async () => {
      writeJson(path.join(root, 'legacy.json'), {
        title: 'Old',
        body: 'b',
        author: 'x',
        timestamp: '2023-05-01T10:00:00Z',
        replies: [{ author: 'y', content: 'c', timestamp: '2023-05-01T11:00:00Z' }],
      });

      const [topic] = await store.scan();

      expect(topic).toEqual({
        title: 'Old',
        body: 'b',
        author: 'x',
        createdAt: '2023-05-01T10:00:00.000Z',
        tags: [],
        upvotes: 0,
        downvotes: 0,
        replies: [{ author: 'y', content: 'c', createdAt: '2023-05-01T11:00:00.000Z' }],
        location: 'legacy.json',
      });
    });

    it('should order older offset timestamps by instant among UTC ones', async () => {
      writeJson(path.join(root, 'legacy.json'), {
        title: 'legacy-later',
        body: 'b',
        author: 'x',
        timestamp: '2024-01-01T23:00:00-05:00',
      });
      await store.save(makeTopic({ title: 'new-earlier', createdAt: '2024-01-02T01:00:00.000Z' }));

      const topics = await store.scan();

      expect(topics.map((t) => t.title)).toEqual(['legacy-later', 'new-earlier']);
      expect(topics[0].createdAt).toBe('2024-01-02T04:00:00.000Z');
    });

    it('should keep an unparseable older timestamp as written', async () => {
      writeJson(path.join(root, 'odd.json'), {
        title: 'odd',
        body: 'b',
        author: 'x',
        timestamp: 'yesterday',
      });

      await expect(store.loadByRelativePath('odd.json')).rejects.toBeInstanceOf(RecordFormatError);
    });
  });

  describe('scanRecent', () => {
    beforeEach(async () => {
      for (const day of ['01', '02', '03']) {
        await store.save(makeTopic({ title: day, createdAt: `2024-01-${day}T00:00:00.000Z` }));
      }
    });

    it('should keep only the newest topics', async () => {
      const topics = await store.scanRecent(2);
      expect(topics.map((t) => t.title)).toEqual(['03', '02']);
    });

    it('should treat a non-positive limit as unlimited', async () => {
      expect(await store.scanRecent(0)).toHaveLength(3);
      expect(await store.scanRecent(-1)).toHaveLength(3);
    });
  });

  describe('appendReply', () => {
    const reply: Reply = { author: 'a', content: 'c', createdAt: '2024-01-01T00:00:00Z' };

    it('should append a reply to the topic with the matching title', async () => {
      await store.save(makeTopic({ title: 'T' }));

      await store.appendReply('T', reply);

      const topics = await store.scan();
      expect(topics).toHaveLength(1);
      expect(topics[0].replies).toEqual([reply]);
    });

    it('should fail with TopicNotFoundError when no title matches', async () => {
      await store.save(makeTopic({ title: 'T' }));

      await expect(store.appendReply('Missing', reply)).rejects.toBeInstanceOf(TopicNotFoundError);
      expect((await store.scan())[0].replies).toEqual([]);
    });

    it('should reject an invalid reply and keep the thread readable', async () => {
      await store.save(makeTopic({ title: 'T', replies: [reply] }));

      await expect(store.appendReply('T', { ...reply, createdAt: '' })).rejects.toBeInstanceOf(
        RecordFormatError
      );

      const topics = await store.scan();
      expect(topics).toHaveLength(1);
      expect(topics[0].replies).toEqual([reply]);
    });

    it('should keep earlier replies in order', async () => {
      await store.save(makeTopic({ title: 'T' }));

      await store.appendReply('T', { ...reply, content: 'first' });
      await store.appendReply('T', { ...reply, content: 'second' });

      const [topic] = await store.scan();
      expect(topic.replies.map((r) => r.content)).toEqual(['first', 'second']);
    });

    it('should not lose replies appended concurrently', async () => {
      const location = await store.save(makeTopic({ title: 'T' }));

      await Promise.all([
        store.appendReplyAt(location, { ...reply, content: 'first' }),
        store.appendReplyAt(location, { ...reply, content: 'second' }),
        store.appendReply('T', { ...reply, content: 'third' }),
      ]);

      const topic = await store.loadByRelativePath(location);
      expect(topic.replies.map((r) => r.content).sort()).toEqual(['first', 'second', 'third']);
    });
  });

  describe('loadByRelativePath', () => {
    it('should load a topic and report its location', async () => {
      const location = await store.save(makeTopic({ title: 'T' }));

      const topic = await store.loadByRelativePath(location);

      expect(topic.title).toBe('T');
      expect(topic.location).toBe('t-00000001.json');
    });

    it('should reject paths escaping the root', async () => {
      await expect(store.loadByRelativePath('../../etc/passwd')).rejects.toBeInstanceOf(
        PathEscapeError
      );
    });

    it('should reject missing files with TopicNotFoundError', async () => {
      await expect(store.loadByRelativePath('nope.json')).rejects.toBeInstanceOf(TopicNotFoundError);
    });

    it('should reject corrupt files with RecordFormatError', async () => {
      fs.mkdirSync(root, { recursive: true });
      fs.writeFileSync(path.join(root, 'bad.json'), 'not json');

      await expect(store.loadByRelativePath('bad.json')).rejects.toBeInstanceOf(RecordFormatError);
    });
  });

  describe('isEmpty', () => {
    it('should be true for a missing root', async () => {
      await expect(store.isEmpty()).resolves.toBe(true);
    });

    it('should be true for an empty root', async () => {
      fs.mkdirSync(root, { recursive: true });
      await expect(store.isEmpty()).resolves.toBe(true);
    });

    it('should be false once any file exists', async () => {
      fs.mkdirSync(root, { recursive: true });
      fs.writeFileSync(path.join(root, 'README'), 'anything');
      await expect(store.isEmpty()).resolves.toBe(false);
    });
  });

  describe('listAll', () => {
    it('should summarize topics for listings', async () => {
      await store.save(
        makeTopic({
          title: 'Long',
          body: `  ${'x'.repeat(200)}  `,
          tags: ['soil'],
          replies: [{ author: 'b', content: 'r', createdAt: '2024-01-02T00:00:00.000Z' }],
        })
      );

      const [summary] = await store.listAll();

      expect(summary).toEqual({
        title: 'Long',
        author: 'a',
        createdAt: '2024-01-01T00:00:00.000Z',
        snippet: `${'x'.repeat(157)}...`,
        tags: ['soil'],
        replyCount: 1,
        location: 'long-00000001.json',
      });
    });
  });
});

describe('deriveSlug', () => {
  it('should lower-case, underscore spaces and drop apostrophes', () => {
    expect(deriveSlug("Don't Panic Now")).toBe('dont_panic_now');
  });

  it('should drop path separators and unsafe characters', () => {
    expect(deriveSlug('a/b\\c:d?e*f')).toBe('abcdef');
    expect(deriveSlug('../../etc/passwd')).toBe('....etcpasswd');
    expect(deriveSlug('line\nbreak')).toBe('linebreak');
  });

  it('should truncate to 50 characters', () => {
    expect(deriveSlug('x'.repeat(80))).toBe('x'.repeat(50));
    expect(Array.from(deriveSlug('🌱'.repeat(60)))).toHaveLength(50);
  });

  it('should fall back when nothing usable is left', () => {
    expect(deriveSlug('///')).toBe('topic');
  });
});

describe('buildSnippet', () => {
  it('should keep short bodies whole, trimmed', () => {
    expect(buildSnippet('  hello  ')).toBe('hello');
    expect(buildSnippet('y'.repeat(160))).toBe('y'.repeat(160));
  });

  it('should cut long bodies at 157 characters plus an ellipsis', () => {
    expect(buildSnippet('y'.repeat(161))).toBe(`${'y'.repeat(157)}...`);
  });
});
