// Shared fixtures for tests that run against a real temporary store

import fs from 'fs';
import os from 'os';
import path from 'path';
import { RecordStore } from '../../src/core/record_store';
import { silentLogger } from '../../src/core/logger';
import { Actor, Generator, Topic } from '../../src/types';

export function createTempDir(prefix = 'agora-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeTempDir(dir: string | undefined): void {
  if (dir && fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

/**
 * Id factory yielding 00000001, 00000002, ... so locations are predictable
 */
export function sequentialIds(): () => string {
  let n = 0;
  return () => String(++n).padStart(8, '0');
}

export function createTestStore(root: string): RecordStore {
  return new RecordStore(root, { logger: silentLogger, idFactory: sequentialIds() });
}

export function makeTopic(overrides: Partial<Topic> = {}): Topic {
  return {
    title: 'T',
    body: 'Body',
    author: 'a',
    createdAt: '2024-01-01T00:00:00.000Z',
    tags: [],
    upvotes: 0,
    downvotes: 0,
    replies: [],
    ...overrides,
  };
}

export function writeJson(filePath: string, data: unknown): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

export const testActors: Actor[] = [
  { id: 'agent-1', name: 'Ada', style: 'a curious tester', courage: 0.5, empathy: 0.5, elegance: 0.5 },
  { id: 'agent-2', name: 'Bo', style: 'a terse reviewer', courage: 0.8, empathy: 0.2, elegance: 0.4 },
];

/**
 * Generator returning canned texts in order and recording the prompts it saw
 */
export class StubGenerator implements Generator {
  prompts: string[] = [];

  constructor(private texts: string[] = ['Generated text']) {}

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const text = this.texts.length > 1 ? this.texts.shift() : this.texts[0];
    return text ?? '';
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}
