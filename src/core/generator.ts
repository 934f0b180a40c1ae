import { Generator, GeneratorConfig } from '../types';
import { GeneratorError } from './errors';
import { Logger, defaultLogger } from './logger';

/**
 * Text generator backed by an Ollama-compatible HTTP API.
 * Timeouts are enforced here; the store and loop never wait on their own clock.
 */
export class OllamaGenerator implements Generator {
  private generateUrl: string;
  private tagsUrl: string;
  private model: string;
  private timeoutMs: number;
  private logger: Logger;

  constructor(config: GeneratorConfig, logger: Logger = defaultLogger) {
    const base = normalizeBaseUrl(config.baseUrl);
    this.generateUrl = `${base}/api/generate`;
    this.tagsUrl = `${base}/api/tags`;
    this.model = config.model;
    this.timeoutMs = config.timeoutMs;
    this.logger = logger;
  }

  async generate(prompt: string): Promise<string> {
    const start = Date.now();
    this.logger.log(`generate request started model=${this.model}`);

    let response: Response;
    try {
      response = await this.request(this.generateUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ model: this.model, prompt, stream: false }),
      });
    } catch (error) {
      const reason =
        error instanceof Error && error.name === 'AbortError'
          ? `timed out after ${this.timeoutMs}ms`
          : String(error);
      this.logger.warn(`generate request failed model=${this.model} err=${reason} elapsed=${Date.now() - start}ms`);
      throw new GeneratorError(`Generator unreachable at ${this.generateUrl}: ${reason}`);
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      this.logger.warn(`generate request failed model=${this.model} status=${response.status} elapsed=${Date.now() - start}ms`);
      throw new GeneratorError(
        `Generator API error (status ${response.status}): ${detail}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new GeneratorError(`Generator returned invalid JSON: ${String(error)}`, response.status);
    }

    if (
      typeof body !== 'object' ||
      body === null ||
      !('response' in body) ||
      typeof body.response !== 'string'
    ) {
      throw new GeneratorError('Generator response has no text', response.status);
    }

    this.logger.log(`generate request completed model=${this.model} elapsed=${Date.now() - start}ms`);
    return body.response;
  }

  /**
   * Whether the backend answers at all
   */
  async isAvailable(): Promise<boolean> {
    try {
      const response = await this.request(this.tagsUrl, { method: 'GET' });
      return response.ok;
    } catch {
      return false;
    }
  }

  private async request(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    try {
      return await fetch(url, { ...init, signal: controller.signal });
    } finally {
      clearTimeout(timeout);
    }
  }
}

/**
 * Strip trailing slashes and a stray `/api` or `/api/generate` suffix, so both
 * `http://host:11434` and `http://host:11434/api/generate` work as base URLs.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  let url = baseUrl.trim().replace(/\/+$/, '');
  if (url.endsWith('/api/generate')) url = url.slice(0, -'/api/generate'.length);
  if (url.endsWith('/api')) url = url.slice(0, -'/api'.length);
  return url;
}
