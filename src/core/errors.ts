/**
 * Agora error taxonomy.
 * Every failure the core surfaces is one of these, so callers can branch on `code`
 * (the API maps them to status codes, the loop logs and moves on).
 */

export abstract class AgoraError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly metadata: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * A file could not be read, written or renamed.
 */
export class StoreIoError extends AgoraError {
  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, 'STORE_IO', { path: filePath, cause: describeCause(cause) });
  }
}

/**
 * A record file exists but is not valid JSON or does not match the topic schema.
 */
export class RecordFormatError extends AgoraError {
  constructor(location: string, details: string) {
    super(`Unreadable record ${location}: ${details}`, 'RECORD_FORMAT', { location });
  }
}

/**
 * No topic matches the requested title or location.
 */
export class TopicNotFoundError extends AgoraError {
  constructor(key: string) {
    super(`Topic not found: ${key}`, 'TOPIC_NOT_FOUND', { key });
  }
}

/**
 * An externally supplied path would leave the store root.
 */
export class PathEscapeError extends AgoraError {
  constructor(relPath: string) {
    super(`Invalid topic path: ${relPath}`, 'PATH_ESCAPE', { path: relPath });
  }
}

/**
 * The text generator is unreachable or answered with something unusable.
 */
export class GeneratorError extends AgoraError {
  constructor(message: string, status?: number) {
    super(message, 'UPSTREAM_UNAVAILABLE', status !== undefined ? { status } : {});
  }
}

export class SeedSpecError extends AgoraError {
  constructor(message: string, seedPath: string) {
    super(message, 'SEED_SPEC', { path: seedPath });
  }
}

export class RosterError extends AgoraError {
  constructor(message: string, rosterPath?: string) {
    super(message, 'ROSTER', rosterPath !== undefined ? { path: rosterPath } : {});
  }
}

export class ConfigError extends AgoraError {
  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`, 'CONFIG', { errors });
  }
}

export function describeCause(cause: unknown): string | undefined {
  if (cause === undefined) return undefined;
  return cause instanceof Error ? cause.message : String(cause);
}

export function isAgoraError(error: unknown): error is AgoraError {
  return error instanceof AgoraError;
}
