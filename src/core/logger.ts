export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  constructor(private readonly scope?: string) {}

  /**
   * Logger tagging its lines with a nested scope, e.g. `[Agora:Store]`
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(this.scope ? `${this.scope}:${scope}` : scope);
  }

  log(message: string): void {
    console.log(this.format(message));
  }

  warn(message: string): void {
    console.warn(this.format(message));
  }

  error(message: string): void {
    console.error(this.format(message));
  }

  private format(message: string): string {
    return this.scope ? `[${this.scope}] ${message}` : message;
  }
}

class SilentLogger implements Logger {
  log(): void {}
  warn(): void {}
  error(): void {}
}

export const defaultLogger = new ConsoleLogger('Agora');

export const silentLogger: Logger = new SilentLogger();
