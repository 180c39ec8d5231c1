export function renderErrorMessage(message: string, error?: unknown): string {
  if (error !== undefined) {
    const errorString = error instanceof Error ? error.message : String(error);
    return `${message}: ${errorString}`;
  } else {
    return message;
  }
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
}

export class ConsoleLogger implements Logger {
  constructor(
    private verbose: boolean = false,
    private quiet: boolean = false
  ) {}

  debug(message: string): void {
    if (this.verbose) {
      console.log(message);
    }
  }

  info(message: string): void {
    if (!this.quiet) {
      console.log(message);
    }
  }

  warn(message: string): void {
    console.warn(message);
  }

  error(message: string, error?: unknown): void {
    console.error(renderErrorMessage(message, error));
  }
}

export class SilentLogger implements Logger {
  debug(): void {
    // Do nothing
  }

  info(): void {
    // Do nothing
  }

  warn(): void {
    // Do nothing
  }

  error(message: string, error?: unknown): void {
    console.error(renderErrorMessage(message, error));
  }
}

export class PrefixedLogger implements Logger {
  constructor(
    private baseLogger: Logger,
    private prefix: string
  ) {}

  debug(message: string): void {
    this.baseLogger.debug(`[${this.prefix}] ${message}`);
  }

  info(message: string): void {
    this.baseLogger.info(`[${this.prefix}] ${message}`);
  }

  warn(message: string): void {
    this.baseLogger.warn(`[${this.prefix}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    this.baseLogger.error(`[${this.prefix}] ${message}`, error);
  }
}

/**
 * Passes everything through to another logger and remembers how many errors were reported, so a run that
 * completed can still end with a failing exit status.
 */
export class CountingLogger implements Logger {
  errorCount = 0;

  constructor(private baseLogger: Logger) {}

  debug(message: string): void {
    this.baseLogger.debug(message);
  }

  info(message: string): void {
    this.baseLogger.info(message);
  }

  warn(message: string): void {
    this.baseLogger.warn(message);
  }

  error(message: string, error?: unknown): void {
    this.errorCount++;
    this.baseLogger.error(message, error);
  }
}
