/**
 * Logger
 *
 * Bracket-tagged console output (`[Server] ...`). Debug lines are dropped
 * unless debug mode is on.
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  debug?: boolean;
  sink?: LogSink;
}

export interface Logger {
  readonly scope: string;
  readonly debugEnabled: boolean;
  debug(message: string, data?: unknown): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  /** Same sink and debug flag, different tag */
  child(scope: string): Logger;
}

// ============================================================================
// Sinks
// ============================================================================

export const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    default:
      console.log(line);
  }
};

export const silentSink: LogSink = () => undefined;

/**
 * Sink that keeps lines in memory, for tests.
 */
export function createMemorySink(): LogSink & { lines: string[] } {
  const lines: string[] = [];
  const sink = (level: LogLevel, line: string) => {
    lines.push(`${level}: ${line}`);
  };
  return Object.assign(sink, { lines });
}

// ============================================================================
// Logger
// ============================================================================

class ScopedLogger implements Logger {
  readonly debugEnabled: boolean;
  private sink: LogSink;

  constructor(readonly scope: string, options: LoggerOptions) {
    this.debugEnabled = options.debug ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  debug(message: string, data?: unknown): void {
    if (!this.debugEnabled) return;
    const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
    this.sink('debug', `[${this.scope}] ${message}${suffix}`);
  }

  info(message: string): void {
    this.sink('info', `[${this.scope}] ${message}`);
  }

  warn(message: string): void {
    this.sink('warn', `[${this.scope}] ⚠️ ${message}`);
  }

  error(message: string, error?: unknown): void {
    const reason = error === undefined ? '' : `: ${error instanceof Error ? error.message : String(error)}`;
    this.sink('error', `[${this.scope}] ${message}${reason}`);
  }

  child(scope: string): Logger {
    return new ScopedLogger(scope, { debug: this.debugEnabled, sink: this.sink });
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  return new ScopedLogger(scope, options);
}

// ============================================================================
// Phase timing
// ============================================================================

/**
 * Records how long each named phase of a run took. The phase in progress is
 * kept so a deadline error can name it.
 */
export class PhaseTimer {
  private timings: Record<string, number> = {};
  private current = 'idle';

  constructor(private logger: Logger) {}

  get activePhase(): string {
    return this.current;
  }

  async measure<T>(phase: string, work: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    this.current = phase;
    this.logger.debug(`→ ${phase}`);
    try {
      return await work();
    } finally {
      const elapsed = Date.now() - startedAt;
      this.timings[phase] = (this.timings[phase] ?? 0) + elapsed;
      this.logger.debug(`← ${phase} (${elapsed}ms)`);
    }
  }

  getTimings(): Record<string, number> {
    return { ...this.timings };
  }
}
