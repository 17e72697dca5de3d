export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

type LogFields = Record<string, unknown>;

type Sink = (line: string) => void;

const ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * Structured logger. Each record is a single JSON line:
 *   {"ts":"...","level":"info","event":"bedrock_call","step":"answerQuestion",...}
 *
 * Lines go to stderr so they never interleave with the game transcript on stdout.
 */
export class Logger {
  #level: LogLevel;
  #sink: Sink;

  constructor(level: LogLevel = 'info', sink: Sink = (line) => process.stderr.write(`${line}\n`)) {
    this.#level = level;
    this.#sink = sink;
  }

  get level(): LogLevel {
    return this.#level;
  }

  setLevel(level: LogLevel) {
    this.#level = level;
  }

  debug(event: string, fields?: LogFields) {
    this.#log('debug', event, fields);
  }

  info(event: string, fields?: LogFields) {
    this.#log('info', event, fields);
  }

  warn(event: string, fields?: LogFields) {
    this.#log('warn', event, fields);
  }

  error(event: string, fields?: LogFields) {
    this.#log('error', event, fields);
  }

  #log(level: Exclude<LogLevel, 'silent'>, event: string, fields?: LogFields) {
    if (ORDER[level] < ORDER[this.#level]) return;
    this.#sink(JSON.stringify({ ts: new Date().toISOString(), level, event, ...fields }));
  }
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

export const logger = new Logger(parseLogLevel(process.env.LOG_LEVEL) ?? 'info');
