/**
 * Console logger for the gallery server and CLI
 *
 * Honours verbose, quiet, no-color and json modes.
 */
import chalk, { Chalk, type ChalkInstance } from "chalk";

/**
 * Log levels in order of verbosity
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  /** Show debug output */
  verbose?: boolean;
  /** Only show errors */
  quiet?: boolean;
  /** Disable color output */
  noColor?: boolean;
  /** One JSON object per line */
  json?: boolean;
}

export interface JsonLogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

/**
 * Where formatted lines end up; swapped out in tests
 */
export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Info line prefixed with a green check mark */
  success(message: string, data?: Record<string, unknown>): void;
  /** Write a value as JSON to stdout, regardless of quiet mode */
  json(data: unknown): void;
  configure(options: LoggerOptions): void;
  getOptions(): Readonly<LoggerOptions>;
}

const processSink: LogSink = {
  out(line) {
    process.stdout.write(line + "\n");
  },
  err(line) {
    process.stderr.write(line + "\n");
  },
};

const plainChalk = new Chalk({ level: 0 });

export function createLogger(initial: LoggerOptions = {}, sink: LogSink = processSink): Logger {
  let options: LoggerOptions = {
    verbose: false,
    quiet: false,
    noColor: false,
    json: false,
    ...initial,
  };

  const colors = (): ChalkInstance => (options.noColor === true ? plainChalk : chalk);

  const shouldOutput = (level: LogLevel): boolean => {
    if (options.quiet === true) {
      return level === "error";
    }

    return level !== "debug" || options.verbose === true;
  };

  const format = (level: LogLevel, message: string, prefix?: string): string => {
    const c = colors();

    switch (level) {
      case "debug":
        return c.gray(`[debug] ${message}`);
      case "info":
        return prefix === undefined ? message : `${prefix} ${message}`;
      case "warn":
        return c.yellow(`${c.bold("warning:")} ${message}`);
      case "error":
        return c.red(`${c.bold("error:")} ${message}`);
    }
  };

  const output = (level: LogLevel, message: string, data?: Record<string, unknown>, prefix?: string): void => {
    if (!shouldOutput(level)) {
      return;
    }

    if (options.json === true) {
      const entry: JsonLogEntry = {
        level,
        message,
        timestamp: new Date().toISOString(),
      };
      if (data !== undefined) {
        entry.data = data;
      }
      sink.out(JSON.stringify(entry));
      return;
    }

    const line = format(level, message, prefix);
    if (level === "error" || level === "warn") {
      sink.err(line);
    } else {
      sink.out(line);
    }

    if (data !== undefined && options.verbose === true) {
      sink.out(colors().gray(JSON.stringify(data, null, 2)));
    }
  };

  return {
    debug(message, data) {
      output("debug", message, data);
    },

    info(message, data) {
      output("info", message, data);
    },

    warn(message, data) {
      output("warn", message, data);
    },

    error(message, data) {
      output("error", message, data);
    },

    success(message, data) {
      output("info", message, data, colors().green("✓"));
    },

    json(data) {
      sink.out(JSON.stringify(data, null, options.json === true ? 0 : 2));
    },

    configure(next) {
      options = { ...options, ...next };
    },

    getOptions() {
      return { ...options };
    },
  };
}

/**
 * Shared logger used when nothing else is injected
 */
export const logger = createLogger();

/**
 * Logger that drops everything; handy for tests and embedding
 */
export function createSilentLogger(): Logger {
  return createLogger({ quiet: true }, { out: () => undefined, err: () => undefined });
}
