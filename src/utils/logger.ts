export interface Logger {
  info: (message: string) => void;
  warn: (message: string) => void;
  debug: (message: string) => void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Defaults to stderr so stdout only ever carries the definition. */
  write?: (line: string) => void;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));
  const verbose = options.verbose ?? false;

  return {
    info: (message) => write(`[${scope}] ${message}`),
    warn: (message) => write(`[${scope}] warning: ${message}`),
    debug: (message) => {
      if (verbose) {
        write(`[${scope}] ${message}`);
      }
    },
  };
}
