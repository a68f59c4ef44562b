// Prefixed stderr logging shared by the CLI, catalog scanner and server.

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface StderrLoggerOptions {
  prefix?: string;
  quiet?: boolean;         // drop info and warnings, keep errors
}

export function createStderrLogger(options: StderrLoggerOptions = {}): Logger {
  const { prefix = "spokehub", quiet = false } = options;
  const write = (line: string) => process.stderr.write(`[${prefix}] ${line}\n`);
  return {
    info(message) {
      if (!quiet) write(message);
    },
    warn(message) {
      if (!quiet) write(`warning: ${message}`);
    },
    error(message) {
      write(`error: ${message}`);
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
};
