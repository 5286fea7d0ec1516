export interface Logger {
  info(message: string): void;
  warn(message: string): void;
}

export type LogSink = Pick<Console, "info" | "warn">;

export function createLogger(scope: string, sink: LogSink = console): Logger {
  const prefix = `[specsync:${scope}]`;
  return {
    info: (message) => sink.info(`${prefix} ${message}`),
    warn: (message) => sink.warn(`${prefix} ${message}`),
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
};
