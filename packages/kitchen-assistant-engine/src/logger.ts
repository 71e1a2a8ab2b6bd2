export type EngineLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export const LOG_PREFIX = "[kitchen-assistant]";

export const defaultLogger: EngineLogger = {
  info: (message) => console.log(`${LOG_PREFIX} ${message}`),
  warn: (message) => console.warn(`${LOG_PREFIX} ${message}`),
  error: (message) => console.error(`${LOG_PREFIX} ${message}`),
};

export const silentLogger: EngineLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
