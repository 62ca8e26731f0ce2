type LogData = Record<string, unknown> | undefined;
const isDev = import.meta.env.DEV;

export const logger = {
  info: (msg: string, data?: LogData): void => console.log(`[INFO] ${msg}`, data ?? ''),
  warn: (msg: string, data?: LogData): void => console.warn(`[WARN] ${msg}`, data ?? ''),
  error: (msg: string, err?: unknown): void => console.error(`[ERROR] ${msg}`, err ?? ''),
  debug: (msg: string, data?: LogData): void => {
    if (isDev) console.debug(`[DEBUG] ${msg}`, data ?? '');
  },

  /** Runs `fn`, logging how long it took; failures are logged and rethrown. */
  async time<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      logger.debug(`${label} took ${Math.round(performance.now() - start)}ms`);
      return result;
    } catch (err) {
      logger.error(`${label} failed after ${Math.round(performance.now() - start)}ms`, err);
      throw err;
    }
  }
};
