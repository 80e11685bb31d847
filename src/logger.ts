import createDebug from "debug";

/**
 * Internal debug loggers.
 *
 * Enable with `DEBUG=textwright:*`. Loggers record sizes, positions and codec
 * names only; caller text is never written to the log.
 */

export type Logger = ReturnType<typeof createDebug>;

const PREFIX = "textwright";

/**
 * Factory for namespaced loggers, one cached instance per namespace.
 */
export class LoggerFactory {
  private static loggers = new Map<string, Logger>();

  /**
   * Get the logger for a namespace.
   * @param namespace - Namespace below the `textwright:` prefix
   */
  static create(namespace: string): Logger {
    const fullNamespace = `${PREFIX}:${namespace}`;
    const cached = this.loggers.get(fullNamespace);
    if (cached) {
      return cached;
    }

    const logger = createDebug(fullNamespace);
    this.loggers.set(fullNamespace, logger);
    return logger;
  }
}

export const createLogger = (namespace: string): Logger =>
  LoggerFactory.create(namespace);

export const codecLogger = (name: string): Logger =>
  LoggerFactory.create(`codec:${name}`);
