export interface PipelineLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string | Error, meta?: Record<string, unknown>): void;
}

export const noopLogger: PipelineLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};

/**
 * Minimal slice of a pino logger. Fastify's `app.log` and `request.log` satisfy it.
 */
export interface PinoLike {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
  error(obj: object, msg?: string): void;
}

export function createPinoPipelineLogger(logger: PinoLike): PipelineLogger {
  return {
    debug(message, meta) {
      logger.debug(meta ?? {}, message);
    },
    info(message, meta) {
      logger.info(meta ?? {}, message);
    },
    warn(message, meta) {
      logger.warn(meta ?? {}, message);
    },
    error(message, meta) {
      if (message instanceof Error) {
        logger.error({ ...(meta ?? {}), err: message }, message.message);
      } else {
        logger.error(meta ?? {}, message);
      }
    }
  } satisfies PipelineLogger;
}
