/**
 * Minimal logger contract for pipeline services.
 * Fastify's pino logger and console both satisfy it.
 */

export interface EntropyLogger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

export const silentLogger: EntropyLogger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
