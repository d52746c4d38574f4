/**
 * Logger shape accepted by core components.
 *
 * Any pino logger fits, including a Fastify instance's `app.log`.
 */

import { pino } from "pino";

export interface Logger {
  debug(obj: object, msg?: string): void;
  info(obj: object, msg?: string): void;
  warn(obj: object, msg?: string): void;
}

/** Default for components constructed without a logger. */
export const silentLogger: Logger = pino({ level: "silent" });
