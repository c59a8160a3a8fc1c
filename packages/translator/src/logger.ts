import { pino, type BaseLogger } from "pino";

export type { BaseLogger };

/** Default for library use; the gateway injects Fastify's logger */
export const silentLogger: BaseLogger = pino({ level: "silent" });

export function errorClass(err: unknown): string {
  return err instanceof Error ? err.name : typeof err;
}
