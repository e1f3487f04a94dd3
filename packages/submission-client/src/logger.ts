import { pino, type BaseLogger } from "pino";

// Fastify's request/app loggers satisfy this, as does any pino instance.
export type SubmissionLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export const silentLogger: SubmissionLogger = pino({ level: "silent" });
