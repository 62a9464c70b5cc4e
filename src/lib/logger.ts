import pino, { type Logger } from "pino";

const isDev = process.env.NODE_ENV !== "production";
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;
const logLevel = process.env.LOG_LEVEL || (isTest ? "silent" : isDev ? "debug" : "info");

export const logger = pino(
  isDev && !isTest
    ? {
        level: logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }
    : {
        level: logLevel,
      },
);

/**
 * Subset of the pino logger that checks write to.
 * Lets tests hand in a recording logger.
 */
export type CheckLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

export default logger;
