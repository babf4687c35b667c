import pino from "pino";

const level = process.env.LOG_LEVEL ?? (process.env.VITEST ? "silent" : "info");

// Human-readable logs on stderr; stdout is left to command output
const transport =
  level === "silent"
    ? undefined
    : pino.transport({
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "HH:MM:ss.l",
          ignore: "pid,hostname",
        },
      });

export const logger = pino(
  {
    level,
    base: { service: "price-store" },
  },
  transport
);

export const logFetch = logger.child({ subsystem: "fetch" });
export const logPartitions = logger.child({ subsystem: "partitions" });
export const logLoader = logger.child({ subsystem: "loader" });
export const logQuery = logger.child({ subsystem: "query" });
