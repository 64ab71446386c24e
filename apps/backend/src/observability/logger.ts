import pino from "pino";

export type LoggerSettings = {
  level: string;
  redact: { paths: string[]; remove: boolean };
};

export function loggerSettings(level: string): LoggerSettings {
  return {
    level,
    redact: {
      paths: ["req.headers.authorization", "password", "*.password"],
      remove: true,
    },
  };
}

export function createLogger(level: string) {
  return pino(loggerSettings(level));
}

// What services need from a logger; satisfied by both pino and Fastify's request logger.
export type Logger = Pick<ReturnType<typeof createLogger>, "debug" | "info" | "warn" | "error">;
