import pino from "pino";

export function createLogger(level: string = "info") {
  if (level === "silent") {
    return pino({ level });
  }
  return pino({
    level,
    transport: {
      target: "pino/file",
      options: { destination: 1 }, // stdout
    },
  });
}

export type Logger = ReturnType<typeof createLogger>;
