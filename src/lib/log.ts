import pino from "pino";

export const logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  base: { service: "doceo-archive" },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: ["token", "accessToken", "credentials", "*.accessToken", "*.token"],
    censor: "[redacted]",
  },
});
