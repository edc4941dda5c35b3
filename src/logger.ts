import { pino } from "pino";

// Pretty output for local development only; production and test runs log plain JSON
const env = process.env.NODE_ENV;
const isDevelopment = env !== "production" && env !== "test";

export const logger = pino({
  level: process.env.LOG_LEVEL || (env === "test" ? "silent" : "info"),
  ...(isDevelopment
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});
