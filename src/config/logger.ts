import winston from "winston";
import { config } from "./index.js";

const { combine, timestamp, json, colorize, simple } = winston.format;

// Readable lines locally, JSON everywhere else.
const format = config.env === "development"
  ? combine(timestamp(), colorize(), simple())
  : combine(timestamp(), json());

export const logger = winston.createLogger({
  level: config.logLevel,
  // Quiet under vitest.
  silent: config.env === "test",
  format,
  defaultMeta: { service: "messages-bridge" },
  transports: [new winston.transports.Console()],
});
