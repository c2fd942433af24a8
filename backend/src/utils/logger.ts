import winston from "winston";

import { config } from "@/config/config";

const silent = config.logLevel === "silent";

export const logger = winston.createLogger({
  level: silent ? "error" : config.logLevel,
  silent,
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
