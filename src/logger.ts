import winston from "winston";

import { LogLevel } from "./config";

export const createLogger = (level: LogLevel) =>
  winston.createLogger({
    level,
    format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
    transports: [new winston.transports.Console()],
  });
