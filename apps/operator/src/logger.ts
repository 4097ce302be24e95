import winston from "winston";
import { config } from "./config";

export const logger = winston.createLogger({
  level: config.logLevel,
  defaultMeta: { service: "blockstake-operator" },
  format: winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, stack }) => {
      const line = `${timestamp} ${level.toUpperCase().padEnd(5)}: ${message}`;
      return stack ? `${line}\n${stack}` : line;
    })
  ),
  transports: [new winston.transports.Console()],
});
