import winston from "winston";

const line = winston.format.printf(
  ({ timestamp, level, message }) =>
    `[${timestamp}] ${level.toUpperCase()}: ${message}`,
);

// Shared by the processor service and the deploy CLI
const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || "info",
  format: winston.format.combine(
    winston.format.errors({ stack: false }),
    winston.format.timestamp({ format: "HH:mm:ss" }),
    line,
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
