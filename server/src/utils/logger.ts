import winston from "winston";

const level = process.env.LOG_LEVEL || "info";
const isProduction = process.env.NODE_ENV === "production";

const lineFormat = winston.format.printf((info) => {
  const { timestamp, level: lvl, message, stack, ...meta } = info;
  let line = `${timestamp} ${lvl}: ${message}`;
  if (Object.keys(meta).length > 0) {
    line += ` ${JSON.stringify(meta)}`;
  }
  if (typeof stack === "string") {
    line += `\n${stack}`;
  }
  return line;
});

const logger = winston.createLogger({
  level: level === "silent" ? "error" : level,
  silent: level === "silent",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    isProduction
      ? winston.format.json()
      : winston.format.combine(winston.format.colorize(), lineFormat),
  ),
  transports: [new winston.transports.Console()],
});

export default logger;
