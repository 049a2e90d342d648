import winston from "winston";

const level = process.env.LOG_LEVEL || "info";

// Configure the Winston logger; LOG_LEVEL=silent mutes every transport
const logger = winston.createLogger({
  level: level === "silent" ? "info" : level,
  silent: level === "silent",
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.printf(({ timestamp, level, message }) => {
      return `[${timestamp}] ${level.toUpperCase()}: ${message}`;
    }),
  ),
  transports: [
    new winston.transports.Console({
      // Diagnostics go to stderr so command output on stdout stays clean
      stderrLevels: ["error", "warn", "info", "debug"],
      format: winston.format.combine(
        winston.format.timestamp({
          format: "HH:mm:ss",
        }),
        winston.format.printf(
          ({ timestamp, level, message }) =>
            `[${timestamp}] ${level.toUpperCase()}: ${message}`,
        ),
      ),
    }),
  ],
});

export default logger;
