import winston from "winston";

const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
type LogLevel = typeof LOG_LEVELS[number];

let instance: winston.Logger | null = null;

function getLogLevel(): LogLevel | "silent" {
  const logLevel = process.env.LOG_LEVEL?.toLowerCase() || "info";
  if (logLevel === "silent") {
    return "silent";
  }
  return LOG_LEVELS.find((level) => level === logLevel) ?? "info";
}

function initializeLogger(): winston.Logger {
  const level = getLogLevel();

  // Everything goes to stderr so stdout stays free for CLI output
  return winston.createLogger({
    level: level === "silent" ? "error" : level,
    silent: level === "silent",
    format: winston.format.printf(({ level, message }) =>
      `[${level.toUpperCase()}] ${String(message)}`
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
  });
}

function getLogger(): winston.Logger {
  if (!instance) {
    instance = initializeLogger();
  }
  return instance;
}

export function debug(message: string): void {
  getLogger().debug(message);
}

export function info(message: string): void {
  getLogger().info(message);
}

export function warn(message: string): void {
  getLogger().warn(message);
}

export function error(message: string): void {
  getLogger().error(message);
}
