import winston from "winston";

let rootLogger: winston.Logger | undefined = undefined;

/**
 * Text format of the form
 *   INFO  2024-03-01T10:00:00.000Z [package] Processing data file 2 of 3
 */
export const textFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.printf((info) => {
    const level = info.level.toUpperCase().padEnd(5);
    const component = info["component"];
    const componentPart = typeof component === "string" ? ` [${component}]` : "";
    const timestamp = typeof info["timestamp"] === "string" ? info["timestamp"] : "";

    return `${level} ${timestamp}${componentPart} ${info.message}`;
  }),
);

function createRootLogger(): winston.Logger {
  const level = (process.env["LOG_LEVEL"] ?? "info").toLowerCase();

  return winston.createLogger({
    // "silent" is not a winston level - it switches output off altogether
    level: level === "silent" ? "info" : level,
    silent: level === "silent",
    format: textFormat,
    transports: [
      // all of our diagnostics go to stderr so that stdout stays
      // clean for things like printed resource maps
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "verbose", "debug", "silly"],
      }),
    ],
  });
}

/**
 * Return a logger that tags every line with the given component name.
 * The underlying winston logger is created on first use.
 */
export function getLogger(component: string): winston.Logger {
  if (!rootLogger) rootLogger = createRootLogger();

  return rootLogger.child({ component: component });
}
