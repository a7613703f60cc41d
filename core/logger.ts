import chalk from "chalk";

type LogLevel = "success" | "info" | "warn" | "error" | "debug";

interface LogOptions {
  scope?: string;
  data?: unknown;
}

interface Logger {
  success: (message: string, options?: LogOptions) => void;
  info: (message: string, options?: LogOptions) => void;
  warn: (message: string, options?: LogOptions) => void;
  error: (message: string, options?: LogOptions) => void;
  debug: (message: string, options?: LogOptions) => void;
}

type LogSink = (level: LogLevel, line: string) => void;

const formatData = (data: unknown): string => {
  if (data === undefined) {
    return "";
  }
  if (data instanceof Error) {
    return data.stack ?? data.message;
  }
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "number" || typeof data === "boolean") {
    return String(data);
  }
  try {
    return JSON.stringify(data, null, 2);
  } catch {
    return "Unable to serialize log data.";
  }
};

const formatScope = (options?: LogOptions) =>
  options?.scope ? ` ${chalk.gray(`[${options.scope}]`)}` : "";

const withData = (base: string, options?: LogOptions) => {
  const data = formatData(options?.data);
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${data}`;
};

const formatLine = (
  label: string,
  color: (value: string) => string,
  message: string,
  options?: LogOptions
) => {
  const timestamp = new Date().toLocaleString();
  return withData(
    `${chalk.gray(timestamp)} ${color(label)}${formatScope(options)} ${message}`,
    options
  );
};

const formatInfoLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  return withData(
    `${chalk.gray(timestamp)}${formatScope(options)} ${message}`,
    options
  );
};

const formatWarnLine = (message: string, options?: LogOptions) => {
  const timestamp = new Date().toLocaleString();
  const scope = options?.scope ? ` [${options.scope}]` : "";
  const base = `${chalk.gray(timestamp)} ${chalk.yellowBright(
    `⚠${scope} ${message}`
  )}`;
  const data = formatData(options?.data);
  if (data.length === 0) {
    return base;
  }
  return `${base}\n${chalk.yellowBright(data)}`;
};

const isDebugEnabled = () => process.env.INTEGRATOR_DEBUG === "1";

const consoleSink: LogSink = (level, line) => {
  if (level === "warn") {
    console.warn(line);
    return;
  }
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

let activeSink: LogSink = consoleSink;

/**
 * Redirects log output. Tests use this to keep the runner's output clean;
 * passing nothing restores the console.
 */
const setLogSink = (sink?: LogSink) => {
  activeSink = sink ?? consoleSink;
};

const writeLog = (level: LogLevel, message: string, options?: LogOptions) => {
  if (level === "success") {
    activeSink(level, formatLine("SUCCESS", chalk.greenBright, message, options));
    return;
  }
  if (level === "info") {
    activeSink(level, formatInfoLine(message, options));
    return;
  }
  if (level === "warn") {
    activeSink(level, formatWarnLine(message, options));
    return;
  }
  if (level === "debug") {
    if (isDebugEnabled()) {
      activeSink(level, formatLine("DEBUG", chalk.cyan, message, options));
    }
    return;
  }
  activeSink(level, formatLine("ERROR", chalk.redBright, message, options));
};

export const logger: Logger = {
  success: (message, options) => writeLog("success", message, options),
  info: (message, options) => writeLog("info", message, options),
  warn: (message, options) => writeLog("warn", message, options),
  error: (message, options) => writeLog("error", message, options),
  debug: (message, options) => writeLog("debug", message, options),
};

export { setLogSink };
export type { LogLevel, LogOptions, LogSink, Logger };
