/**
 * Severity-filtered logging with pluggable formatting
 */

import pc from "picocolors";

export type Severity = "debug" | "info" | "warning" | "error" | "critical";

const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

export type LogEvent = {
  readonly severity: Severity;
  readonly message: string;
};

export type LogFormatter = (event: LogEvent) => string;

export type LogSink = (line: string) => void;

export type Logger = {
  readonly threshold: Severity;
  readonly log: (severity: Severity, message: string) => void;
  readonly debug: (message: string) => void;
  readonly info: (message: string) => void;
  readonly warning: (message: string) => void;
  readonly error: (message: string) => void;
  readonly critical: (message: string) => void;
};

export type LoggerOptions = {
  readonly threshold?: Severity;
  readonly formatter?: LogFormatter;
  readonly sink?: LogSink;
};

type Colors = ReturnType<typeof pc.createColors>;

export const plainFormatter: LogFormatter = ({ severity, message }) =>
  `${severity.toUpperCase()}: ${message}`;

/**
 * Formatter that colors the severity label
 */
export const createColorFormatter = (colors: Colors = pc): LogFormatter => {
  const paint: Record<Severity, (text: string) => string> = {
    debug: colors.gray,
    info: colors.cyan,
    warning: colors.yellow,
    error: colors.red,
    critical: (text) => colors.bold(colors.red(text)),
  };

  return ({ severity, message }) =>
    `${paint[severity](severity.toUpperCase())}: ${message}`;
};

/**
 * Colors when the terminal supports them, plain text otherwise
 */
export const pickFormatter = (
  colorSupported: boolean = pc.isColorSupported
): LogFormatter => (colorSupported ? createColorFormatter() : plainFormatter);

/**
 * -v lowers the threshold from warnings to informational messages
 */
export const thresholdFor = (verbose: boolean): Severity =>
  verbose ? "info" : "warning";

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const threshold = options.threshold ?? "warning";
  const format = options.formatter ?? pickFormatter();
  const sink = options.sink ?? ((line: string) => console.error(line));

  const log = (severity: Severity, message: string): void => {
    if (SEVERITY_RANK[severity] < SEVERITY_RANK[threshold]) {
      return;
    }
    sink(format({ severity, message }));
  };

  return {
    threshold,
    log,
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warning: (message) => log("warning", message),
    error: (message) => log("error", message),
    critical: (message) => log("critical", message),
  };
};
