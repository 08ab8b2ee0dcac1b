export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLevel(raw: string | undefined): LogLevel {
  const v = (raw ?? "info").trim().toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  return "info";
}

// ANSI color codes
const c = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
};

export { c as colors };

const levelColors: Record<LogLevel, string> = {
  debug: c.gray,
  info: c.cyan,
  warn: c.yellow,
  error: c.red,
};

export type LoggerOptions = {
  level?: LogLevel;
  color?: boolean;
  now?: () => Date;
};

export function formatLine(scope: string, level: LogLevel, msg: string, color: boolean, at: Date): string {
  const ts = at.toISOString();
  const tag = level.toUpperCase().padEnd(5);
  if (!color) return `${ts} ${tag} ${scope} ${msg}`;
  return `${c.dim}${ts}${c.reset} ${levelColors[level]}${tag}${c.reset} ${c.magenta}${scope}${c.reset} ${msg}`;
}

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export function createLogger(scope: string, opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? parseLevel(process.env.LOG_LEVEL);
  const color = opts.color ?? !process.env.NO_COLOR;
  const now = opts.now ?? (() => new Date());
  const should = (l: LogLevel) => levelOrder[l] >= levelOrder[level];
  const line = (l: LogLevel, msg: string) => formatLine(scope, l, msg, color, now());

  // warn and error go to stderr so batch output can be piped separately
  return {
    debug: (msg) => {
      if (should("debug")) console.debug(line("debug", msg));
    },
    info: (msg) => {
      if (should("info")) console.log(line("info", msg));
    },
    warn: (msg) => {
      if (should("warn")) console.warn(line("warn", msg));
    },
    error: (msg) => {
      if (should("error")) console.error(line("error", msg));
    },
  };
}

export const rootLogger = createLogger("topo");
