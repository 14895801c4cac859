import type { TerminationStatus } from "../protocol/messages.js";

export type FormatterStream = {
  isTTY?: boolean;
  columns?: number;
};

export type FormatterOptions = {
  stream?: FormatterStream;
  env?: NodeJS.ProcessEnv;
};

export type StatusLevel = "success" | "warn" | "error" | "info";

const RESET = "\x1b[0m";
const BOLD = "\x1b[1m";

type ColorKey = "brand" | "proposer" | "evaluator" | "success" | "error" | "warn" | "info" | "muted" | "bold";
type ColorCodes = Record<ColorKey, string>;

const isTruthyEnv = (value: string | undefined): boolean =>
  typeof value === "string" && value !== "0" && value.trim().length > 0;

const shouldUseColor = (stream: FormatterStream, env: NodeJS.ProcessEnv): boolean => {
  if (isTruthyEnv(env.CLICOLOR_FORCE)) {
    return true;
  }
  if (isTruthyEnv(env.NO_COLOR) || env.CLICOLOR === "0") {
    return false;
  }
  return Boolean(stream.isTTY);
};

const NO_COLORS: ColorCodes = {
  brand: "",
  proposer: "",
  evaluator: "",
  success: "",
  error: "",
  warn: "",
  info: "",
  muted: "",
  bold: ""
};

const ANSI_COLORS: ColorCodes = {
  brand: "\x1b[35m",
  proposer: "\x1b[36m",
  evaluator: "\x1b[33m",
  success: "\x1b[32m",
  error: "\x1b[31m",
  warn: "\x1b[33m",
  info: "\x1b[34m",
  muted: "\x1b[90m",
  bold: BOLD
};

const PLAIN_PREFIX: Record<StatusLevel, string> = {
  success: "OK",
  warn: "WARN",
  error: "ERROR",
  info: "INFO"
};

const SYMBOL: Record<StatusLevel, string> = {
  success: "✔",
  warn: "▲",
  error: "✖",
  info: "●"
};

const STATUS_LEVEL: Record<TerminationStatus, StatusLevel> = {
  ONGOING: "info",
  DEAL_ACCEPTED: "success",
  DEAL_DECLINED: "warn",
  IMPASSE: "warn",
  MAX_TURNS_REACHED: "info",
  PARTY_DISCONNECTED: "error"
};

const normalizeWidth = (width: number): number => Math.max(24, Math.min(width, 78));

export type Formatter = {
  isTTY: boolean;
  isColorEnabled: boolean;
  termWidth: () => number;
  brand: (value: string) => string;
  muted: (value: string) => string;
  bold: (value: string) => string;
  divider: (width?: number) => string;
  header: (title: string, width?: number) => string;
  kv: (key: string, value: string, keyWidth?: number) => string;
  statusChip: (label: string, level: StatusLevel, detail?: string) => string;
  outcome: (status: TerminationStatus) => string;
  speaker: (name: string, side: "proposer" | "evaluator") => string;
  warnBlock: (message: string) => string;
  errorBlock: (message: string, suggestion?: string) => string;
};

export const createFormatter = (options?: FormatterOptions): Formatter => {
  const stream = options?.stream ?? process.stdout;
  const env = options?.env ?? process.env;

  const tty = Boolean(stream.isTTY);
  const colorEnabled = shouldUseColor(stream, env);
  const colors = colorEnabled ? ANSI_COLORS : NO_COLORS;

  const color = (key: ColorKey, value: string): string =>
    colors[key] ? `${colors[key]}${value}${RESET}` : value;

  const marker = (level: StatusLevel): string =>
    tty ? color(level, SYMBOL[level]) : PLAIN_PREFIX[level];

  const termWidth = (): number => normalizeWidth(stream.columns ?? 80);

  const divider = (width?: number): string =>
    color("muted", (tty ? "─" : "-").repeat(normalizeWidth(width ?? termWidth())));

  return {
    isTTY: tty,
    isColorEnabled: colorEnabled,
    termWidth,
    brand: (value) => color("brand", value),
    muted: (value) => color("muted", value),
    bold: (value) => color("bold", value),
    divider,
    header: (title, width) => (tty ? `${color("bold", color("brand", title))}\n${divider(width)}` : title),
    kv: (key, value, keyWidth = 14) => (tty ? `${color("muted", key.padEnd(keyWidth))} ${value}` : `${key}: ${value}`),
    statusChip: (label, level, detail) => {
      const suffix = detail ? ` ${tty ? color("muted", detail) : detail}` : "";
      return `${marker(level)} ${label}${suffix}`;
    },
    outcome: (status) => color(STATUS_LEVEL[status], status),
    speaker: (name, side) => color(side, `[${name}]`),
    warnBlock: (message) => `${tty ? color("warn", `${SYMBOL.warn} warn:`) : "warn:"} ${message}`,
    errorBlock: (message, suggestion) => {
      const first = `${tty ? color("error", `${SYMBOL.error} error:`) : "error:"} ${message}`;
      if (!suggestion) {
        return first;
      }
      return `${first}\n${tty ? color("muted", suggestion) : suggestion}`;
    }
  };
};

export const createStdoutFormatter = (): Formatter =>
  createFormatter({ stream: process.stdout, env: process.env });

export const createStderrFormatter = (): Formatter =>
  createFormatter({ stream: process.stderr, env: process.env });
