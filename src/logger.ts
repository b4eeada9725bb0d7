import chalkModule from "chalk";
import type { LogLevel } from "./core/types";

type ChalkColorizer = (message: string) => string;
const levelPriority: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};
let currentLevel: LogLevel = "info";

export function formatLogLine(
  levelLabel: string,
  colorize: ChalkColorizer,
  messages: unknown[],
): string {
  const timestamp = chalkModule.dim(new Date().toISOString());
  const level = colorize(levelLabel.padEnd(7));
  const body = messages
    .map((part) =>
      part instanceof Error ? (part.stack ?? part.message) : String(part),
    )
    .join(" ");
  return `${timestamp} ${level} ${body}`;
}

function enabled(level: LogLevel): boolean {
  return levelPriority[currentLevel] <= levelPriority[level];
}

function log(
  levelLabel: string,
  colorize: ChalkColorizer,
  stream: NodeJS.WriteStream,
  messages: unknown[],
) {
  stream.write(`${formatLogLine(levelLabel, colorize, messages)}\n`);
}

export const logger = {
  info: (...messages: unknown[]) => {
    if (!enabled("info")) return;
    log("INFO", chalkModule.cyan, process.stdout, messages);
  },
  success: (...messages: unknown[]) => {
    if (!enabled("info")) return;
    log("SUCCESS", chalkModule.green, process.stdout, messages);
  },
  warn: (...messages: unknown[]) => {
    if (!enabled("warn")) return;
    log("WARN", chalkModule.yellow, process.stderr, messages);
  },
  error: (...messages: unknown[]) =>
    log("ERROR", chalkModule.red, process.stderr, messages),
  debug: (...messages: unknown[]) => {
    if (!enabled("debug")) return;
    log("DEBUG", chalkModule.magenta, process.stdout, messages);
  },
};

export { chalkModule as chalk };

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}
