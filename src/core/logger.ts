// File: src/core/logger.ts
import winston from "winston";
import chalk, { type ChalkInstance } from "chalk";
import { dirname } from "node:path";
import { ensureDirectory } from "./file-utils";
import type { ILogger } from "../types/logger";

/**
 * Acceptable color strings for the custom log levels.
 */
type ChalkColor = "red" | "blue" | "green" | "cyan" | "yellow" | "white";

/**
 * Create a typed map of chalk color functions.
 */
const chalkMethods: Record<ChalkColor, ChalkInstance> = {
  red: chalk.red,
  blue: chalk.blue,
  green: chalk.green,
  cyan: chalk.cyan,
  yellow: chalk.yellow,
  white: chalk.white,
};

const logLevels = {
  levels: {
    error: 0,
    warn: 1,
    info: 2,
    impt: 3,
    attn: 4,
  },
  colors: {
    error: "red",
    warn: "yellow",
    info: "green",
    impt: "blue",
    attn: "cyan",
  } as Record<string, ChalkColor>,
};

const noopLogger: ILogger = {
  impt: () => {},
  attn: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger with a coloured console transport and, when a path is given,
 * a Markdown file transport.
 */
export class Logger implements ILogger {
  private logger: winston.Logger;

  /**
   * @param logFilePath - Markdown file that receives timestamped entries. Its
   *   directory is created if missing. Omit for console-only logging.
   */
  constructor(logFilePath?: string) {
    winston.addColors(logLevels.colors);

    const consoleTransport = new winston.transports.Console({
      format: winston.format.printf(
        ({ level, message }: winston.Logform.TransformableInfo) => {
          const colorKey = logLevels.colors[level] || "white";
          const colourFn = chalkMethods[colorKey] || chalk.white;
          return `${colourFn(`[${level.toUpperCase()}]`)} ${this.formatForPlainTransport(message)}`;
        }
      ),
    });

    const transports = logFilePath
      ? [consoleTransport, this.createMarkdownTransport(logFilePath)]
      : [consoleTransport];

    this.logger = winston.createLogger({
      levels: logLevels.levels,
      transports,
    });
  }

  attn(...args: unknown[]): void {
    this.log("attn", ...args);
  }

  impt(...args: unknown[]): void {
    this.log("impt", ...args);
  }

  info(...args: unknown[]): void {
    this.log("info", ...args);
  }

  warn(...args: unknown[]): void {
    this.log("warn", ...args);
  }

  error(...args: unknown[]): void {
    this.log("error", ...args);
  }

  /** Ends the underlying transports; resolves once they have flushed. */
  close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.on("finish", () => resolve());
      this.logger.end();
    });
  }

  private createMarkdownTransport(logFilePath: string) {
    ensureDirectory(dirname(logFilePath), noopLogger);
    return new winston.transports.File({
      filename: logFilePath,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.printf(
          ({ level, message, timestamp }: winston.Logform.TransformableInfo) =>
            `${timestamp} **[${level.toUpperCase()}]** ${this.formatForPlainTransport(message)}`
        )
      ),
    });
  }

  private log(level: string, ...args: unknown[]): void {
    this.logger.log({ level, message: this.stringifyMessage(args) });
  }

  /**
   * Removes ANSI escape codes used for console formatting from a given string.
   */
  private stripConsoleFormatting(message: string): string {
    return message.replace(
      // eslint-disable-next-line no-control-regex
      /[\u001b\u009b][[()#;?]*(?:(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><])*[m]/g,
      ""
    );
  }

  /**
   * Strings lose their ANSI codes; anything else becomes indented JSON.
   */
  private formatForPlainTransport(message: unknown): string {
    return typeof message === "string"
      ? this.stripConsoleFormatting(message)
      : JSON.stringify(message, null, 2);
  }

  /**
   * Joins the arguments with spaces; non-strings are JSON-stringified.
   */
  private stringifyMessage(args: unknown[]): string {
    return args
      .map((arg) => {
        if (typeof arg === "string") return arg;
        if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
        return JSON.stringify(arg, null, 2);
      })
      .join(" ");
  }
}
