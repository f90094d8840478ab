import fs from "node:fs";
import process from "node:process";
import { COLOR_CODES, ENABLE_COLOR, type ColorCode } from "../config/constants.js";
import type { Logger } from "../vocab/types.js";

const LOG_FILE = process.env["LOG_FILE"];
let logStream: fs.WriteStream | undefined;

if (LOG_FILE) {
  logStream = fs.createWriteStream(LOG_FILE, { flags: "a" });
}

export function writeToLogFile(message: string): void {
  if (logStream) {
    const timestamp = new Date().toISOString();
    logStream.write(`[${timestamp}] ${message}\n`);
  }
}

export function colorize(message: string, color: ColorCode | undefined): string {
  if (!ENABLE_COLOR || !color) {
    return message;
  }
  return `${color}${message}${COLOR_CODES.reset}`;
}

type ConsoleMethod = "log" | "warn" | "error";

export function makeLogger(
  method: ConsoleMethod,
  color: ColorCode | undefined,
  isDebugOnly: boolean,
  debugMode: boolean
): Logger {
  return (message: string, ...rest: unknown[]): void => {
    const fullMessage =
      rest.length > 0 ? `${message} ${rest.join(" ")}` : message;
    writeToLogFile(fullMessage);

    if (!isDebugOnly || debugMode) {
      if (rest.length > 0) {
        console[method](colorize(message, color), ...rest);
      } else {
        console[method](colorize(message, color));
      }
    }
  };
}

export interface Loggers {
  agentLog: Logger;
  agentWarn: Logger;
  agentError: Logger;
  resultLog: Logger;
}

export function createLoggers(debugMode: boolean): Loggers {
  return {
    agentLog: makeLogger("log", COLOR_CODES.toHuman, true, debugMode),
    agentWarn: makeLogger("warn", COLOR_CODES.warn, false, debugMode),
    agentError: makeLogger("error", COLOR_CODES.error, false, debugMode),
    resultLog: makeLogger("log", undefined, false, debugMode),
  };
}
