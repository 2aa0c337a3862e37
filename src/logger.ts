import pino, { type Logger } from "pino";
import { RECOVERY_CONSTANTS } from "./constants";

export type { Logger };

let root: Logger | null = null;

/**
 * Shared root logger. Level comes from `IDENTITY_RECOVERY_LOG_LEVEL`, default `info`.
 *
 * @remarks
 * Callers log milestones only; seeds, words, passphrases and derived keys never reach a log line.
 */
export function rootLogger(): Logger {
  if (!root) {
    root = pino({
      name: "identity-recovery",
      level: process.env[RECOVERY_CONSTANTS.LOG_LEVEL_ENV] ?? "info"
    });
  }
  return root;
}

export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? rootLogger()).child({ component });
}
