/* eslint-disable no-console */
/**
 * Console logger with colors, shared by the lint engine and session setup
 */

// ANSI color support - respects NO_COLOR env var and non-TTY
const USE_COLOR = !process.env.NO_COLOR && process.stdout.isTTY !== false;

const RESET = USE_COLOR ? '\x1b[0m' : '';
const GREEN = USE_COLOR ? '\x1b[32m' : '';
const RED = USE_COLOR ? '\x1b[31m' : '';
const YELLOW = USE_COLOR ? '\x1b[33m' : '';
const BLUE = USE_COLOR ? '\x1b[34m' : '';
const DIM = USE_COLOR ? '\x1b[2m' : '';

/** Sink for advisory output; pass your own to capture lint warnings */
export interface TLogger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export const logger: TLogger = {
  info(message: string): void {
    console.log(`${BLUE}ℹ ${message}${RESET}`);
  },

  success(message: string): void {
    console.log(`${GREEN}✓ ${message}${RESET}`);
  },

  error(message: string): void {
    console.error(`${RED}✗ ${message}${RESET}`);
  },

  warn(message: string): void {
    console.warn(`${YELLOW}⚠ ${message}${RESET}`);
  },

  debug(message: string): void {
    if (process.env.DEBUG) {
      console.log(`${DIM}🔍 ${message}${RESET}`);
    }
  },
};
