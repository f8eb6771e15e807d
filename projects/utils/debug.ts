import fs from 'fs';

/**
 * Debug logging shared by the table builders, the parse drivers and the cli.
 *
 * Nothing is printed unless DEBUG is set in the environment, or DEBUG_FILE
 * names a file to append lines to. Listeners always receive every line.
 */

export function log(...args: unknown[]) {
  logger.log(...args);
}

type Listener = (...args: unknown[]) => void;
class Logger {
  static readonly instance = new Logger();
  private listeners: Set<Listener> = new Set();
  private debugFile: number | undefined = undefined;

  private constructor() {}

  subscribe(listener: Listener) {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  log(...args: unknown[]) {
    for (const listener of this.listeners) {
      try {
        listener(...args);
      } catch (e) {
        console.error('debug listener failed:', e);
      }
    }
    if (process.env.DEBUG) {
      console.log(...args);
    } else if (process.env.DEBUG_FILE) {
      if (this.debugFile === undefined) {
        this.debugFile = fs.openSync(process.env.DEBUG_FILE, 'w');
      }
      fs.writeSync(this.debugFile, args.map(String).join(' ') + '\n');
    }
  }

  /**
   * Run `insideFunc`, collecting every line logged while it runs into `logs`.
   */
  capture<R>(insideFunc: () => R, logs: string[]): R {
    const unsub = this.subscribe((...args: unknown[]) =>
      logs.push(args.map(String).join(' '))
    );
    try {
      return insideFunc();
    } finally {
      unsub();
    }
  }
}
export const logger = Logger.instance;

let shouldUseColors = false;
export function useColors(enable: boolean = true) {
  shouldUseColors = enable;
}

const ColorCodes = {
  red: '\u001b[31m',
  yellow: '\u001b[33m',
  bold: '\u001b[1m',
};
const RESET = '\u001b[0m';

type Color = keyof typeof ColorCodes;
const colorize =
  (color: Color) =>
  (s: string): string =>
    shouldUseColors ? ColorCodes[color] + s + RESET : s;

export const colors: { [Property in Color]: (s: string) => string } = {
  red: colorize('red'),
  yellow: colorize('yellow'),
  bold: colorize('bold'),
};
