// src/util/logger.ts

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug';

const LEVEL_ORDER: LogLevel[] = ['silent', 'error', 'warn', 'info', 'debug'];

interface LevelState {
   value: LogLevel;
}

export interface LoggerOptions {
   level?: LogLevel;
   /**
    * Optional prefix string (e.g. "[sitewright]" or "[site:Science]").
    */
   prefix?: string;
}

const supportsColor =
   typeof process !== 'undefined' &&
   process.stdout &&
   process.stdout.isTTY &&
   process.env.NO_COLOR !== '1';

type ColorFn = (text: string) => string;

function wrap(code: number): ColorFn {
   const open = `\u001b[${code}m`;
   const close = `\u001b[0m`;
   return (text: string) => (supportsColor ? `${open}${text}${close}` : text);
}

const color = {
   red: wrap(31),
   yellow: wrap(33),
   cyan: wrap(36),
   magenta: wrap(35),
   dim: wrap(2),
   gray: wrap(90),
};

function colorForLevel(level: LogLevel): ColorFn {
   switch (level) {
      case 'error':
         return color.red;
      case 'warn':
         return color.yellow;
      case 'info':
         return color.cyan;
      case 'debug':
         return color.gray;
      default:
         return (s) => s;
   }
}

/**
 * Narrow an arbitrary string (env var, CLI value) to a LogLevel.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
   if (!value) return undefined;
   const lower = value.toLowerCase();
   return LEVEL_ORDER.find((lvl) => lvl === lower);
}

/**
 * Leveled console logger with colored output.
 *
 * info/debug go to stdout, warn/error to stderr.
 */
export class Logger {
   private readonly state: LevelState;
   private readonly prefix: string | undefined;

   constructor(options: LoggerOptions = {}, state?: LevelState) {
      this.state = state ?? { value: options.level ?? 'info' };
      this.prefix = options.prefix;
   }

   setLevel(level: LogLevel) {
      this.state.value = level;
   }

   getLevel(): LogLevel {
      return this.state.value;
   }

   /**
    * Create a child logger with an additional prefix.
    * Children share the level of their parent.
    */
   child(prefix: string): Logger {
      const combined = this.prefix ? `${this.prefix}${prefix}` : prefix;
      return new Logger({ prefix: combined }, this.state);
   }

   private formatMessage(msg: unknown, lvl: LogLevel): string {
      const text =
         typeof msg === 'string'
            ? msg
            : msg instanceof Error
               ? msg.message
               : String(msg);

      const levelColor = colorForLevel(lvl);
      const prefixColored = this.prefix
         ? color.magenta(this.prefix)
         : undefined;

      const textColored =
         lvl === 'debug' ? color.dim(text) : levelColor(text);

      if (prefixColored) {
         return `${prefixColored} ${textColored}`;
      }

      return textColored;
   }

   private shouldLog(targetLevel: LogLevel): boolean {
      if (this.state.value === 'silent') return false;
      const currentIdx = LEVEL_ORDER.indexOf(this.state.value);
      const targetIdx = LEVEL_ORDER.indexOf(targetLevel);
      return targetIdx <= currentIdx;
   }

   error(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('error')) return;
      console.error(this.formatMessage(msg, 'error'), ...rest);
   }

   warn(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('warn')) return;
      console.warn(this.formatMessage(msg, 'warn'), ...rest);
   }

   info(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('info')) return;
      console.log(this.formatMessage(msg, 'info'), ...rest);
   }

   debug(msg: unknown, ...rest: unknown[]) {
      if (!this.shouldLog('debug')) return;
      console.debug(this.formatMessage(msg, 'debug'), ...rest);
   }
}

/**
 * Default process-wide logger used by CLI and core.
 * Level can be controlled via SITEWRIGHT_LOG_LEVEL env.
 */
export const defaultLogger = new Logger({
   level: parseLogLevel(process.env.SITEWRIGHT_LOG_LEVEL) ?? 'info',
   prefix: '[sitewright]',
});
