import { getPIIMasker } from '../services/masking/PIIMasker';

const MASK_PII_DISABLE_VALUE = 'false';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];
type WritingLevel = Exclude<LogLevel, 'silent'>;

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

const masker = getPIIMasker();

let maskingOverride: boolean | null = null;

export interface LoggerOptions {
  maskPii: boolean;
}

/**
 * Applies the loaded configuration; until then MASK_PII is read from the
 * environment on every call.
 */
export function configureLogger(options: LoggerOptions): void {
  maskingOverride = options.maskPii;
}

function isMaskingEnabled(): boolean {
  return maskingOverride ?? process.env.MASK_PII !== MASK_PII_DISABLE_VALUE;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function currentLevel(): LogLevel {
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(configured) ? configured : DEFAULT_LOG_LEVEL;
}

function isEnabled(level: WritingLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel());
}

function maskError(error: Error): { name: string; message: string; stack?: string } {
  return {
    name: error.name,
    message: masker.maskText(error.message),
    stack: error.stack ? masker.maskText(error.stack) : undefined,
  };
}

function maskArg(arg: unknown): unknown {
  if (!isMaskingEnabled()) {
    return arg;
  }

  if (typeof arg === 'string') {
    return masker.maskText(arg);
  }

  if (typeof arg === 'object' && arg !== null) {
    if (arg instanceof Error) {
      return maskError(arg);
    }

    return masker.maskObject(arg);
  }

  return arg;
}

function write(level: WritingLevel, sink: (...args: unknown[]) => void, args: unknown[]): void {
  if (!isEnabled(level)) {
    return;
  }
  sink(...args.map(maskArg));
}

export const logger = {
  debug: (...args: unknown[]) => write('debug', console.debug, args),

  info: (...args: unknown[]) => write('info', console.info, args),

  warn: (...args: unknown[]) => write('warn', console.warn, args),

  error: (...args: unknown[]) => write('error', console.error, args),
};
