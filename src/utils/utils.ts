import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

let activeLogLevel: LogLevel = 'warn';

export function setLogLevel(level: LogLevel) {
  activeLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_ORDER[level] <= LOG_LEVEL_ORDER[activeLogLevel];
}

// stdout carries the JSON result, so every diagnostic line goes to stderr.
export function logError(message: string) {
  if (shouldLog('error')) console.error(`${chalk.red('❌')} ${message}`);
}

export function logWarn(message: string) {
  if (shouldLog('warn')) console.error(`${chalk.yellow('⚠️ ')} ${message}`);
}

export function logInfo(message: string) {
  if (shouldLog('info')) console.error(`${chalk.cyan('ℹ️ ')} ${message}`);
}

export function logDebug(message: string) {
  if (shouldLog('debug')) console.error(chalk.gray(`🔍 ${message}`));
}

export function printErrorAndExit(message: string, exitCode = 1): never {
  console.error(`\n ${chalk.red('❌ Error:')} ${message}`);
  process.exit(exitCode);
}

/**
 * Replaces `{{key}}` placeholders with the matching value.
 * Unknown keys and missing values render as an empty string.
 */
export function renderTemplate(template: string, values: Record<string, string | undefined>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_placeholder, key: string) =>
    Object.hasOwn(values, key) ? (values[key] ?? '') : '',
  );
}

const ISO_TIMESTAMP = /(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{3})?Z?)/;
const STANDARD_TIMESTAMP = /(\d{4})-(\d{2})-(\d{2})\s+(\d{2}):(\d{2}):(\d{2})/;
const DAY_FIRST_TIMESTAMP = /(\d{2})-(\d{2})-(\d{4})\s+(\d{2}):(\d{2}):(\d{2})/;

/**
 * Pulls the first recognisable timestamp out of a log line.
 * ====================================================================
 * Supported forms, in order of preference:
 * - ISO 8601 (`2024-01-15T10:30:45.123Z`), returned as found
 * - `2024-01-15 10:30:45`, read as UTC
 * - `15-01-2024 10:30:45`, read as UTC
 *
 * Anything else, including impossible dates, yields `now` in ISO form.
 */
export function extractLogTimestamp(logLine: string, now: Date = new Date()): string {
  const fallback = now.toISOString();
  if (!logLine) return fallback;

  const iso = ISO_TIMESTAMP.exec(logLine);
  if (iso) return iso[1];

  const standard = STANDARD_TIMESTAMP.exec(logLine);
  if (standard) {
    const [, year, month, day, hour, minute, second] = standard;
    return toUtcIso(year, month, day, hour, minute, second) ?? fallback;
  }

  const dayFirst = DAY_FIRST_TIMESTAMP.exec(logLine);
  if (dayFirst) {
    const [, day, month, year, hour, minute, second] = dayFirst;
    return toUtcIso(year, month, day, hour, minute, second) ?? fallback;
  }

  return fallback;
}

function toUtcIso(
  year: string,
  month: string,
  day: string,
  hour: string,
  minute: string,
  second: string,
): string | undefined {
  const parts = [year, month, day, hour, minute, second].map(Number);
  const [y, mo, d, h, mi, s] = parts;
  const date = new Date(Date.UTC(y, mo - 1, d, h, mi, s));

  // Date.UTC rolls over out-of-range fields; reject those instead.
  if (
    date.getUTCFullYear() !== y ||
    date.getUTCMonth() !== mo - 1 ||
    date.getUTCDate() !== d ||
    date.getUTCHours() !== h ||
    date.getUTCMinutes() !== mi ||
    date.getUTCSeconds() !== s
  ) {
    return undefined;
  }

  return date.toISOString();
}
