/**
 * Minimal structured logger for @unsafe-ledger/engine.
 *
 * Respects UNSAFE_LEDGER_LOG_LEVEL env var (debug | info | warn | error | silent).
 * Writes to stderr so stdout stays clean for report output.
 */

const LEVELS = { debug: 0, info: 1, warn: 2, error: 3, silent: 4 } as const;
type Level = keyof typeof LEVELS;

function isLevel(raw: string): raw is Level {
  return Object.prototype.hasOwnProperty.call(LEVELS, raw);
}

function parseLevel(raw: string | undefined): number {
  if (!raw) return LEVELS.info;
  const key = raw.toLowerCase();
  return isLevel(key) ? LEVELS[key] : LEVELS.info;
}

const level = parseLevel(process.env.UNSAFE_LEDGER_LOG_LEVEL);

export const logger = {
  debug(msg: string) { if (level <= LEVELS.debug) process.stderr.write(`[unsafe-ledger] ${msg}\n`); },
  info(msg: string)  { if (level <= LEVELS.info)  process.stderr.write(`[unsafe-ledger] ${msg}\n`); },
  warn(msg: string)  { if (level <= LEVELS.warn)  process.stderr.write(`[unsafe-ledger] ${msg}\n`); },
  error(msg: string) { if (level <= LEVELS.error) process.stderr.write(`[unsafe-ledger] ${msg}\n`); },
};
