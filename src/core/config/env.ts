/**
 * Environment variable readers. A malformed value falls back to the default
 * with a warning instead of failing at import time.
 */

import { Logger } from "../utils/logger";

const TRUE_WORDS = /^(1|true|yes|on)$/i;
const FALSE_WORDS = /^(0|false|no|off)$/i;

function raw(key: string): string | undefined {
  const v = process.env[key]?.trim();
  return v ? v : undefined;
}

function ignored(key: string, value: string, fallback: unknown): void {
  Logger.warn(`Ignoring ${key}="${value}", using ${String(fallback)}`, {
    key,
  });
}

export const envStr = (key: string, fallback: string): string =>
  raw(key) ?? fallback;

/** Whole numbers only: "8" is accepted, "8.5" and "eight" are not */
export function envInt(key: string, fallback: number): number {
  const v = raw(key);
  if (v === undefined) return fallback;
  const n = Number(v);
  if (Number.isSafeInteger(n)) return n;
  ignored(key, v, fallback);
  return fallback;
}

export function envBool(key: string, fallback: boolean): boolean {
  const v = raw(key);
  if (v === undefined) return fallback;
  if (TRUE_WORDS.test(v)) return true;
  if (FALSE_WORDS.test(v)) return false;
  ignored(key, v, fallback);
  return fallback;
}
