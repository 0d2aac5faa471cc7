import { env } from "node:process";

const MIN_TIMEOUT_MS = 5_000; // 5s
const MAX_TIMEOUT_MS = 2 * 60_000; // 2m

function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

function parseTimeoutEnv(name: string, defaultMs: number): number {
  const raw = env[name];
  if (!raw) return defaultMs;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) return defaultMs;
  return n;
}

/**
 * Upper bound for a whole request. Two subjects fan out to every source,
 * each bounded by SOURCE_TIMEOUT_MS, so this stays well above that.
 */
export const ROUTE_TIMEOUT_MS = clampTimeout(
  parseTimeoutEnv("ROUTE_TIMEOUT_MS", 60_000),
);
