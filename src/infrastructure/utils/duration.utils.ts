import { ConfigurationError } from "../../core/domain/errors.js";

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
};

const GROUP = /(\d+)(ms|s|m|h|d|w)/y;

/**
 * Parses `365d`, `12h`, `1h30m`, `90s`, `250ms`, `2w` into milliseconds.
 * Units may be combined; bare numbers and zero totals are rejected.
 */
export function parseDuration(raw: string): number {
  const value = raw.trim().toLowerCase();
  if (!value) {
    throw new ConfigurationError("Duration must not be empty.");
  }
  let total = 0;
  GROUP.lastIndex = 0;
  while (GROUP.lastIndex < value.length) {
    const start = GROUP.lastIndex;
    const match = GROUP.exec(value);
    if (!match || match.index !== start) {
      throw new ConfigurationError(
        `Invalid duration "${raw}". Expected e.g. 365d, 12h, 1h30m, 90s.`,
      );
    }
    total += Number(match[1]) * UNIT_MS[match[2]];
  }
  if (total <= 0) {
    throw new ConfigurationError(`Duration "${raw}" must be greater than zero.`);
  }
  return total;
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const s = ms / 1000;
  if (s < 60) return `${s.toFixed(1)}s`;
  const m = Math.floor(s / 60);
  return `${m}m${Math.round(s % 60)}s`;
}
