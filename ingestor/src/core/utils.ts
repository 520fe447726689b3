/**
 * Utility functions for the ingestor
 */

import { ISO } from "./dto";

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}

export function isValidDate(dateString: string): boolean {
  const date = new Date(dateString);
  return !isNaN(date.getTime());
}

/**
 * Order two ISO timestamps by the instant they denote, not lexically,
 * so "2024-12-20T10:00:00+11:00" and "2024-12-19T23:00:00Z" compare equal.
 */
export function compareIso(a: ISO, b: ISO): number {
  return Date.parse(a) - Date.parse(b);
}

export function sameInstant(a: ISO | null, b: ISO | null): boolean {
  if (a === null || b === null) return a === b;
  return compareIso(a, b) === 0;
}

export function laterOf(a: ISO, b: ISO): ISO {
  return compareIso(b, a) > 0 ? b : a;
}
