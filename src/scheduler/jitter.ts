/**
 * Deterministic jitter based on check name hash.
 * The same check always lands on the same offset, spreading checks that
 * share an interval.
 */

function hashString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = (hash << 5) - hash + char;
    hash = hash & hash; // 32-bit
  }
  return Math.abs(hash);
}

/**
 * Stable jitter in milliseconds for a check name
 */
export function calculateJitter(
  name: string,
  jitterPercent: number,
  intervalSeconds: number,
): number {
  if (jitterPercent === 0) return 0;

  const jitterMs = (intervalSeconds * 1000 * jitterPercent) / 100;
  const normalized = (hashString(name) % 10000) / 10000; // 0-1

  return Math.floor(normalized * jitterMs);
}
