/** A TCP port from the environment, or `fallback` when missing or out of range. */
export function parsePort(value: string | undefined, fallback: number): number {
  const n = value ? Number.parseInt(value, 10) : Number.NaN;
  return Number.isFinite(n) && n > 0 && n <= 65535 ? n : fallback;
}
