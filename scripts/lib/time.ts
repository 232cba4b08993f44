export function parseDate(input: string | undefined | null): Date | null {
  if (!input) return null;
  const trimmed = input.trim();
  if (!trimmed) return null;

  // RFC 822 ("Mon, 15 Dec 2025 12:34:56 +0000") and ISO 8601 both go through Date
  const direct = new Date(trimmed);
  if (!Number.isNaN(direct.getTime())) return direct;
  return null;
}

export function fromUnixSeconds(seconds: unknown): Date | null {
  if (typeof seconds !== "number" || !Number.isFinite(seconds) || seconds <= 0) return null;
  return new Date(seconds * 1000);
}

export function toIso(date: Date): string {
  return date.toISOString();
}

/** `YYYY-MM-DD` in UTC. */
export function toDateStamp(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function earliest(dates: (Date | null)[]): Date | null {
  let best: Date | null = null;
  for (const d of dates) {
    if (!d) continue;
    if (!best || d.getTime() < best.getTime()) best = d;
  }
  return best;
}
