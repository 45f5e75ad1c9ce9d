export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function isoOrNull(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

/**
 * Parses an ISO-8601 timestamp; null for null or an unparseable string.
 */
export function parseIso(s: string | null): Date | null {
  if (s === null) return null;
  const d = new Date(s);
  return Number.isNaN(d.getTime()) ? null : d;
}
