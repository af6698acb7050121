function pad(n: number): string {
  return String(n).padStart(2, '0');
}

/**
 * Compact UTC timestamp, e.g. "2610191405" for 2026-10-19 14:05
 */
export function runStamp(date: Date): string {
  return (
    pad(date.getUTCFullYear() % 100) +
    pad(date.getUTCMonth() + 1) +
    pad(date.getUTCDate()) +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes())
  );
}

/**
 * ReferenceGenerator
 * Produces "{timestamp}-{ordinal}" references for rows that carry none.
 * One instance per run; a repeated ordinal gets a counter suffix
 * ("-1", "-2", ...) so references stay unique within the run.
 * References taken from the source are claimed here too, so a generated
 * reference never collides with one of them.
 */
export class ReferenceGenerator {
  readonly stamp: string;
  private readonly issued = new Map<string, number>();
  private readonly used = new Set<string>();

  constructor(runStartedAt: Date = new Date()) {
    this.stamp = runStamp(runStartedAt);
  }

  /** Reserve a reference for the run; false when it is already taken */
  claim(reference: string): boolean {
    if (this.used.has(reference)) return false;
    this.used.add(reference);
    return true;
  }

  next(ordinal: string): string {
    const base = `${this.stamp}-${ordinal}`;
    for (;;) {
      const count = this.issued.get(ordinal) ?? 0;
      this.issued.set(ordinal, count + 1);
      const reference = count === 0 ? base : `${base}-${count}`;
      if (this.claim(reference)) return reference;
    }
  }
}
