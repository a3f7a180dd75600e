const MINUTE_MS = 60_000;

export type ThrottleDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retry_after_seconds: number };

/**
 * Per-key request counter over fixed clock minutes.
 *
 * A key may make `maxPerMinute` requests within one clock minute; the
 * next one is refused until the minute rolls over. Counters for past
 * minutes are dropped on rollover, so memory stays bounded by the
 * number of distinct keys seen in the current minute.
 */
export class MinuteThrottle {
  private readonly counts = new Map<string, number>();
  private currentMinute = Number.NaN;

  constructor(private readonly maxPerMinute: number) {}

  admit(key: string, nowMs: number): ThrottleDecision {
    const minute = Math.floor(nowMs / MINUTE_MS);

    if (minute !== this.currentMinute) {
      this.counts.clear();
      this.currentMinute = minute;
    }

    const count = (this.counts.get(key) ?? 0) + 1;
    this.counts.set(key, count);

    if (count > this.maxPerMinute) {
      const resetAt = (minute + 1) * MINUTE_MS;
      return {
        allowed: false,
        retry_after_seconds: Math.max(1, Math.ceil((resetAt - nowMs) / 1000)),
      };
    }

    return { allowed: true, remaining: this.maxPerMinute - count };
  }

  /** Number of keys tracked for the current minute. */
  get size(): number {
    return this.counts.size;
  }
}
