export interface Clock {
  /** Milliseconds since the epoch, or undefined when unavailable */
  epochMillis(): number | undefined;
  epochSeconds(): number;
  /** Nanoseconds since the epoch */
  epochNanos(): bigint;
}

export interface Timestamp {
  value: string;
  resolution: "ms" | "s";
}

/**
 * Wall clock whose epochNanos() values strictly increase across calls.
 */
export function createSystemClock(): Clock {
  let lastNanos = 0n;
  return {
    epochMillis() {
      return Date.now();
    },
    epochSeconds() {
      return Math.floor(Date.now() / 1000);
    },
    epochNanos() {
      // Date.now() only has millisecond precision; borrow the sub-millisecond
      // part from the high-resolution timer. The two are not in phase.
      const nanos = BigInt(Date.now()) * 1_000_000n + (process.hrtime.bigint() % 1_000_000n);
      lastNanos = nanos > lastNanos ? nanos : lastNanos + 1n;
      return lastNanos;
    },
  };
}

export const systemClock: Clock = createSystemClock();

/**
 * The timestamp a commit message is derived from. Falls back to second
 * resolution when the clock cannot provide milliseconds.
 */
export function commitTimestamp(clock: Clock): Timestamp {
  const ms = clock.epochMillis();
  if (ms !== undefined && Number.isFinite(ms)) {
    return { value: String(Math.trunc(ms)), resolution: "ms" };
  }
  return { value: String(clock.epochSeconds()), resolution: "s" };
}
