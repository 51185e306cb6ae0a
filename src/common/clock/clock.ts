/** Injection token for the {@link Clock} used by time-dependent services. */
export const CLOCK = Symbol('CLOCK');

export interface Clock {
  /** Milliseconds since the Unix epoch. */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };
