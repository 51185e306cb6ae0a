export const DURATION_PATTERN = /^-?\d+[smhdw]$/;

/** Same shape as {@link DURATION_PATTERN}, but only strictly positive amounts. */
export const POSITIVE_DURATION_PATTERN = /^0*[1-9]\d*[smhdw]$/;

const UNIT_SECONDS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 60 * 60 * 24,
  w: 60 * 60 * 24 * 7,
};

/** Seconds, or a string such as `30m`. */
export type Duration = number | string;

export const parseDurationToSeconds = (duration: Duration): number => {
  if (typeof duration === 'number') {
    if (!Number.isFinite(duration)) {
      throw new Error(`Invalid duration: ${duration}`);
    }
    return Math.trunc(duration);
  }

  const trimmed = duration.trim();
  if (!DURATION_PATTERN.test(trimmed)) {
    throw new Error(`Invalid duration: "${duration}"`);
  }

  const unit = trimmed.slice(-1);
  const value = parseInt(trimmed.slice(0, -1), 10);

  return value * UNIT_SECONDS[unit];
};
