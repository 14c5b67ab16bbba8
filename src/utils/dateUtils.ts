export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

export const MINUTE_MS = 60 * 1000;
export const HOUR_MS = 60 * MINUTE_MS;
export const DAY_MS = 24 * HOUR_MS;

/**
 * Format a Date for a timestamp column. ISO-8601 in UTC so that
 * text comparison and ordering agree with time ordering.
 */
export function toDbTimestamp(input: Date): string {
  return input.toISOString();
}

/**
 * Timestamp columns come back as Date (pg), ISO text or epoch millis
 * depending on the driver.
 */
export function fromDbTimestamp(value: Date | string | number): Date {
  const d = value instanceof Date ? new Date(value.getTime()) : new Date(value);
  if (isNaN(d.getTime())) {
    throw new Error(`Unrecognised timestamp value: ${String(value)}`);
  }
  return d;
}

export function addMs(input: Date, ms: number): Date {
  return new Date(input.getTime() + ms);
}

/**
 * Calendar day in UTC, "YYYY-MM-DD".
 */
export function utcDay(input: Date): string {
  return input.toISOString().slice(0, 10);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
