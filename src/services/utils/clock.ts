export type Clock = () => string;

/**
 * ISO timestamps that strictly increase within one process, bumping by a
 * millisecond when the wall clock has not moved since the last call.
 */
export function createMonotonicClock(source: () => number = Date.now): Clock {
  let last = 0;
  return () => {
    const now = source();
    last = now > last ? now : last + 1;
    return new Date(last).toISOString();
  };
}
