/** Milliseconds since the epoch; injected wherever expiry or cache age is compared. */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function nowIso(clock: Clock = systemClock): string {
  return new Date(clock()).toISOString();
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
