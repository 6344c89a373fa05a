/**
 * Time source for components whose behavior depends on elapsed time
 * (cache expiry, run timing). Tests substitute a manual clock.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
