/* eslint-disable */

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/** Source of uniform values in [0, 1), shaped like Math.random. */
export type RandomSource = () => number;
