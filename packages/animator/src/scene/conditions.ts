/**
 * Decides whether a generator runs on a given scene beat
 */
export type BeatCondition = (beat: number) => boolean;

export const always = (): BeatCondition => () => true;

export const everyNBeats = (n: number): BeatCondition => (beat) => beat % n === 0;

/** Run for `on` beats, then skip `off` beats */
export const everyOnOff = (on: number, off: number): BeatCondition => (beat) =>
  beat % (on + off) < on;

/** Skip `off` beats, then run for `on` beats */
export const everyOffOn = (off: number, on: number): BeatCondition => (beat) =>
  beat % (on + off) >= off;

export const beforeN = (n: number): BeatCondition => (beat) => beat < n;

export const afterN = (n: number): BeatCondition => (beat) => beat >= n;

export const atBeat = (n: number): BeatCondition => (beat) => beat === n;

/** Inclusive on both ends */
export const betweenBeats = (start: number, end: number): BeatCondition => (beat) =>
  start <= beat && beat <= end;

export const allOf = (...conditions: BeatCondition[]): BeatCondition => (beat) =>
  conditions.every((condition) => condition(beat));
