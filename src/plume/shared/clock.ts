/** Monotonic milliseconds. Injected so merge windows can be simulated. */
export type Clock = () => number;

export const monotonicClock: Clock = () => performance.now();
