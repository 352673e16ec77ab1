export type Clock = {
  nowUnixSeconds: () => number;
  nowIso: () => string;
  /** Resolves once the clock reaches the given time. */
  sleepUntil: (unixSeconds: number) => Promise<void>;
};
