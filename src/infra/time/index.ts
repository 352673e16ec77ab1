export { createSystemClock } from "./system-clock/system-clock";
export type { SystemClockOptions } from "./system-clock/system-clock";
