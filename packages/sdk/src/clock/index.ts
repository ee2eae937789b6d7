/**
 * Clock module - Tick sources for deadline checks
 */

export type { Clock } from "./types.js";
export { ManualClock } from "./manual-clock.js";
export { SystemTickClock } from "./system-tick-clock.js";
