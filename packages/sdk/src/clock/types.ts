/**
 * Clock Types
 *
 * The engine measures deadlines in ticks of an external, monotonically
 * non-decreasing counter (a block height, or anything behaving like one).
 */

/**
 * Source of the current tick.
 */
export interface Clock {
	/** Current tick; never smaller than a value previously returned */
	now(): number;
}
