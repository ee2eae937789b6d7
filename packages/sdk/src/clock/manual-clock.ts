import { ContractError } from "../contracts/index.js";
import { Clock } from "./types.js";

/**
 * Clock advanced by hand. Used by tests and simulations.
 *
 * @example
 * ```typescript
 * const clock = new ManualClock(100);
 * clock.advance(26);
 * clock.now(); // 126
 * ```
 */
export class ManualClock implements Clock {
	private tick: number;

	constructor(start = 0) {
		this.tick = start;
	}

	now(): number {
		return this.tick;
	}

	advance(ticks = 1): number {
		if (!Number.isInteger(ticks) || ticks < 0) {
			throw new ContractError(
				`Cannot advance clock by ${ticks}`,
				"CLOCK_REGRESSION",
			);
		}
		this.tick += ticks;
		return this.tick;
	}

	set(tick: number): void {
		if (tick < this.tick) {
			throw new ContractError(
				`Cannot move clock back from ${this.tick} to ${tick}`,
				"CLOCK_REGRESSION",
			);
		}
		this.tick = tick;
	}
}
