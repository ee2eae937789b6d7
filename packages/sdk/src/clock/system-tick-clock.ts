import { ContractError } from "../contracts/index.js";
import { Clock } from "./types.js";

/**
 * Derives ticks from wall-clock time: one tick every `tickMs` milliseconds
 * since `genesisMs`. Wall-clock steps backwards are absorbed so the counter
 * never decreases.
 */
export class SystemTickClock implements Clock {
	private last = 0;

	constructor(
		private readonly tickMs: number,
		private readonly genesisMs = 0,
		private readonly nowMs: () => number = Date.now,
	) {
		if (!Number.isFinite(tickMs) || tickMs <= 0) {
			throw new ContractError(
				`Tick length must be positive, got ${tickMs}`,
				"INVALID_CONFIG",
			);
		}
	}

	now(): number {
		const elapsed = Math.max(0, this.nowMs() - this.genesisMs);
		this.last = Math.max(this.last, Math.floor(elapsed / this.tickMs));
		return this.last;
	}
}
