/**
 * Role assignment and settlement arithmetic.
 *
 * Roles depend on both revealed values jointly: slot 0 is role A exactly
 * when both bids fall on the same side of half the maximum bid. Role A wins
 * an even sum, role B an odd one.
 */

import { Outcome, Role, SlotIndex } from "./types.js";

export function assignRoles(v1: number, v2: number, maxBid: number): [Role, Role] {
	const half = Math.floor(maxBid / 2);
	const sameSide = (v1 <= half && v2 <= half) || (v1 > half && v2 > half);
	return sameSide ? ["A", "B"] : ["B", "A"];
}

export function winningRole(v1: number, v2: number): Role {
	return (v1 + v2) % 2 === 0 ? "A" : "B";
}

/**
 * Fix the outcome of a pair of revealed bids.
 */
export function computeOutcome(v1: number, v2: number, maxBid: number): Outcome {
	return {
		roles: assignRoles(v1, v2, maxBid),
		winner: winningRole(v1, v2),
		bidSum: v1 + v2,
	};
}

export function isWinner(outcome: Outcome, slot: SlotIndex): boolean {
	return outcome.roles[slot] === outcome.winner;
}

/**
 * What a slot collects on withdrawal: the winner takes `bidSum` from the
 * loser's fee. Both payouts add up to twice the fee.
 */
export function payoutFor(outcome: Outcome, slot: SlotIndex, fee: number): number {
	return isWinner(outcome, slot) ? fee + outcome.bidSum : fee - outcome.bidSum;
}
