import { globalPhase } from "./duel-state-machine.js";
import { PlayerSlot, SessionSnapshot, SessionState } from "./types.js";

export function emptySlot(): PlayerSlot {
	return {
		identity: null,
		commitment: null,
		revealedValue: 0,
		phase: "register",
	};
}

/**
 * State of a table with no game on it.
 */
export function createPristineSession(): SessionState {
	return {
		slots: [emptySlot(), emptySlot()],
		bank: 0,
		inProgress: false,
		phaseDeadline: 0,
		bidSum: 0,
		outcome: null,
	};
}

function copySlot(slot: PlayerSlot): PlayerSlot {
	return {
		identity: slot.identity,
		commitment: slot.commitment,
		revealedValue: slot.revealedValue,
		phase: slot.phase,
	};
}

export function cloneSession(state: SessionState): SessionState {
	return {
		slots: [copySlot(state.slots[0]), copySlot(state.slots[1])],
		bank: state.bank,
		inProgress: state.inProgress,
		phaseDeadline: state.phaseDeadline,
		bidSum: state.bidSum,
		outcome: state.outcome
			? {
					roles: [state.outcome.roles[0], state.outcome.roles[1]],
					winner: state.outcome.winner,
					bidSum: state.outcome.bidSum,
				}
			: null,
	};
}

export function isPristine(state: SessionState): boolean {
	return (
		state.slots.every(
			(slot) =>
				slot.identity === null &&
				slot.commitment === null &&
				slot.revealedValue === 0 &&
				slot.phase === "register",
		) &&
		state.bank === 0 &&
		!state.inProgress &&
		state.phaseDeadline === 0 &&
		state.bidSum === 0 &&
		state.outcome === null
	);
}

export function toSnapshot(state: SessionState): SessionSnapshot {
	return { ...cloneSession(state), sessionPhase: globalPhase(state) };
}
