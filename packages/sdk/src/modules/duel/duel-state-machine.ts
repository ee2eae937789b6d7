/**
 * Player Phase Machine Configuration
 *
 * Phases:
 * - register: slot is free
 * - bid: registered, commitment expected
 * - reveal: committed, reveal expected
 * - withdraw: revealed, payout expected
 *
 * Any occupied phase may drop straight back to register when the session is
 * terminated early (quit, timeout claim, forced resolution).
 */

import {
	PhaseMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import { Phase, PhaseAction, SessionState } from "./types.js";

export const PLAYER_PHASE_MACHINE: StateMachineConfig<Phase, PhaseAction> = {
	initialState: "register",
	states: [
		createState("register", 0, ["join"], {
			description: "Slot free, waiting for a registrant",
		}),
		createState("bid", 1, ["commit", "quit", "forfeit"], {
			description: "Registered, waiting for a commitment",
		}),
		createState("reveal", 2, ["reveal", "forfeit"], {
			description: "Committed, waiting for the reveal",
		}),
		createState("withdraw", 3, ["withdraw", "forfeit"], {
			description: "Revealed, waiting for the withdrawal",
		}),
	],
	transitions: [
		createTransition("register", "join", "bid"),
		createTransition("bid", "commit", "reveal"),
		createTransition("reveal", "reveal", "withdraw"),
		createTransition("withdraw", "withdraw", "register"),
		createTransition("bid", "quit", "register"),
		createTransition(["bid", "reveal", "withdraw"], "forfeit", "register"),
	],
};

export const playerPhases = new PhaseMachine(PLAYER_PHASE_MACHINE);

/**
 * Session-wide phase: the slowest occupied slot while a match is running,
 * register otherwise.
 */
export function globalPhase(state: SessionState): Phase {
	if (!state.inProgress) return "register";
	const occupied = state.slots
		.filter((slot) => slot.identity !== null)
		.map((slot) => slot.phase);
	return playerPhases.earliest(occupied);
}
