/**
 * Parity Duel Module
 *
 * Two-party commit-reveal game over an escrowed bank.
 */

// Types
export type {
	Principal,
	Phase,
	PhaseAction,
	SlotIndex,
	Role,
	PlayerSlot,
	Outcome,
	SessionState,
	SessionSnapshot,
	GameConfig,
	GameEvent,
	GameEventType,
	GameEventListener,
} from "./types.js";

export { PHASES, DEFAULT_GAME_CONFIG } from "./types.js";

// Errors
export { GameError, GAME_ERROR_CODES, isGameError } from "./errors.js";
export type { GameErrorCode } from "./errors.js";

// Commitments
export {
	encodeReveal,
	computeCommitment,
	isWellFormedCommitment,
	verifyCommitment,
} from "./duel-commitment.js";

// Fairness and settlement
export {
	assignRoles,
	winningRole,
	computeOutcome,
	isWinner,
	payoutFor,
} from "./duel-fairness.js";
export { Bank } from "./duel-ledger.js";

// Phases and session lifecycle
export {
	PLAYER_PHASE_MACHINE,
	playerPhases,
	globalPhase,
} from "./duel-state-machine.js";
export {
	emptySlot,
	createPristineSession,
	cloneSession,
	isPristine,
	toSnapshot,
} from "./duel-session.js";

// Main engine
export { ParityDuel } from "./duel-contract.js";
export type { ParityDuelOptions } from "./duel-contract.js";
