/**
 * Parity Duel SDK
 *
 * Commit-reveal engine for two-party parity games over an escrowed bank.
 *
 * @example
 * ```typescript
 * import {
 *   ParityDuel,
 *   ManualClock,
 *   RecordingTransferGateway,
 *   computeCommitment,
 * } from "@parity-duel/sdk";
 *
 * const duel = new ParityDuel({
 *   config: { administrator: "operator" },
 *   clock: new ManualClock(),
 *   transfers: new RecordingTransferGateway(),
 * });
 *
 * duel.register("alice", duel.registrationFee);
 * duel.register("bob", duel.registrationFee);
 * duel.placeCommitment("alice", computeCommitment(40, "alice-secret"));
 * ```
 */

// Contracts - Phase state machines
export {
	// Types
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type ActionResult,
	// Classes
	PhaseMachine,
	ContractError,
	// Utilities
	createState,
	createTransition,
} from "./contracts/index.js";

// Clock - Tick sources
export {
	type Clock,
	ManualClock,
	SystemTickClock,
} from "./clock/index.js";

// Transfers - Value transfer primitive
export {
	type TransferReason,
	type Transfer,
	type TransferGateway,
	TRANSFER_REASONS,
	TransferError,
	RecordingTransferGateway,
} from "./transfers/index.js";

// Storage - Persistence adapters
export {
	type SessionMetadata,
	type StoredSession,
	type QueryOptions,
	type SessionStore,
	MemorySessionStore,
	StorageError,
} from "./storage/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	isHexOfLength,
	stringToBytes,
	bytesEqual,
} from "./utils/index.js";

// Duel module
export {
	type Principal,
	type Phase,
	type PhaseAction,
	type SlotIndex,
	type Role,
	type PlayerSlot,
	type Outcome,
	type SessionState,
	type SessionSnapshot,
	type GameConfig,
	type GameEvent,
	type GameEventType,
	type GameEventListener,
	type GameErrorCode,
	type ParityDuelOptions,
	PHASES,
	DEFAULT_GAME_CONFIG,
	GameError,
	GAME_ERROR_CODES,
	isGameError,
	encodeReveal,
	computeCommitment,
	isWellFormedCommitment,
	verifyCommitment,
	assignRoles,
	winningRole,
	computeOutcome,
	isWinner,
	payoutFor,
	Bank,
	PLAYER_PHASE_MACHINE,
	playerPhases,
	globalPhase,
	emptySlot,
	createPristineSession,
	cloneSession,
	isPristine,
	toSnapshot,
	ParityDuel,
} from "./modules/duel/index.js";
