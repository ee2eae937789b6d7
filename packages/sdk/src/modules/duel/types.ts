/**
 * Parity Duel Types
 *
 * Types for the two-party commit-reveal game: player slots, the session
 * aggregate, configuration and notifications.
 */

/**
 * Opaque identity of an external caller.
 */
export type Principal = string;

/**
 * Per-player phase, naming the action the player is ready to perform.
 */
export type Phase = "register" | "bid" | "reveal" | "withdraw";

export const PHASES = ["register", "bid", "reveal", "withdraw"] as const;

/**
 * Actions moving a player between phases.
 */
export type PhaseAction =
	| "join"
	| "commit"
	| "reveal"
	| "withdraw"
	| "quit"
	| "forfeit";

/**
 * Index into the fixed pair of slots.
 */
export type SlotIndex = 0 | 1;

export type Role = "A" | "B";

/**
 * One of the two player slots.
 */
export interface PlayerSlot {
	/** Occupant, or null when the slot is free */
	identity: Principal | null;
	/** Lowercase hex SHA-256 commitment, or null before bidding */
	commitment: string | null;
	/** Revealed bid, or 0 before a successful reveal */
	revealedValue: number;
	phase: Phase;
}

/**
 * Settlement facts fixed once both bids are revealed.
 */
export interface Outcome {
	/** Role held by slot 0 and slot 1 */
	roles: [Role, Role];
	winner: Role;
	bidSum: number;
}

/**
 * The mutable aggregate of one game.
 */
export interface SessionState {
	slots: [PlayerSlot, PlayerSlot];
	/** Escrowed registration fees not yet paid out */
	bank: number;
	/** True from the second registration until the final reset */
	inProgress: boolean;
	/** Tick after which the current global phase has expired */
	phaseDeadline: number;
	bidSum: number;
	outcome: Outcome | null;
}

/**
 * Read-only view of a session, including its derived global phase.
 */
export interface SessionSnapshot extends SessionState {
	sessionPhase: Phase;
}

/**
 * Deployment-time game parameters.
 */
export interface GameConfig {
	minBid: number;
	maxBid: number;
	/** Length of every phase window, in clock ticks */
	timeoutTicks: number;
	/** Principal allowed to force-resolve expired sessions */
	administrator: Principal;
}

export const DEFAULT_GAME_CONFIG: Omit<GameConfig, "administrator"> = {
	minBid: 1,
	maxBid: 100,
	timeoutTicks: 25,
};

/**
 * Notifications emitted after an operation succeeds.
 */
export type GameEvent =
	| { type: "FundsReceived"; from: Principal; amount: number }
	| { type: "PlayerRegistered"; player: Principal; amount: number }
	| { type: "PlayerQuit"; player: Principal; amount: number }
	| { type: "CommitmentPlaced"; player: Principal }
	| { type: "BidRevealed"; player: Principal; value: number }
	| { type: "RewardWithdrawn"; player: Principal; amount: number }
	| { type: "TimeoutClaimed"; player: Principal; amount: number }
	| {
			type: "SessionForceResolved";
			recipient: Principal;
			amount: number;
			timedOut: Principal[];
			/** Why the bank did not go to the remaining player */
			redirectReason?: string;
	  };

export type GameEventType = GameEvent["type"];

export type GameEventListener = (event: GameEvent) => void;
