import type { GameEvent, GameEventType } from "@parity-duel/sdk";

export type TableId = string;

/**
 * Event bus names, one per engine notification.
 */
export const DUEL_EVENT_IDS = {
	FundsReceived: "duel.funds-received",
	PlayerRegistered: "duel.player-registered",
	PlayerQuit: "duel.player-quit",
	CommitmentPlaced: "duel.commitment-placed",
	BidRevealed: "duel.bid-revealed",
	RewardWithdrawn: "duel.reward-withdrawn",
	TimeoutClaimed: "duel.timeout-claimed",
	SessionForceResolved: "duel.session-force-resolved",
} as const satisfies Record<GameEventType, string>;

export type DuelEventId = (typeof DUEL_EVENT_IDS)[GameEventType];

export type DuelNotification = {
	eventId: string;
	tableId: TableId;
	event: GameEvent;
	emittedAt: string; // ISO timestamp
};
