import { ContractError } from "../../contracts/index.js";

/**
 * Every reason a game operation can be rejected.
 */
export const GAME_ERROR_CODES = [
	"AlreadyRegistered",
	"SessionFull",
	"SessionUnsettled",
	"WrongFeeAmount",
	"NotRegistered",
	"CannotQuitNow",
	"MalformedCommitment",
	"OpponentMissing",
	"DuplicateBid",
	"TimedOut",
	"BidsIncomplete",
	"InvalidRange",
	"AlreadyRevealed",
	"CommitmentMismatch",
	"RevealIncomplete",
	"PhaseNotExpired",
	"CannotClaimNow",
	"NotAdministrator",
	"NobodyTimedOut",
	"InvalidAmount",
] as const;
export type GameErrorCode = (typeof GAME_ERROR_CODES)[number];

/**
 * Rejection of a game operation. Thrown before any state changes.
 */
export class GameError extends ContractError {
	constructor(
		public readonly code: GameErrorCode,
		message: string,
		details?: unknown,
	) {
		super(message, code, details);
		this.name = "GameError";
	}
}

export function isGameError(err: unknown): err is GameError {
	return err instanceof GameError;
}
