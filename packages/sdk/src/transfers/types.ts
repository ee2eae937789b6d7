/**
 * Transfer Types
 *
 * The engine never moves value itself. It instructs a gateway, which is the
 * externally-verifiable transfer primitive of whatever substrate hosts it.
 */

/**
 * Why a transfer left the escrow.
 */
export const TRANSFER_REASONS = [
	"refund",
	"settlement",
	"timeout-claim",
	"force-resolve",
] as const;
export type TransferReason = (typeof TRANSFER_REASONS)[number];

/**
 * A completed transfer.
 */
export interface Transfer {
	/** Receiving principal */
	to: string;
	/** Amount in the smallest unit */
	amount: number;
	reason: TransferReason;
}

/**
 * Value transfer primitive.
 *
 * Implementations must throw (preferably a TransferError) when the
 * recipient cannot receive. They may call back into the engine.
 */
export interface TransferGateway {
	transfer(transfer: Transfer): void;
}

/**
 * Error thrown when a transfer cannot be completed.
 */
export class TransferError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "TransferError";
	}
}
