import { Transfer, TransferError, TransferGateway } from "./types.js";

/**
 * In-memory transfer gateway.
 *
 * Keeps every successful transfer in order. Principals marked unreceivable
 * make transfers to them fail. An optional hook runs before each transfer is
 * recorded, which lets tests act as a recipient that calls back in.
 *
 * @example
 * ```typescript
 * const gateway = new RecordingTransferGateway();
 * gateway.rejectTransfersTo("mallory");
 * ```
 */
export class RecordingTransferGateway implements TransferGateway {
	private readonly transfers: Transfer[] = [];
	private readonly unreceivable = new Set<string>();

	constructor(private readonly onTransfer?: (transfer: Transfer) => void) {}

	transfer(transfer: Transfer): void {
		if (this.unreceivable.has(transfer.to)) {
			throw new TransferError(
				`Principal ${transfer.to} cannot receive funds`,
				"UNRECEIVABLE",
				{ ...transfer },
			);
		}
		this.onTransfer?.(transfer);
		this.transfers.push({ ...transfer });
	}

	rejectTransfersTo(principal: string): void {
		this.unreceivable.add(principal);
	}

	acceptTransfersTo(principal: string): void {
		this.unreceivable.delete(principal);
	}

	/**
	 * All recorded transfers, oldest first.
	 */
	history(): Transfer[] {
		return this.transfers.map((t) => ({ ...t }));
	}

	/**
	 * Sum of everything sent to a principal.
	 */
	totalTo(principal: string): number {
		return this.transfers
			.filter((t) => t.to === principal)
			.reduce((sum, t) => sum + t.amount, 0);
	}

	clear(): void {
		this.transfers.length = 0;
	}
}
