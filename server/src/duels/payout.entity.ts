import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import { TRANSFER_REASONS, type TransferReason } from "@parity-duel/sdk";

/**
 * A transfer out of a table's bank, committed with the session snapshot
 * that caused it.
 */
@Entity("payouts")
export class Payout {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	tableId!: string;

	@Index()
	@Column({ type: "text" })
	recipient!: string;

	@Column({ type: "integer" })
	amount!: number;

	@Column({ type: "text", enum: TRANSFER_REASONS })
	reason!: TransferReason;

	@CreateDateColumn()
	createdAt!: Date;
}
