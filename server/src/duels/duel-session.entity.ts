import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
	VersionColumn,
} from "typeorm";
import {
	PHASES,
	type Outcome,
	type Phase,
	type PlayerSlot,
} from "@parity-duel/sdk";

/**
 * Latest snapshot of the session hosted on a table.
 */
@Entity("duel_sessions")
export class DuelSession {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	tableId!: string;

	@Column({ type: "simple-json" })
	slots!: [PlayerSlot, PlayerSlot];

	@Column({ type: "integer" })
	bank!: number;

	@Index()
	@Column({ type: "boolean" })
	inProgress!: boolean;

	@Column({ type: "integer" })
	phaseDeadline!: number;

	@Column({ type: "integer" })
	bidSum!: number;

	@Column({ type: "simple-json", nullable: true })
	outcome!: Outcome | null;

	// derived from the slots, kept for listings
	@Column({ type: "text", enum: PHASES })
	sessionPhase!: Phase;

	@VersionColumn()
	version!: number;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
