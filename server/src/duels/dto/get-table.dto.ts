import { ApiProperty } from "@nestjs/swagger";
import { PHASES, type Phase, type Role } from "@parity-duel/sdk";

export class PlayerSlotDto {
	@ApiProperty({ nullable: true, type: String, example: "alice" })
	identity!: string | null;

	@ApiProperty({ nullable: true, type: String })
	commitment!: string | null;

	@ApiProperty({ description: "0 until revealed", example: 0 })
	revealedValue!: number;

	@ApiProperty({ enum: PHASES })
	phase!: Phase;
}

export class OutcomeDto {
	@ApiProperty({ enum: ["A", "B"], isArray: true, example: ["A", "B"] })
	roles!: [Role, Role];

	@ApiProperty({ enum: ["A", "B"] })
	winner!: Role;

	@ApiProperty({ example: 74 })
	bidSum!: number;
}

export class GetTableDto {
	@ApiProperty({ example: "table-1" })
	tableId!: string;

	@ApiProperty({ enum: PHASES, description: "Earliest phase among players" })
	sessionPhase!: Phase;

	@ApiProperty({ type: [PlayerSlotDto] })
	players!: PlayerSlotDto[];

	@ApiProperty({ example: 400 })
	bank!: number;

	@ApiProperty()
	inProgress!: boolean;

	@ApiProperty({ description: "Last tick of the current phase window" })
	phaseDeadline!: number;

	@ApiProperty({ description: "Ticks left in the current phase window" })
	ticksRemaining!: number;

	@ApiProperty({ example: 200 })
	registrationFee!: number;

	@ApiProperty({ example: 0 })
	bidSum!: number;

	@ApiProperty({ type: OutcomeDto, nullable: true })
	outcome!: OutcomeDto | null;
}

export class OperationOutDto {
	@ApiProperty({ type: GetTableDto })
	table!: GetTableDto;

	@ApiProperty({ required: false, description: "Amount paid out, if any" })
	amount?: number;

	@ApiProperty({ required: false, description: "Who received the bank" })
	recipient?: string;
}
