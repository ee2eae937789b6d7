import { ApiProperty } from "@nestjs/swagger";
import { TRANSFER_REASONS, type TransferReason } from "@parity-duel/sdk";

export class GetPayoutDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	externalId!: string;

	@ApiProperty({ example: "table-1" })
	tableId!: string;

	@ApiProperty({ example: "alice" })
	recipient!: string;

	@ApiProperty({ example: 274 })
	amount!: number;

	@ApiProperty({ enum: TRANSFER_REASONS })
	reason!: TransferReason;

	@ApiProperty({
		description: "Unix epoch in milliseconds",
		example: 1732690234123,
	})
	createdAt!: number;
}
