import { ApiProperty } from "@nestjs/swagger";
import { IsNotEmpty, IsString } from "class-validator";

export class PlaceCommitmentInDto {
	@ApiProperty({
		example: "9f2c5d0a6e1b4c8f3a7d2e6b1c5f9a0d4e8b2c6f1a5d9e3b7c0f4a8d2e6b1c5f",
		description: "Hex SHA-256 of `${value}-${secret}`",
	})
	@IsString()
	@IsNotEmpty()
	commitment!: string;
}
