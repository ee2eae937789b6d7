import { ApiProperty } from "@nestjs/swagger";
import { IsNumber, IsString, MaxLength } from "class-validator";

export class RevealBidInDto {
	@ApiProperty({ example: 40, description: "The committed bid" })
	@IsNumber()
	value!: number;

	@ApiProperty({ example: "correct-horse", description: "The committed secret" })
	@IsString()
	@MaxLength(256)
	secret!: string;
}
