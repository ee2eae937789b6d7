import { ApiProperty } from "@nestjs/swagger";
import { IsNumber } from "class-validator";

export class ReceiveFundsInDto {
	@ApiProperty({ example: 5, description: "Amount sent outside registration" })
	@IsNumber()
	amount!: number;
}
