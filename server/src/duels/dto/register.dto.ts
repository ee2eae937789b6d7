import { ApiProperty } from "@nestjs/swagger";
import { IsInt } from "class-validator";

export class RegisterInDto {
	@ApiProperty({
		example: 200,
		description: "Amount paid in; must equal the registration fee",
	})
	@IsInt()
	payment!: number;
}
