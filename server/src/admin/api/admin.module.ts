import { Module } from "@nestjs/common";
import { AdminController } from "./admin.controller";
import { DuelsModule } from "../../duels/duels.module";

@Module({
	imports: [DuelsModule],
	controllers: [AdminController],
})
export class AdminModule {}
