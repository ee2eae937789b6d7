import { Controller, Get } from "@nestjs/common";
import { ApiOkResponse, ApiTags } from "@nestjs/swagger";
import { DataSource } from "typeorm";

@ApiTags("Health")
@Controller("health")
export class HealthController {
	constructor(private readonly dataSource: DataSource) {}

	@Get()
	@ApiOkResponse({ description: "Service and database status" })
	health() {
		return {
			status: "ok",
			database: this.dataSource.isInitialized ? "up" : "down",
			timestamp: new Date().toISOString(),
		};
	}
}
