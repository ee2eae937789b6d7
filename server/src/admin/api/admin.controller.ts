import {
	Controller,
	DefaultValuePipe,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
} from "@nestjs/common";
import {
	ApiBasicAuth,
	ApiConflictResponse,
	ApiOkResponse,
	ApiOperation,
	ApiQuery,
	ApiTags,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import {
	type ApiEnvelope,
	envelope,
	getSchemaPathForDto,
} from "../../common/dto/envelopes";
import {
	ServerSentEventsService,
	SseEvent,
} from "../../common/server-sent-events.service";
import { DuelsService } from "../../duels/duels.service";
import { GetTableDto, OperationOutDto } from "../../duels/dto/get-table.dto";

@ApiTags("Admin")
@ApiBasicAuth()
@Controller("api/v1/admin")
export class AdminController {
	constructor(
		private readonly duelsService: DuelsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@ApiOperation({ summary: "Tables with a match running" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiOkResponse({
		description: "Running tables, most recently touched first",
		schema: {
			type: "object",
			properties: { data: { type: "array", items: { $ref: "#/components/schemas/GetTableDto" } } },
		},
	})
	@Get("tables")
	async activeTables(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
	): Promise<ApiEnvelope<GetTableDto[]>> {
		return envelope(await this.duelsService.listActiveTables(limit));
	}

	@ApiOperation({
		summary: "Settle an expired session on behalf of whoever kept acting",
	})
	@ApiOkResponse({
		description: "Where the bank went",
		schema: getSchemaPathForDto(OperationOutDto),
	})
	@ApiConflictResponse({ description: "Deadline not passed or nobody stuck" })
	@HttpCode(HttpStatus.OK)
	@Post("tables/:tableId/force-resolve")
	async forceResolve(
		@Param("tableId") tableId: string,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(
			await this.duelsService.forceResolve(
				tableId,
				this.duelsService.administrator,
			),
		);
	}

	@Sse("events")
	events(): Observable<SseEvent> {
		return this.sseService.adminEvents.pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}
