import {
	Body,
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
	UseGuards,
} from "@nestjs/common";
import {
	ApiBody,
	ApiConflictResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiGoneResponse,
	ApiHeader,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { DuelsService } from "./duels.service";
import {
	type ApiEnvelope,
	type ApiPaginatedEnvelope,
	Cursor,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForPaginatedDto,
	paginatedEnvelope,
} from "../common/dto/envelopes";
import { ParseCursorPipe } from "../common/pipes/cursor.pipe";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { PrincipalGuard } from "../auth/principal.guard";
import { Principal } from "../auth/principal.decorator";
import { GetTableDto, OperationOutDto } from "./dto/get-table.dto";
import { GetPayoutDto } from "./dto/get-payout.dto";
import { RegisterInDto } from "./dto/register.dto";
import { PlaceCommitmentInDto } from "./dto/place-commitment.dto";
import { RevealBidInDto } from "./dto/reveal-bid.dto";
import { ReceiveFundsInDto } from "./dto/receive-funds.dto";

@ApiTags("1 - Tables")
@ApiExtraModels(GetTableDto, OperationOutDto, GetPayoutDto)
@ApiParam({ name: "tableId", example: "table-1" })
@Controller("api/v1/tables/:tableId")
export class DuelsController {
	constructor(
		private readonly service: DuelsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiOperation({ summary: "Current session of a table" })
	@ApiOkResponse({ schema: getSchemaPathForDto(GetTableDto) })
	async get(
		@Param("tableId") tableId: string,
	): Promise<ApiEnvelope<GetTableDto>> {
		return envelope(await this.service.getTable(tableId));
	}

	@Post("register")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Take a free slot by paying the registration fee" })
	@ApiBody({ type: RegisterInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	@ApiUnauthorizedResponse({ description: "Missing X-Principal header" })
	@ApiConflictResponse({ description: "Already registered, table full or unsettled" })
	@ApiUnprocessableEntityResponse({ description: "Wrong fee amount" })
	async register(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
		@Body() dto: RegisterInDto,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(await this.service.register(tableId, caller, dto.payment));
	}

	@Post("quit")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Leave before an opponent arrives, with a refund" })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	@ApiForbiddenResponse({ description: "Caller is not registered" })
	@ApiConflictResponse({ description: "An opponent has already joined" })
	async quit(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(await this.service.quit(tableId, caller));
	}

	@Post("commitment")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Place the hidden bid" })
	@ApiBody({ type: PlaceCommitmentInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	@ApiGoneResponse({ description: "The bid window has closed" })
	async placeCommitment(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
		@Body() dto: PlaceCommitmentInDto,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(
			await this.service.placeCommitment(tableId, caller, dto.commitment),
		);
	}

	@Post("reveal")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Open the hidden bid" })
	@ApiBody({ type: RevealBidInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	@ApiUnprocessableEntityResponse({
		description: "Out of range, or does not match the commitment",
	})
	async revealBid(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
		@Body() dto: RevealBidInDto,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(
			await this.service.revealBid(tableId, caller, dto.value, dto.secret),
		);
	}

	@Post("withdraw")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Collect the settlement once both bids are open" })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	async withdraw(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(await this.service.withdraw(tableId, caller));
	}

	@Post("claim-timeout")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Take the whole bank from an opponent who stalled" })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	async claimOnOpponentTimeout(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(
			await this.service.claimOnOpponentTimeout(tableId, caller),
		);
	}

	@Post("funds")
	@HttpCode(HttpStatus.OK)
	@UseGuards(PrincipalGuard)
	@ApiHeader({ name: "X-Principal", required: true })
	@ApiOperation({ summary: "Announce funds sent outside registration" })
	@ApiBody({ type: ReceiveFundsInDto })
	@ApiOkResponse({ schema: getSchemaPathForDto(OperationOutDto) })
	async receiveFunds(
		@Param("tableId") tableId: string,
		@Principal() caller: string,
		@Body() dto: ReceiveFundsInDto,
	): Promise<ApiEnvelope<OperationOutDto>> {
		return envelope(
			await this.service.receiveFunds(tableId, caller, dto.amount),
		);
	}

	@Get("payouts")
	@ApiOperation({ summary: "Transfers made from this table, newest first" })
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1-100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiQuery({
		name: "cursor",
		required: false,
		description: "Opaque cursor from previous page",
		schema: { type: "string" },
	})
	@ApiOkResponse({ schema: getSchemaPathForPaginatedDto(GetPayoutDto) })
	async payouts(
		@Param("tableId") tableId: string,
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
		@Query("cursor", ParseCursorPipe) cursor: Cursor,
	): Promise<ApiPaginatedEnvelope<GetPayoutDto[]>> {
		const { items, nextCursor, total } = await this.service.getPayouts(
			tableId,
			limit,
			cursor,
		);
		return paginatedEnvelope(items, { total, nextCursor });
	}

	@Sse("events")
	@ApiOperation({ summary: "Subscribe to the table's notifications" })
	events(@Param("tableId") tableId: string): Observable<SseEvent> {
		return this.sseService.tableEvents(tableId).pipe(
			map((event) => ({
				data: event,
			})),
		);
	}
}
