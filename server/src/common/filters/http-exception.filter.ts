import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	type GameErrorCode,
	GameError,
	StorageError,
	TransferError,
} from "@parity-duel/sdk";

const GAME_ERROR_STATUS = {
	NotRegistered: HttpStatus.FORBIDDEN,
	NotAdministrator: HttpStatus.FORBIDDEN,
	TimedOut: HttpStatus.GONE,
	WrongFeeAmount: HttpStatus.UNPROCESSABLE_ENTITY,
	InvalidRange: HttpStatus.UNPROCESSABLE_ENTITY,
	MalformedCommitment: HttpStatus.UNPROCESSABLE_ENTITY,
	CommitmentMismatch: HttpStatus.UNPROCESSABLE_ENTITY,
	InvalidAmount: HttpStatus.UNPROCESSABLE_ENTITY,
	AlreadyRegistered: HttpStatus.CONFLICT,
	SessionFull: HttpStatus.CONFLICT,
	SessionUnsettled: HttpStatus.CONFLICT,
	CannotQuitNow: HttpStatus.CONFLICT,
	OpponentMissing: HttpStatus.CONFLICT,
	DuplicateBid: HttpStatus.CONFLICT,
	BidsIncomplete: HttpStatus.CONFLICT,
	AlreadyRevealed: HttpStatus.CONFLICT,
	RevealIncomplete: HttpStatus.CONFLICT,
	PhaseNotExpired: HttpStatus.CONFLICT,
	CannotClaimNow: HttpStatus.CONFLICT,
	NobodyTimedOut: HttpStatus.CONFLICT,
} as const satisfies Record<GameErrorCode, HttpStatus>;

export function statusForGameError(code: GameErrorCode): HttpStatus {
	return GAME_ERROR_STATUS[code];
}

function messageOf(body: object): string | undefined {
	if (!("message" in body)) return undefined;
	const { message } = body;
	if (Array.isArray(message)) return message.join("; ");
	return typeof message === "string" ? message : undefined;
}

/**
 * Catches all exceptions and answers a consistent JSON error envelope:
 * `{ error, code?, statusCode }`.
 */
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost): void {
		const response = host.switchToHttp().getResponse<Response>();

		let status: number = HttpStatus.INTERNAL_SERVER_ERROR;
		let message = "Internal server error";
		let code: string | undefined;

		if (exception instanceof HttpException) {
			status = exception.getStatus();
			const res = exception.getResponse();
			message =
				typeof res === "string" ? res : (messageOf(res) ?? exception.message);
		} else if (exception instanceof GameError) {
			status = statusForGameError(exception.code);
			message = exception.message;
			code = exception.code;
		} else if (exception instanceof TransferError) {
			// the payee refused the funds; the operation was rolled back
			status = HttpStatus.BAD_GATEWAY;
			message = exception.message;
			code = exception.code;
		} else if (exception instanceof StorageError) {
			this.logger.error(`Storage failure: ${exception.message}`, exception.stack);
			code = exception.code;
		} else if (exception instanceof Error) {
			this.logger.error(`Unhandled exception: ${exception.message}`, exception.stack);
		} else {
			this.logger.error("Unknown exception", String(exception));
		}

		const body =
			code === undefined
				? { error: message, statusCode: status }
				: { error: message, code, statusCode: status };
		response.status(status).json(body);
	}
}
