import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource, Repository } from "typeorm";
import { nanoid } from "nanoid";
import {
	type Clock,
	type GameConfig,
	type GameEvent,
	ParityDuel,
	type Principal,
	RecordingTransferGateway,
	type SessionState,
	type StoredSession,
	type Transfer,
} from "@parity-duel/sdk";

import { gameConfig, type GameSettings } from "../config/game.config";
import { DUEL_EVENT_IDS, type DuelNotification } from "../common/duel.event";
import { describeError, toError } from "../common/errors";
import { Cursor, cursorToString, emptyCursor } from "../common/dto/envelopes";
import { DuelSession } from "./duel-session.entity";
import { Payout } from "./payout.entity";
import { TypeOrmSessionStore } from "./typeorm-session-store";
import { TICK_CLOCK } from "./tick-clock.provider";
import type { GetTableDto, OperationOutDto } from "./dto/get-table.dto";
import type { GetPayoutDto } from "./dto/get-payout.dto";

type Executed<T> = {
	result: T;
	table: GetTableDto;
	/** Total transferred out of the bank by the operation */
	paid: number;
};

/**
 * Hosts one ParityDuel session per table.
 *
 * Operations on a table run one at a time: the snapshot is loaded, the
 * engine runs against it, and the new snapshot is committed together with
 * the payouts it made. Nothing is written when the engine rejects.
 */
@Injectable()
export class DuelsService {
	private readonly logger = new Logger(DuelsService.name);
	private readonly queues = new Map<string, Promise<void>>();
	private readonly config: GameConfig;

	constructor(
		@Inject(gameConfig.KEY)
		private readonly settings: GameSettings,
		@Inject(TICK_CLOCK)
		private readonly clock: Clock,
		@InjectRepository(DuelSession)
		private readonly sessionRepository: Repository<DuelSession>,
		@InjectRepository(Payout)
		private readonly payoutRepository: Repository<Payout>,
		private readonly dataSource: DataSource,
		private readonly events: EventEmitter2,
	) {
		this.config = ParityDuel.validateConfig({
			minBid: settings.minBid,
			maxBid: settings.maxBid,
			timeoutTicks: settings.timeoutTicks,
			administrator: settings.administrator,
		});
		this.logger.log(
			`bids in [${this.config.minBid}, ${this.config.maxBid}], timeout ${this.config.timeoutTicks} ticks, administrator=${this.config.administrator}`,
		);
	}

	get administrator(): Principal {
		return this.config.administrator;
	}

	async getTable(tableId: string): Promise<GetTableDto> {
		const stored = await new TypeOrmSessionStore(this.sessionRepository).load(
			tableId,
		);
		return this.toTableDto(tableId, this.engineFor(stored?.state));
	}

	async register(
		tableId: string,
		caller: Principal,
		payment: number,
	): Promise<OperationOutDto> {
		const { table } = await this.execute(tableId, "register", caller, (duel) =>
			duel.register(caller, payment),
		);
		return { table };
	}

	async quit(tableId: string, caller: Principal): Promise<OperationOutDto> {
		const { table, paid } = await this.execute(tableId, "quit", caller, (duel) =>
			duel.quit(caller),
		);
		return { table, amount: paid };
	}

	async placeCommitment(
		tableId: string,
		caller: Principal,
		commitment: string,
	): Promise<OperationOutDto> {
		const { table } = await this.execute(tableId, "commit", caller, (duel) =>
			duel.placeCommitment(caller, commitment),
		);
		return { table };
	}

	async revealBid(
		tableId: string,
		caller: Principal,
		value: number,
		secret: string,
	): Promise<OperationOutDto> {
		const { table } = await this.execute(tableId, "reveal", caller, (duel) =>
			duel.revealBid(caller, value, secret),
		);
		return { table };
	}

	async withdraw(tableId: string, caller: Principal): Promise<OperationOutDto> {
		const { result, table } = await this.execute(
			tableId,
			"withdraw",
			caller,
			(duel) => duel.withdraw(caller),
		);
		return { table, amount: result };
	}

	async claimOnOpponentTimeout(
		tableId: string,
		caller: Principal,
	): Promise<OperationOutDto> {
		const { result, table } = await this.execute(
			tableId,
			"claim-timeout",
			caller,
			(duel) => duel.claimOnOpponentTimeout(caller),
		);
		return { table, amount: result };
	}

	async receiveFunds(
		tableId: string,
		from: Principal,
		amount: number,
	): Promise<OperationOutDto> {
		const { table } = await this.execute(tableId, "receive-funds", from, (duel) =>
			duel.receiveFunds(from, amount),
		);
		return { table };
	}

	async forceResolve(
		tableId: string,
		caller: Principal,
	): Promise<OperationOutDto> {
		const { result, table, paid } = await this.execute(
			tableId,
			"force-resolve",
			caller,
			(duel) => duel.adminForceResolve(caller),
		);
		return { table, amount: paid, recipient: result };
	}

	/*
	 * Newest first. The cursor carries the id of the last payout returned.
	 */
	async getPayouts(
		tableId: string,
		limit: number,
		cursor: Cursor = emptyCursor,
	): Promise<{ items: GetPayoutDto[]; nextCursor?: string; total: number }> {
		const take = Math.min(Math.max(limit, 1), 100);

		const qb = this.payoutRepository
			.createQueryBuilder("p")
			.where("p.tableId = :tableId", { tableId });
		if (cursor.idBefore !== undefined) {
			qb.andWhere("p.id < :idBefore", { idBefore: cursor.idBefore });
		}
		const rows = await qb.orderBy("p.id", "DESC").take(take).getMany();

		const total = await this.payoutRepository.count({ where: { tableId } });

		let nextCursor: string | undefined;
		if (rows.length === take) {
			nextCursor = cursorToString(rows[rows.length - 1].id);
		}
		const items: GetPayoutDto[] = rows.map((p) => ({
			externalId: p.externalId,
			tableId: p.tableId,
			recipient: p.recipient,
			amount: p.amount,
			reason: p.reason,
			createdAt: p.createdAt.getTime(),
		}));
		return { items, nextCursor, total };
	}

	/**
	 * Tables with a match running, most recently touched first.
	 */
	async listActiveTables(limit: number): Promise<GetTableDto[]> {
		const sessions = await new TypeOrmSessionStore(
			this.sessionRepository,
		).list({ inProgress: true, limit: Math.min(Math.max(limit, 1), 100) });
		return sessions.map((s) =>
			this.toTableDto(s.metadata.id, this.engineFor(s.state)),
		);
	}

	private execute<T>(
		tableId: string,
		operation: string,
		caller: Principal,
		action: (duel: ParityDuel) => T,
	): Promise<Executed<T>> {
		return this.enqueue(tableId, async () => {
			const stored = await new TypeOrmSessionStore(this.sessionRepository).load(
				tableId,
			);
			const transfers = new RecordingTransferGateway();
			for (const principal of this.settings.unreceivablePrincipals) {
				transfers.rejectTransfersTo(principal);
			}
			const emitted: GameEvent[] = [];
			const duel = this.engineFor(stored?.state, transfers, (e) =>
				emitted.push(e),
			);

			let result: T;
			try {
				result = action(duel);
			} catch (err) {
				this.logger.debug(
					`${operation} on ${tableId} by ${caller} rejected: ${describeError(err)}`,
				);
				throw err;
			}

			const payouts = transfers.history();
			await this.persist(tableId, stored, duel.snapshot(), payouts);
			this.logger.log(`${operation} on ${tableId} by ${caller}`);
			this.publish(tableId, emitted);

			return {
				result,
				table: this.toTableDto(tableId, duel),
				paid: payouts.reduce((sum, t) => sum + t.amount, 0),
			};
		});
	}

	/**
	 * Chain `task` behind every pending task of the same table.
	 */
	private enqueue<T>(tableId: string, task: () => Promise<T>): Promise<T> {
		const previous = this.queues.get(tableId) ?? Promise.resolve();
		const next = previous.then(task);
		const settled = next.then(
			() => undefined,
			() => undefined,
		);
		this.queues.set(tableId, settled);
		void settled.then(() => {
			if (this.queues.get(tableId) === settled) {
				this.queues.delete(tableId);
			}
		});
		return next;
	}

	private async persist(
		tableId: string,
		stored: StoredSession | null,
		state: SessionState,
		transfers: Transfer[],
	): Promise<void> {
		const now = Date.now();
		try {
			await this.dataSource.transaction(async (manager) => {
				const store = new TypeOrmSessionStore(manager.getRepository(DuelSession));
				await store.save(tableId, {
					metadata: {
						id: tableId,
						createdAt: stored?.metadata.createdAt ?? now,
						updatedAt: now,
						version: (stored?.metadata.version ?? 0) + 1,
					},
					state,
				});
				if (transfers.length > 0) {
					const payouts = manager.getRepository(Payout);
					await payouts.save(
						transfers.map((t) =>
							payouts.create({
								externalId: nanoid(16),
								tableId,
								recipient: t.to,
								amount: t.amount,
								reason: t.reason,
							}),
						),
					);
				}
			});
		} catch (err) {
			this.logger.error(`Failed to persist table ${tableId}`, toError(err).stack);
			throw err;
		}
	}

	private publish(tableId: string, emitted: GameEvent[]): void {
		for (const event of emitted) {
			if (event.type === "SessionForceResolved" && event.redirectReason) {
				this.logger.warn(
					`Bank of ${tableId} redirected to ${event.recipient}: ${event.redirectReason}`,
				);
			}
			this.events.emit(DUEL_EVENT_IDS[event.type], {
				eventId: nanoid(8),
				tableId,
				event,
				emittedAt: new Date().toISOString(),
			} satisfies DuelNotification);
		}
	}

	private engineFor(
		state: SessionState | undefined,
		transfers = new RecordingTransferGateway(),
		onEvent?: (event: GameEvent) => void,
	): ParityDuel {
		return new ParityDuel({
			config: this.config,
			clock: this.clock,
			transfers,
			state,
			onEvent,
			onListenerError: (error, event) =>
				this.logger.error(
					`Listener failed on ${event.type}: ${error.message}`,
					error.stack,
				),
		});
	}

	private toTableDto(tableId: string, duel: ParityDuel): GetTableDto {
		const snapshot = duel.snapshot();
		return {
			tableId,
			sessionPhase: snapshot.sessionPhase,
			players: snapshot.slots.map((slot) => ({ ...slot })),
			bank: snapshot.bank,
			inProgress: snapshot.inProgress,
			phaseDeadline: snapshot.phaseDeadline,
			ticksRemaining: duel.ticksRemaining(),
			registrationFee: duel.registrationFee,
			bidSum: snapshot.bidSum,
			outcome: snapshot.outcome,
		};
	}
}
