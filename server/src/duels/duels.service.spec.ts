import { Test } from "@nestjs/testing";
import { getRepositoryToken } from "@nestjs/typeorm";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { DataSource } from "typeorm";
import {
	ManualClock,
	TransferError,
	computeCommitment,
} from "@parity-duel/sdk";
import { DuelsService } from "./duels.service";
import { DuelSession } from "./duel-session.entity";
import { Payout } from "./payout.entity";
import { TICK_CLOCK } from "./tick-clock.provider";
import { gameConfig, type GameSettings } from "../config/game.config";
import { DUEL_EVENT_IDS } from "../common/duel.event";

function fakeSessionRepository() {
	const rows = new Map<string, DuelSession>();
	let nextId = 1;
	return {
		rows,
		findOne: jest.fn(async ({ where }: { where: { tableId: string } }) => {
			const row = rows.get(where.tableId);
			return row ? Object.assign(new DuelSession(), row) : null;
		}),
		create: jest.fn((fields: Partial<DuelSession>) =>
			Object.assign(new DuelSession(), fields),
		),
		merge: jest.fn((target: DuelSession, fields: Partial<DuelSession>) =>
			Object.assign(target, fields),
		),
		save: jest.fn(async (entity: DuelSession) => {
			const previous = rows.get(entity.tableId);
			const now = new Date();
			const stored = Object.assign(new DuelSession(), entity, {
				id: previous?.id ?? nextId++,
				version: (previous?.version ?? 0) + 1,
				createdAt: previous?.createdAt ?? now,
				updatedAt: now,
			});
			rows.set(entity.tableId, stored);
			return stored;
		}),
	};
}

describe("DuelsService", () => {
	const settings: GameSettings = {
		minBid: 1,
		maxBid: 100,
		timeoutTicks: 25,
		tickMs: 12_000,
		clockGenesisMs: 0,
		administrator: "admin",
		unreceivablePrincipals: ["mallory"],
	};

	let service: DuelsService;
	let clock: ManualClock;
	let sessionRepository: ReturnType<typeof fakeSessionRepository>;
	const payoutRepository = {
		create: jest.fn((fields: Partial<Payout>) => fields),
		save: jest.fn(async (rows: Partial<Payout>[]) => rows),
	};
	const dataSource = {
		transaction: jest.fn(),
	};
	const events = { emit: jest.fn() };

	beforeEach(async () => {
		jest.clearAllMocks();
		clock = new ManualClock(100);
		sessionRepository = fakeSessionRepository();
		const manager = {
			getRepository: (target: unknown) =>
				target === DuelSession ? sessionRepository : payoutRepository,
		};
		dataSource.transaction.mockImplementation(
			async (work: (m: typeof manager) => Promise<void>) => work(manager),
		);

		const moduleRef = await Test.createTestingModule({
			providers: [
				DuelsService,
				{ provide: gameConfig.KEY, useValue: settings },
				{ provide: TICK_CLOCK, useValue: clock },
				{
					provide: getRepositoryToken(DuelSession),
					useValue: sessionRepository,
				},
				{ provide: getRepositoryToken(Payout), useValue: payoutRepository },
				{ provide: DataSource, useValue: dataSource },
				{ provide: EventEmitter2, useValue: events },
			],
		}).compile();

		service = moduleRef.get(DuelsService);
	});

	async function playToWithdraw(tableId: string, first: string, second: string) {
		await service.register(tableId, first, 200);
		await service.register(tableId, second, 200);
		await service.placeCommitment(tableId, first, computeCommitment(40, "s1"));
		await service.placeCommitment(tableId, second, computeCommitment(34, "s2"));
		await service.revealBid(tableId, first, 40, "s1");
		await service.revealBid(tableId, second, 34, "s2");
	}

	it("persists the session and publishes the notification", async () => {
		const out = await service.register("t1", "alice", 200);

		expect(out.table).toMatchObject({
			tableId: "t1",
			bank: 200,
			sessionPhase: "register",
			registrationFee: 200,
		});
		expect(sessionRepository.rows.get("t1")).toMatchObject({
			bank: 200,
			inProgress: false,
			sessionPhase: "register",
			version: 1,
		});
		expect(events.emit).toHaveBeenCalledTimes(1);
		expect(events.emit).toHaveBeenCalledWith(
			DUEL_EVENT_IDS.PlayerRegistered,
			expect.objectContaining({
				tableId: "t1",
				event: { type: "PlayerRegistered", player: "alice", amount: 200 },
			}),
		);
	});

	it("writes nothing when the engine rejects", async () => {
		await expect(service.register("t1", "alice", 199)).rejects.toMatchObject({
			code: "WrongFeeAmount",
		});

		expect(dataSource.transaction).not.toHaveBeenCalled();
		expect(events.emit).not.toHaveBeenCalled();
		expect(sessionRepository.rows.size).toBe(0);
	});

	it("runs operations on one table one after the other", async () => {
		const results = await Promise.allSettled([
			service.register("t1", "alice", 200),
			service.register("t1", "bob", 200),
			service.register("t1", "carol", 200),
		]);

		expect(results.map((r) => r.status)).toEqual([
			"fulfilled",
			"fulfilled",
			"rejected",
		]);
		const rejected = results[2];
		if (rejected.status === "rejected") {
			expect(rejected.reason).toMatchObject({ code: "SessionFull" });
		}
		expect(sessionRepository.rows.get("t1")?.bank).toBe(400);
	});

	it("keeps serving a table after a rejected operation", async () => {
		await expect(service.quit("t1", "alice")).rejects.toMatchObject({
			code: "NotRegistered",
		});
		const out = await service.register("t1", "alice", 200);
		expect(out.table.bank).toBe(200);
	});

	it("records settlement payouts with the snapshot", async () => {
		await playToWithdraw("t1", "alice", "bob");

		const out = await service.withdraw("t1", "alice");

		expect(out.amount).toBe(274);
		expect(payoutRepository.save).toHaveBeenCalledTimes(1);
		const [saved] = payoutRepository.save.mock.calls[0];
		expect(saved).toEqual([
			{
				externalId: expect.any(String),
				tableId: "t1",
				recipient: "alice",
				amount: 274,
				reason: "settlement",
			},
		]);
		expect(saved[0].externalId).toHaveLength(16);
		expect(sessionRepository.rows.get("t1")?.bank).toBe(126);
	});

	it("rolls back a withdrawal to an unreceivable principal", async () => {
		await playToWithdraw("t1", "mallory", "bob");
		const before = sessionRepository.rows.get("t1")?.version;

		await expect(service.withdraw("t1", "mallory")).rejects.toBeInstanceOf(
			TransferError,
		);

		expect(sessionRepository.rows.get("t1")).toMatchObject({
			bank: 400,
			version: before,
		});
		expect(payoutRepository.save).not.toHaveBeenCalled();
	});

	it("redirects a forced resolution away from an unreceivable player", async () => {
		await service.register("t1", "mallory", 200);
		await service.register("t1", "bob", 200);
		await service.placeCommitment("t1", "mallory", computeCommitment(7, "s"));
		clock.advance(26);

		const out = await service.forceResolve("t1", service.administrator);

		expect(out).toMatchObject({ recipient: "admin", amount: 400 });
		expect(out.table.bank).toBe(0);
		expect(events.emit).toHaveBeenLastCalledWith(
			DUEL_EVENT_IDS.SessionForceResolved,
			expect.objectContaining({
				event: {
					type: "SessionForceResolved",
					recipient: "admin",
					amount: 400,
					timedOut: ["bob"],
					redirectReason: "Principal mallory cannot receive funds",
				},
			}),
		);
	});

	it("reports the table of an unknown id as pristine", async () => {
		const table = await service.getTable("nowhere");
		expect(table).toEqual({
			tableId: "nowhere",
			sessionPhase: "register",
			players: [
				{ identity: null, commitment: null, revealedValue: 0, phase: "register" },
				{ identity: null, commitment: null, revealedValue: 0, phase: "register" },
			],
			bank: 0,
			inProgress: false,
			phaseDeadline: 0,
			ticksRemaining: 0,
			registrationFee: 200,
			bidSum: 0,
			outcome: null,
		});
	});
});
