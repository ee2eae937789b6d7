/**
 * TypeORM Session Store
 *
 * Implements the SDK's SessionStore over the DuelSession entity, one row
 * per table.
 */

import type { Repository } from "typeorm";
import {
	cloneSession,
	globalPhase,
	type QueryOptions,
	type SessionState,
	type SessionStore,
	StorageError,
	type StoredSession,
} from "@parity-duel/sdk";
import { DuelSession } from "./duel-session.entity";

type SessionColumns = Pick<
	DuelSession,
	| "slots"
	| "bank"
	| "inProgress"
	| "phaseDeadline"
	| "bidSum"
	| "outcome"
	| "sessionPhase"
>;

/**
 * TypeORM-based session store.
 *
 * @example
 * ```typescript
 * const store = new TypeOrmSessionStore(dataSource.getRepository(DuelSession));
 * await store.save("table-1", { metadata, state: duel.snapshot() });
 * const stored = await store.load("table-1");
 * ```
 */
export class TypeOrmSessionStore implements SessionStore {
	constructor(private readonly repository: Repository<DuelSession>) {}

	private toColumns(state: SessionState): SessionColumns {
		const copy = cloneSession(state);
		return {
			slots: copy.slots,
			bank: copy.bank,
			inProgress: copy.inProgress,
			phaseDeadline: copy.phaseDeadline,
			bidSum: copy.bidSum,
			outcome: copy.outcome,
			sessionPhase: globalPhase(copy),
		};
	}

	private toStoredSession(entity: DuelSession): StoredSession {
		return {
			metadata: {
				id: entity.tableId,
				createdAt: entity.createdAt.getTime(),
				updatedAt: entity.updatedAt.getTime(),
				version: entity.version,
			},
			state: cloneSession({
				slots: entity.slots,
				bank: entity.bank,
				inProgress: entity.inProgress,
				phaseDeadline: entity.phaseDeadline,
				bidSum: entity.bidSum,
				outcome: entity.outcome,
			}),
		};
	}

	async save(id: string, session: StoredSession): Promise<void> {
		try {
			const columns = this.toColumns(session.state);
			const existing = await this.repository.findOne({
				where: { tableId: id },
			});

			if (existing) {
				await this.repository.save(this.repository.merge(existing, columns));
			} else {
				await this.repository.save(
					this.repository.create({ ...columns, tableId: id }),
				);
			}
		} catch (error) {
			throw new StorageError(`Failed to save session ${id}`, "SAVE_ERROR", {
				error,
			});
		}
	}

	async load(id: string): Promise<StoredSession | null> {
		try {
			const entity = await this.repository.findOne({
				where: { tableId: id },
			});
			return entity ? this.toStoredSession(entity) : null;
		} catch (error) {
			throw new StorageError(`Failed to load session ${id}`, "LOAD_ERROR", {
				error,
			});
		}
	}

	async delete(id: string): Promise<void> {
		try {
			await this.repository.delete({ tableId: id });
		} catch (error) {
			throw new StorageError(
				`Failed to delete session ${id}`,
				"DELETE_ERROR",
				{ error },
			);
		}
	}

	async exists(id: string): Promise<boolean> {
		try {
			const count = await this.repository.count({ where: { tableId: id } });
			return count > 0;
		} catch (error) {
			throw new StorageError(
				`Failed to check existence of session ${id}`,
				"EXISTS_ERROR",
				{ error },
			);
		}
	}

	async list(options?: QueryOptions): Promise<StoredSession[]> {
		try {
			const qb = this.repository.createQueryBuilder("s");

			if (options?.inProgress !== undefined) {
				// SQLite keeps booleans as 0/1
				qb.andWhere("s.inProgress = :inProgress", {
					inProgress: options.inProgress ? 1 : 0,
				});
			}

			qb.orderBy("s.updatedAt", options?.sortOrder === "asc" ? "ASC" : "DESC");
			if (options?.offset) {
				qb.skip(options.offset);
			}
			if (options?.limit) {
				qb.take(options.limit);
			}

			const entities = await qb.getMany();
			return entities.map((e) => this.toStoredSession(e));
		} catch (error) {
			throw new StorageError("Failed to list sessions", "QUERY_ERROR", {
				error,
			});
		}
	}
}
