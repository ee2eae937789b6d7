import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Observable, Subject } from "rxjs";
import type { GameEvent } from "@parity-duel/sdk";
import { DUEL_EVENT_IDS, type DuelNotification } from "./duel.event";

type DuelSse = {
	tableId: string;
	eventId: string;
	emittedAt: string;
} & GameEvent;

export type SseEvent<T = unknown> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<DuelSse>();

	get adminEvents(): Observable<DuelSse> {
		return this.events$.asObservable();
	}

	tableEvents(tableId?: string): Observable<DuelSse> {
		if (tableId) {
			return this.events$.pipe(filter((e) => e.tableId === tableId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(DUEL_EVENT_IDS.FundsReceived)
	onFundsReceived(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.PlayerRegistered)
	onPlayerRegistered(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.PlayerQuit)
	onPlayerQuit(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.CommitmentPlaced)
	onCommitmentPlaced(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.BidRevealed)
	onBidRevealed(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.RewardWithdrawn)
	onRewardWithdrawn(evt: DuelNotification) {
		this.push(evt);
	}

	@OnEvent(DUEL_EVENT_IDS.TimeoutClaimed)
	onTimeoutClaimed(evt: DuelNotification) {
		this.push(evt);
	}

	// Admin events
	@OnEvent(DUEL_EVENT_IDS.SessionForceResolved)
	onSessionForceResolved(evt: DuelNotification) {
		this.push(evt);
	}

	private push(evt: DuelNotification) {
		this.events$.next({
			...evt.event,
			tableId: evt.tableId,
			eventId: evt.eventId,
			emittedAt: evt.emittedAt,
		});
	}
}
