/**
 * Parity Duel
 *
 * Session state machine of the two-party commit-reveal game. This is the
 * class hosts interact with: it owns the session, validates every call
 * against the caller's slot, the global phase and the deadline, and settles
 * the bank through a TransferGateway.
 */

import { ContractError } from "../../contracts/index.js";
import { Clock } from "../../clock/index.js";
import {
	TransferError,
	TransferGateway,
	TransferReason,
} from "../../transfers/index.js";
import {
	isWellFormedCommitment,
	normalizeCommitment,
	verifyCommitment,
} from "./duel-commitment.js";
import { GameError } from "./errors.js";
import { computeOutcome, payoutFor } from "./duel-fairness.js";
import { Bank } from "./duel-ledger.js";
import { globalPhase, playerPhases } from "./duel-state-machine.js";
import {
	cloneSession,
	createPristineSession,
	emptySlot,
	toSnapshot,
} from "./duel-session.js";
import {
	DEFAULT_GAME_CONFIG,
	GameConfig,
	GameEvent,
	GameEventListener,
	Phase,
	PhaseAction,
	PlayerSlot,
	Principal,
	SessionSnapshot,
	SessionState,
	SlotIndex,
} from "./types.js";

export interface ParityDuelOptions {
	config: Partial<GameConfig> & Pick<GameConfig, "administrator">;
	clock: Clock;
	transfers: TransferGateway;
	/** Session to resume; a pristine one when omitted */
	state?: SessionState;
	onEvent?: GameEventListener;
	/** Called with the error of a listener that threw; ignored when omitted */
	onListenerError?: (error: Error, event: GameEvent) => void;
}

/**
 * Two-player parity game over an escrowed bank.
 *
 * @example
 * ```typescript
 * const duel = new ParityDuel({
 *   config: { administrator: "admin" },
 *   clock: new ManualClock(),
 *   transfers: new RecordingTransferGateway(),
 * });
 *
 * duel.register("alice", duel.registrationFee);
 * duel.register("bob", duel.registrationFee);
 * duel.placeCommitment("alice", computeCommitment(40, "nA"));
 * duel.placeCommitment("bob", computeCommitment(34, "nB"));
 * duel.revealBid("alice", 40, "nA");
 * duel.revealBid("bob", 34, "nB");
 * duel.withdraw("alice"); // 274
 * duel.withdraw("bob"); // 126
 * ```
 */
export class ParityDuel {
	readonly config: GameConfig;
	readonly registrationFee: number;
	private readonly clock: Clock;
	private readonly transfers: TransferGateway;
	private readonly listeners = new Set<GameEventListener>();
	private state: SessionState;
	private pendingEvents: GameEvent[] = [];
	private depth = 0;
	private readonly onListenerError: (error: Error, event: GameEvent) => void;

	constructor(options: ParityDuelOptions) {
		this.config = ParityDuel.validateConfig({
			...DEFAULT_GAME_CONFIG,
			...options.config,
		});
		this.registrationFee = 2 * this.config.maxBid;
		this.clock = options.clock;
		this.transfers = options.transfers;
		this.state = options.state
			? cloneSession(options.state)
			: createPristineSession();
		if (options.onEvent) this.listeners.add(options.onEvent);
		this.onListenerError = options.onListenerError ?? (() => undefined);
	}

	static validateConfig(config: GameConfig): GameConfig {
		const problems: string[] = [];
		if (!Number.isSafeInteger(config.minBid) || config.minBid < 1) {
			problems.push("minBid must be a positive integer");
		}
		if (!Number.isSafeInteger(config.maxBid) || config.maxBid < config.minBid) {
			problems.push("maxBid must be an integer not below minBid");
		}
		if (!Number.isSafeInteger(config.timeoutTicks) || config.timeoutTicks < 1) {
			problems.push("timeoutTicks must be a positive integer");
		}
		if (config.administrator.length === 0) {
			problems.push("administrator must be set");
		}
		if (problems.length > 0) {
			throw new ContractError(
				`Invalid game configuration: ${problems.join("; ")}`,
				"INVALID_CONFIG",
				{ problems },
			);
		}
		return { ...config };
	}

	// ==================== Views ====================

	get sessionPhase(): Phase {
		return globalPhase(this.state);
	}

	snapshot(): SessionSnapshot {
		return toSnapshot(this.state);
	}

	slotOf(principal: Principal): SlotIndex | null {
		if (this.state.slots[0].identity === principal) return 0;
		if (this.state.slots[1].identity === principal) return 1;
		return null;
	}

	/**
	 * Ticks left in the current phase window, 0 when no match is running.
	 */
	ticksRemaining(): number {
		if (!this.state.inProgress) return 0;
		return Math.max(0, this.state.phaseDeadline - this.clock.now());
	}

	/**
	 * Listen to notifications. Returns the unsubscribe function.
	 */
	subscribe(listener: GameEventListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	// ==================== Registration ====================

	register(caller: Principal, paidAmount: number): void {
		this.atomically(() => {
			if (this.slotOf(caller) !== null) {
				throw new GameError("AlreadyRegistered", `${caller} is already registered`);
			}
			const free = this.firstFreeSlot();
			if (free === null) {
				throw new GameError("SessionFull", "Both slots are taken");
			}
			const { bank, inProgress } = this.state;
			if (inProgress || (bank !== 0 && bank !== this.registrationFee)) {
				throw new GameError(
					"SessionUnsettled",
					"The previous session has not been settled",
					{ bank },
				);
			}
			if (paidAmount !== this.registrationFee) {
				throw new GameError(
					"WrongFeeAmount",
					`Registration costs exactly ${this.registrationFee}`,
					{ paidAmount, fee: this.registrationFee },
				);
			}

			const previous = this.sessionPhase;
			this.state.slots[free] = {
				...emptySlot(),
				identity: caller,
				phase: this.step(this.state.slots[free], "join"),
			};
			this.credit(paidAmount);
			if (this.state.slots.every((slot) => slot.identity !== null)) {
				this.state.inProgress = true;
			}
			this.afterPhaseChange(previous);

			this.emit({ type: "PlayerRegistered", player: caller, amount: paidAmount });
		});
	}

	quit(caller: Principal): void {
		this.atomically(() => {
			const slot = this.requireSlot(caller);
			const me = this.state.slots[slot];
			const opponent = this.state.slots[this.other(slot)];
			if (
				this.state.inProgress ||
				opponent.identity !== null ||
				!playerPhases.canPerform(me.phase, "quit")
			) {
				throw new GameError(
					"CannotQuitNow",
					"Only a registrant still waiting for an opponent may quit",
				);
			}

			const refund = this.debit(this.registrationFee);
			this.endSession("quit");
			this.pay(caller, refund, "refund");

			this.emit({ type: "PlayerQuit", player: caller, amount: refund });
		});
	}

	// ==================== Commit ====================

	placeCommitment(caller: Principal, commitment: string): void {
		this.atomically(() => {
			const slot = this.requireSlot(caller);
			if (!isWellFormedCommitment(commitment)) {
				throw new GameError(
					"MalformedCommitment",
					"Commitment must be a hex encoded 32-byte digest",
				);
			}
			const me = this.state.slots[slot];
			const opponent = this.state.slots[this.other(slot)];
			if (!this.state.inProgress || opponent.identity === null) {
				throw new GameError("OpponentMissing", "No opponent has registered");
			}
			if (me.commitment !== null) {
				throw new GameError("DuplicateBid", `${caller} has already placed a bid`);
			}
			this.requireOpenWindow();

			const previous = this.sessionPhase;
			me.commitment = normalizeCommitment(commitment);
			me.phase = this.step(me, "commit");
			this.afterPhaseChange(previous);

			this.emit({ type: "CommitmentPlaced", player: caller });
		});
	}

	// ==================== Reveal ====================

	revealBid(caller: Principal, value: number, secret: string): void {
		this.atomically(() => {
			const slot = this.requireSlot(caller);
			const me = this.state.slots[slot];
			const opponent = this.state.slots[this.other(slot)];
			if (
				!this.state.inProgress ||
				me.commitment === null ||
				(opponent.identity !== null && opponent.commitment === null)
			) {
				throw new GameError("BidsIncomplete", "Both bids must be placed first");
			}
			const { minBid, maxBid } = this.config;
			if (!Number.isInteger(value) || value < minBid || value > maxBid) {
				throw new GameError(
					"InvalidRange",
					`Bid must be an integer in [${minBid}, ${maxBid}]`,
					{ value },
				);
			}
			this.requireOpenWindow();
			if (me.revealedValue !== 0) {
				throw new GameError("AlreadyRevealed", `${caller} has already revealed`);
			}
			if (!verifyCommitment(me.commitment, value, secret)) {
				throw new GameError(
					"CommitmentMismatch",
					"Value and secret do not reproduce the commitment",
				);
			}

			const previous = this.sessionPhase;
			me.revealedValue = value;
			me.phase = this.step(me, "reveal");
			const [first, second] = this.state.slots;
			if (first.revealedValue !== 0 && second.revealedValue !== 0) {
				this.state.outcome = computeOutcome(
					first.revealedValue,
					second.revealedValue,
					maxBid,
				);
				this.state.bidSum = this.state.outcome.bidSum;
			}
			this.afterPhaseChange(previous);

			this.emit({ type: "BidRevealed", player: caller, value });
		});
	}

	// ==================== Settlement ====================

	withdraw(caller: Principal): number {
		return this.atomically(() => {
			const slot = this.requireSlot(caller);
			const outcome = this.state.outcome;
			if (this.sessionPhase !== "withdraw" || outcome === null) {
				throw new GameError("RevealIncomplete", "Both bids must be revealed first");
			}
			this.requireOpenWindow();

			const payout = this.debit(payoutFor(outcome, slot, this.registrationFee));
			this.step(this.state.slots[slot], "withdraw");
			this.state.slots[slot] = emptySlot();
			if (this.state.slots[this.other(slot)].identity === null) {
				if (this.state.bank !== 0) {
					throw new ContractError(
						`Bank holds ${this.state.bank} after both payouts`,
						"BANK_UNBALANCED",
					);
				}
				this.reset();
			}
			this.pay(caller, payout, "settlement");

			this.emit({ type: "RewardWithdrawn", player: caller, amount: payout });
			return payout;
		});
	}

	// ==================== Timeouts ====================

	claimOnOpponentTimeout(caller: Principal): number {
		return this.atomically(() => {
			if (this.clock.now() <= this.state.phaseDeadline) {
				throw new GameError("PhaseNotExpired", "The current phase has not expired");
			}
			const slot = this.requireSlot(caller);
			const me = this.state.slots[slot];
			const opponent = this.state.slots[this.other(slot)];
			if (
				!this.state.inProgress ||
				opponent.identity === null ||
				!playerPhases.isOneStepAhead(me.phase, opponent.phase)
			) {
				throw new GameError(
					"CannotClaimNow",
					"Only a player left waiting on the opponent may claim",
					{ phase: me.phase, opponentPhase: opponent.phase },
				);
			}

			const amount = this.drain();
			this.endSession("forfeit");
			this.pay(caller, amount, "timeout-claim");

			this.emit({ type: "TimeoutClaimed", player: caller, amount });
			return amount;
		});
	}

	/**
	 * Settle an expired session on behalf of whoever kept acting.
	 *
	 * Players still sitting in the global phase are the ones who timed out.
	 * If the remaining player cannot receive, the bank goes to the
	 * administrator instead of staying locked.
	 */
	adminForceResolve(caller: Principal): Principal {
		return this.atomically(() => {
			const administrator = this.config.administrator;
			if (caller !== administrator) {
				throw new GameError(
					"NotAdministrator",
					"Only the administrator may force a resolution",
				);
			}
			if (this.clock.now() <= this.state.phaseDeadline) {
				throw new GameError("PhaseNotExpired", "The current phase has not expired");
			}
			const phase = this.sessionPhase;
			const stuck = this.occupiedSlots().filter(
				(i) => this.state.slots[i].phase === phase,
			);
			if (!this.state.inProgress || stuck.length === 0) {
				throw new GameError("NobodyTimedOut", "No player has timed out");
			}

			const timedOut = stuck.map((i) => this.identityOf(i));
			const beneficiary =
				stuck.length === 1
					? this.state.slots[this.other(stuck[0])].identity
					: null;
			const amount = this.drain();
			this.endSession("forfeit");

			let recipient: Principal | null = null;
			let redirectReason: string | undefined;
			if (beneficiary !== null) {
				try {
					this.pay(beneficiary, amount, "force-resolve");
					recipient = beneficiary;
				} catch (err) {
					if (!(err instanceof TransferError)) throw err;
					redirectReason = err.message;
				}
			}
			if (recipient === null) {
				this.pay(administrator, amount, "force-resolve");
				recipient = administrator;
			}

			this.emit({
				type: "SessionForceResolved",
				recipient,
				amount,
				timedOut,
				...(redirectReason !== undefined ? { redirectReason } : {}),
			});
			return recipient;
		});
	}

	/**
	 * Funds sent outside of registration. They never enter the bank.
	 */
	receiveFunds(from: Principal, amount: number): void {
		this.atomically(() => {
			if (!Number.isSafeInteger(amount) || amount <= 0) {
				throw new GameError("InvalidAmount", `Invalid amount: ${amount}`);
			}
			this.emit({ type: "FundsReceived", from, amount });
		});
	}

	// ==================== Internals ====================

	/**
	 * Run an operation as one unit: on any throw the session and the
	 * notifications it produced are rolled back. Notifications are delivered
	 * once the outermost operation has returned.
	 */
	private atomically<T>(operation: () => T): T {
		const snapshot = cloneSession(this.state);
		const mark = this.pendingEvents.length;
		this.depth += 1;
		let result: T;
		try {
			result = operation();
		} catch (err) {
			this.state = snapshot;
			this.pendingEvents.length = mark;
			throw err;
		} finally {
			this.depth -= 1;
		}
		if (this.depth === 0) this.flushEvents();
		return result;
	}

	/**
	 * A listener that throws neither undoes the operation nor keeps the
	 * event from the listeners after it.
	 */
	private flushEvents(): void {
		const events = this.pendingEvents.splice(0);
		for (const event of events) {
			for (const listener of this.listeners) {
				try {
					listener(event);
				} catch (err) {
					this.onListenerError(
						err instanceof Error ? err : new Error(String(err)),
						event,
					);
				}
			}
		}
	}

	private emit(event: GameEvent): void {
		this.pendingEvents.push(event);
	}

	private requireSlot(caller: Principal): SlotIndex {
		const slot = this.slotOf(caller);
		if (slot === null) {
			throw new GameError("NotRegistered", `${caller} is not registered`);
		}
		return slot;
	}

	private requireOpenWindow(): void {
		const now = this.clock.now();
		if (now > this.state.phaseDeadline) {
			throw new GameError("TimedOut", "The phase deadline has passed", {
				now,
				phaseDeadline: this.state.phaseDeadline,
			});
		}
	}

	private step(slot: PlayerSlot, action: PhaseAction): Phase {
		return playerPhases.next(slot.phase, action).newState;
	}

	/**
	 * Restart the phase window when the global phase has moved forward.
	 */
	private afterPhaseChange(previous: Phase): void {
		if (playerPhases.compare(this.sessionPhase, previous) > 0) {
			this.state.phaseDeadline = this.clock.now() + this.config.timeoutTicks;
		}
	}

	private reset(): void {
		this.state = createPristineSession();
	}

	/**
	 * Terminate the session early: every occupied slot leaves through
	 * `action`, then the session starts over.
	 */
	private endSession(action: "quit" | "forfeit"): void {
		for (const slot of this.occupiedSlots()) {
			this.step(this.state.slots[slot], action);
		}
		this.reset();
	}

	private credit(amount: number): void {
		const bank = new Bank(this.state.bank);
		bank.deposit(amount);
		this.state.bank = bank.value;
	}

	private debit(amount: number): number {
		const bank = new Bank(this.state.bank);
		const released = bank.release(amount);
		this.state.bank = bank.value;
		return released;
	}

	private drain(): number {
		const bank = new Bank(this.state.bank);
		const released = bank.drain();
		this.state.bank = bank.value;
		return released;
	}

	/**
	 * Transfers run last in every operation, after all state is final.
	 */
	private pay(to: Principal, amount: number, reason: TransferReason): void {
		if (amount === 0) return;
		this.transfers.transfer({ to, amount, reason });
	}

	private firstFreeSlot(): SlotIndex | null {
		if (this.state.slots[0].identity === null) return 0;
		if (this.state.slots[1].identity === null) return 1;
		return null;
	}

	private occupiedSlots(): SlotIndex[] {
		const indices: SlotIndex[] = [0, 1];
		return indices.filter((i) => this.state.slots[i].identity !== null);
	}

	private identityOf(slot: SlotIndex): Principal {
		const identity = this.state.slots[slot].identity;
		if (identity === null) {
			throw new ContractError(`Slot ${slot} is empty`, "EMPTY_SLOT");
		}
		return identity;
	}

	private other(slot: SlotIndex): SlotIndex {
		return slot === 0 ? 1 : 0;
	}
}
