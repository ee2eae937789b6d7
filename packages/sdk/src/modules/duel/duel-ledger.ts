import { GameError } from "./errors.js";
import { ContractError } from "../../contracts/index.js";

/**
 * Escrow balance of one session.
 *
 * Holds whole units only; a release larger than the balance is a broken
 * invariant, not a user error, and raises a ContractError.
 */
export class Bank {
	constructor(private balance = 0) {
		Bank.assertAmount(balance);
	}

	get value(): number {
		return this.balance;
	}

	deposit(amount: number): void {
		Bank.assertAmount(amount);
		this.balance += amount;
	}

	/**
	 * Authorise a payout and take it out of the balance.
	 */
	release(amount: number): number {
		Bank.assertAmount(amount);
		if (amount > this.balance) {
			throw new ContractError(
				`Payout ${amount} exceeds bank ${this.balance}`,
				"BANK_OVERDRAWN",
				{ amount, balance: this.balance },
			);
		}
		this.balance -= amount;
		return amount;
	}

	/**
	 * Release everything that is left.
	 */
	drain(): number {
		return this.release(this.balance);
	}

	private static assertAmount(amount: number): void {
		if (!Number.isSafeInteger(amount) || amount < 0) {
			throw new GameError("InvalidAmount", `Invalid amount: ${amount}`);
		}
	}
}
