import { createHash } from "node:crypto";
import {
	computeCommitment,
	encodeReveal,
	isWellFormedCommitment,
	normalizeCommitment,
	verifyCommitment,
} from "./duel-commitment.js";

describe("commitments", () => {
	it("hashes the decimal value, a dash and the secret", () => {
		expect(encodeReveal(40, "nA")).toBe("40-nA");
		const expected = createHash("sha256").update("40-nA").digest("hex");
		expect(computeCommitment(40, "nA")).toBe(expected);
		expect(computeCommitment(40, "nA")).toHaveLength(64);
	});

	it("verifies matching reveals only", () => {
		const commitment = computeCommitment(34, "nB");
		expect(verifyCommitment(commitment, 34, "nB")).toBe(true);
		expect(verifyCommitment(commitment.toUpperCase(), 34, "nB")).toBe(true);
		expect(verifyCommitment(commitment, 35, "nB")).toBe(false);
		expect(verifyCommitment(commitment, 34, "nb")).toBe(false);
		expect(verifyCommitment("abc", 34, "nB")).toBe(false);
	});

	it("accepts only 64 hex characters", () => {
		expect(isWellFormedCommitment("a".repeat(64))).toBe(true);
		expect(isWellFormedCommitment("A".repeat(64))).toBe(true);
		expect(isWellFormedCommitment("a".repeat(63))).toBe(false);
		expect(isWellFormedCommitment("g".repeat(64))).toBe(false);
	});

	it("normalizes to lowercase", () => {
		expect(normalizeCommitment("AB".repeat(32))).toBe("ab".repeat(32));
	});
});
