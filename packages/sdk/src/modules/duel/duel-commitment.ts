/**
 * Commit-reveal encoding.
 *
 * commitment = SHA256(decimal(value) + "-" + secret), hex encoded.
 */

import { sha256 } from "@noble/hashes/sha2";
import {
	bytesEqual,
	bytesToHex,
	hexToBytes,
	isHexOfLength,
	stringToBytes,
} from "../../utils/index.js";

const DIGEST_BYTES = 32;

/**
 * The exact preimage hashed for a bid.
 */
export function encodeReveal(value: number, secret: string): string {
	return `${value.toString(10)}-${secret}`;
}

/**
 * Commitment a player publishes before revealing `value`.
 */
export function computeCommitment(value: number, secret: string): string {
	return bytesToHex(sha256(stringToBytes(encodeReveal(value, secret))));
}

export function isWellFormedCommitment(commitment: string): boolean {
	return isHexOfLength(commitment, DIGEST_BYTES);
}

export function normalizeCommitment(commitment: string): string {
	return commitment.toLowerCase();
}

/**
 * Check a reveal against a stored commitment.
 */
export function verifyCommitment(
	commitment: string,
	value: number,
	secret: string,
): boolean {
	if (!isWellFormedCommitment(commitment)) return false;
	const expected = sha256(stringToBytes(encodeReveal(value, secret)));
	return bytesEqual(hexToBytes(commitment), expected);
}
