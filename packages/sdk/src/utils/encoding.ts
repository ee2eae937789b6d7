/**
 * Encoding utilities for the SDK
 */

import { hex } from "@scure/base";

/**
 * Convert bytes to lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): string {
	return hex.encode(bytes);
}

/**
 * Convert hex string to bytes
 */
export function hexToBytes(hexString: string): Uint8Array {
	return hex.decode(hexString.toLowerCase());
}

/**
 * Check that a string is hex encoding exactly `byteLength` bytes
 */
export function isHexOfLength(value: string, byteLength: number): boolean {
	return (
		value.length === byteLength * 2 && /^[0-9a-fA-F]*$/.test(value)
	);
}

/**
 * Convert a string to bytes using UTF-8 encoding
 */
export function stringToBytes(str: string): Uint8Array {
	return new TextEncoder().encode(str);
}

/**
 * Check if two byte arrays are equal
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	let diff = 0;
	for (let i = 0; i < a.length; i++) {
		diff |= a[i] ^ b[i];
	}
	return diff === 0;
}
