/**
 * Utility functions for the SDK
 */

export {
	bytesToHex,
	hexToBytes,
	isHexOfLength,
	stringToBytes,
	bytesEqual,
} from "./encoding.js";
