/**
 * Transfers module - Value transfer primitive
 */

export type { TransferReason, Transfer, TransferGateway } from "./types.js";
export { TRANSFER_REASONS, TransferError } from "./types.js";
export { RecordingTransferGateway } from "./recording-gateway.js";
