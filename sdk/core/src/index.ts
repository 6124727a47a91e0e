export * from "./types";
export * from "./errors";
export * from "./math";
export * from "./presets";
export * from "./snapshot";
export { EventJournal } from "./events";
export { BalanceLedger } from "./ledger";
export { OwnershipGuard } from "./access";
export { TransferGate } from "./gate";
export { CappedToken } from "./token";
export { TokenStore } from "./store";
export type {
  StoredEvent,
  StoredOperation,
  OperationRecord,
  OperationStatus,
  PageQuery,
} from "./store";
