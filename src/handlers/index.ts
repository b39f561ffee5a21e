export { HandlerSession, type HandlerSessionOptions, type StorageOperation } from './session';
export * as accounts from './accounts';
export * as addresses from './addresses';
export * as transactions from './transactions';
export * as offline from './offline';
export * as node from './node';
export * as sync from './sync';
export type { JsonAccount, JsonAddress, JsonTx } from './serialization';
