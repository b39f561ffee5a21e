/**
 * Wallet Store Contract
 *
 * The wallet store (schema, queries, coin selection, key derivation) lives
 * outside this package. Handlers only see it through a StorePool, which runs
 * a callback inside one store transaction.
 */

// =============================================================================
// Paging
// =============================================================================

export interface ListRequest {
  offset: number;
  limit: number;
  /** Walk the collection newest-first; the offset/limit window is unchanged */
  reverse: boolean;
}

export interface ListResult<T> {
  items: T[];
  total: number;
}

// =============================================================================
// Accounts
// =============================================================================

export type AccountType =
  | { kind: 'regular'; readOnly: boolean }
  | { kind: 'multisig'; readOnly: boolean; required: number; total: number };

export interface Account {
  id: number;
  name: string;
  type: AccountType;
  /** Hardened path from the wallet master key to this account, e.g. m/84'/0'/0' */
  derivation?: string;
  /** Account-level extended private key, absent for read-only accounts */
  master?: string;
  /** Extended public keys, one per co-signer */
  keys: string[];
  gap: number;
  created: Date;
}

export interface NewAccount {
  name: string;
  type: AccountType;
  /** Wallet master key (xprv) to derive the account from */
  masterKey?: string;
  /** Mnemonic to derive the account from; generated by the store when absent */
  mnemonic?: string;
  passphrase?: string;
  keys: string[];
}

// =============================================================================
// Addresses
// =============================================================================

export type AddressType = 'external' | 'internal';

export interface WalletAddress {
  accountId: number;
  index: number;
  type: AddressType;
  address: string;
  label: string;
  created: Date;
}

export interface BalanceInfo {
  inBalance: number;
  outBalance: number;
  coins: number;
  spentCoins: number;
}

export interface AddressBalance {
  index: number;
  balance: BalanceInfo;
}

// =============================================================================
// Transactions
// =============================================================================

export type TxConfidence = 'pending' | 'building' | 'dead';
export type TxType = 'incoming' | 'outgoing' | 'self';

export interface WalletTx {
  accountId: number;
  txid: string;
  type: TxType;
  /** Net value for the account in satoshis */
  value: number;
  confidence: TxConfidence;
  /** Recorded locally without being relayed */
  offline: boolean;
  confirmedBy?: string;
  confirmedHeight?: number;
  created: Date;
  /** Raw transaction hex */
  tx: string;
}

export interface Recipient {
  address: string;
  amount: number;
}

export type FeePolicy =
  | { kind: 'feeRate'; satPerVbyte: number }
  | { kind: 'absolute'; amount: number };

export interface CreateTxRequest {
  recipients: Recipient[];
  fee: FeePolicy;
  minConf: number;
  /** Deduct the fee from the recipients instead of the change */
  rcptFee: boolean;
  sign: boolean;
}

/** Outcome of a store transaction that may touch several accounts */
export interface TxImportResult {
  txs: WalletTx[];
  newAddresses: WalletAddress[];
}

/** Previous output data an offline signer needs for one input */
export interface CoinSignData {
  txid: string;
  vout: number;
  /** Previous output script (hex) */
  script: string;
  /** Previous output value in satoshis */
  value: number;
  /** Soft path relative to the account key, e.g. 0/12 */
  derivation: string;
  witnessScript?: string;
  redeemScript?: string;
}

export interface OfflineTxData {
  /** Unsigned transaction as a base64 PSBT */
  psbt: string;
  coins: CoinSignData[];
}

// =============================================================================
// Chain
// =============================================================================

export interface BestBlock {
  hash: string;
  height: number;
}

export interface BloomFilterData {
  /** Serialized filter bytes (hex) */
  filter: string;
  elements: number;
  falsePositiveRate: number;
}

// =============================================================================
// Store
// =============================================================================

/**
 * Operations available inside one store transaction. Lookups by name or
 * index throw the matching NotFoundError when the row is absent.
 */
export interface WalletStore {
  getAccount(name: string): Promise<Account>;
  accounts(list: ListRequest): Promise<ListResult<Account>>;
  newAccount(request: NewAccount): Promise<{ account: Account; mnemonic?: string }>;
  renameAccount(account: Account, newName: string): Promise<Account>;
  addAccountKeys(account: Account, keys: string[]): Promise<Account>;
  setAccountGap(account: Account, gap: number): Promise<Account>;

  addressList(account: Account, type: AddressType, list: ListRequest): Promise<ListResult<WalletAddress>>;
  unusedAddresses(account: Account, type: AddressType, list: ListRequest): Promise<ListResult<WalletAddress>>;
  getAddress(account: Account, type: AddressType, index: number): Promise<WalletAddress>;
  setAddrLabel(account: Account, index: number, type: AddressType, label: string): Promise<WalletAddress>;
  /** Generate addresses up to `index` (plus the gap); returns how many were created */
  generateAddrs(account: Account, type: AddressType, index: number): Promise<number>;
  addressBalances(
    account: Account,
    minIndex: number,
    maxIndex: number,
    type: AddressType,
    minConf: number,
    offline: boolean
  ): Promise<AddressBalance[]>;

  txs(accountId: number, list: ListRequest): Promise<ListResult<WalletTx>>;
  addrTxs(account: Account, address: WalletAddress, list: ListRequest): Promise<ListResult<WalletTx>>;
  getAccountTx(accountId: number, txid: string): Promise<WalletTx>;
  deleteTx(txid: string): Promise<void>;
  accountBalance(accountId: number, minConf: number, offline: boolean): Promise<number>;

  createTx(
    account: Account,
    masterKey: string | undefined,
    request: CreateTxRequest
  ): Promise<{ tx: WalletTx; newAddresses: WalletAddress[] }>;
  importTx(rawTx: string, accountId: number): Promise<TxImportResult>;
  signAccountTx(account: Account, masterKey: string | undefined, txid: string): Promise<TxImportResult>;
  getOfflineTxData(accountId: number, txid: string): Promise<OfflineTxData>;

  getBestBlock(): Promise<BestBlock>;
  /** Transactions of the account confirmed at `height` or above, within `count` blocks (0 = all) */
  accTxsFromBlock(accountId: number, height: number, count: number): Promise<WalletTx[]>;
  /** Creation time (unix seconds) of the first address ever generated */
  firstAddrTime(): Promise<number | undefined>;
  resetRescan(): Promise<void>;
  getBloomFilter(): Promise<BloomFilterData>;
}

/**
 * Pooled store connection. `transaction` commits when `fn` resolves and rolls
 * back when it rejects.
 */
export interface StorePool {
  transaction<T>(fn: (store: WalletStore) => Promise<T>): Promise<T>;
}
