/**
 * Chain Service Protocol Types
 *
 * Contracts for the chain service: the HTTP indexing service that exposes
 * subnet state, signing identity and weight submission. Records here are the
 * validated shapes handed to callers; the adapter owns the wire schemas.
 */

// --------------------------------------------------------------------------
// Response Envelope
// --------------------------------------------------------------------------

/**
 * Every chain service response is wrapped in this envelope.
 * `data` is opaque until validated against the caller's target record.
 */
export interface ResponseEnvelope<T = unknown> {
  data?: T;
  /** Application-level error; a string or a structured `{ message, type }` */
  error?: unknown;
  statusCode?: number;
  message?: string;
}

/** Envelope `error` field, parsed before classification */
export type EnvelopeErrorVariant =
  | { kind: 'none' }
  | { kind: 'message'; message: string }
  | { kind: 'typed'; message: string; type: string };

// --------------------------------------------------------------------------
// Subnet Records
// --------------------------------------------------------------------------

/** Operating parameters of a subnet */
export interface SubnetHyperparameters {
  rho: number;
  kappa: number;
  immunityPeriod: number;
  minAllowedWeights: number;
  maxWeightsLimit: number;
  tempo: number;
  /** u64 on chain, sent as hex */
  minDifficulty: bigint;
  maxDifficulty: bigint;
  difficulty: bigint;
  weightsVersion: number;
  /** Root subnet reports the u64 maximum as a string */
  weightsRateLimit: number | string;
  adjustmentInterval: number;
  activityCutoff: number;
  registrationAllowed: boolean;
  targetRegsPerInterval: number;
  minBurn: number;
  maxBurn: number;
  bondsMovingAvg: number;
  maxRegsPerBlock: number;
  servingRateLimit: number;
  maxValidators: number;
  adjustmentAlpha: bigint;
  commitRevealPeriod: number;
  commitRevealWeightsEnabled: boolean;
  alphaHigh: number;
  alphaLow: number;
  liquidAlphaEnabled: boolean;
}

/** Network endpoint of a participant */
export interface AxonInfo {
  block: number;
  version: number;
  ip: string;
  port: number;
  ipType: number;
  protocol: number;
  placeholder1: number;
  placeholder2: number;
  /** Empty on the wire; filled from the metagraph hotkeys */
  hotkey: string;
  /** Empty on the wire; filled from the metagraph coldkeys */
  coldkey: string;
}

export interface SubnetIdentity {
  subnetName: string;
  githubRepo: string;
  subnetContact: string;
  subnetUrl: string;
  discord: string;
  description: string;
  additional: string;
}

/** Public profile of a participant */
export interface IdentitiesInfo {
  name: string;
  url: string;
  githubRepo: string;
  image: string;
  discord: string;
  description: string;
  additional: string;
}

export interface MovingPrice {
  bits: number;
}

/**
 * Full participant snapshot of a subnet.
 *
 * Per-participant fields are parallel arrays of length `numUids`; index `i`
 * describes the same participant in every one of them.
 */
export interface SubnetMetagraph {
  netuid: number;
  name: string;
  symbol: string;
  identity: SubnetIdentity;
  networkRegisteredAt: number;
  ownerHotkey: string;
  ownerColdkey: string;
  block: number;
  tempo: number;
  lastStep: number;
  blocksSinceLastStep: number;
  subnetEmission: number;
  alphaIn: number;
  alphaOut: number;
  taoIn: number;
  alphaOutEmission: number;
  alphaInEmission: number;
  taoInEmission: number;
  pendingAlphaEmission: number;
  pendingRootEmission: number;
  subnetVolume: number;
  movingPrice: MovingPrice;
  rho: number;
  kappa: number;
  weightsVersion: number;
  weightsRateLimit: number | string;
  activityCutoff: number;
  maxValidators: number;
  numUids: number;
  maxUids: number;
  burn: number;
  difficulty: bigint;
  registrationAllowed: boolean;
  powRegistrationAllowed: boolean;
  immunityPeriod: number;
  minDifficulty: bigint;
  maxDifficulty: bigint;
  minBurn: number;
  maxBurn: number;
  adjustmentAlpha: bigint;
  adjustmentInterval: number;
  targetRegsPerInterval: number;
  maxRegsPerBlock: number;
  servingRateLimit: number;
  commitRevealWeightsEnabled: boolean;
  commitRevealPeriod: number;
  liquidAlphaEnabled: boolean;
  alphaHigh: number;
  alphaLow: number;
  bondsMovingAvg: number;
  hotkeys: string[];
  coldkeys: string[];
  identities: (IdentitiesInfo | null)[];
  axons: AxonInfo[];
  active: boolean[];
  validatorPermit: boolean[];
  pruningScore: number[];
  lastUpdate: number[];
  emission: number[];
  dividends: number[];
  incentives: number[];
  consensus: number[];
  trust: number[];
  rank: number[];
  blockAtRegistration: number[];
  alphaStake: number[];
  taoStake: number[];
  totalStake: number[];
  /** `[hotkey, amount]` pairs, not indexed by uid */
  taoDividendsPerHotkey: [string, number][];
  alphaDividendsPerHotkey: [string, number][];
}

/** Signing identity configured on the chain service */
export interface KeyringPair {
  hotkey: string;
  coldkey: string;
}

// --------------------------------------------------------------------------
// Request Payloads
// --------------------------------------------------------------------------

/** Axon registration; omitted fields take the service defaults */
export interface ServeAxonPayload {
  netuid: number;
  ip: number;
  port: number;
  /** Default 1 */
  version?: number;
  /** 4 for IPv4, 6 for IPv6 (default 4) */
  ipType?: number;
  /** Should match ipType (default 4) */
  protocol?: number;
  placeholder1?: number;
  placeholder2?: number;
}

export interface SetWeightsPayload {
  netuid: number;
  dests: number[];
  /** Normalized weights, parallel to `dests` */
  weights: number[];
  version_key: number;
}

export interface CommitRevealPayload {
  netuid: number;
  /** Hex-encoded encrypted commit, no 0x prefix */
  commit: string;
  revealRound: number;
}

// --------------------------------------------------------------------------
// Time-lock Encryption
// --------------------------------------------------------------------------

/** Input to the time-lock encryption of a weight commit */
export interface TimelockCommitRequest {
  uids: number[];
  weights: number[];
  versionKey: number;
  tempo: number;
  currentBlock: number;
  netuid: number;
  /** Subnet reveal period, in epochs */
  revealPeriod: number;
}

export interface TimelockCommit {
  commit: Uint8Array;
  /** Round at which the commit becomes decryptable */
  revealRound: number;
}

/**
 * Time-lock encryption primitive. Treated as side-effect free; the commit is
 * bound to `currentBlock`.
 */
export type TimelockEncryptor = (
  request: TimelockCommitRequest
) => Promise<TimelockCommit> | TimelockCommit;

// --------------------------------------------------------------------------
// Client Interface
// --------------------------------------------------------------------------

export interface IChainServiceClient {
  getMetagraph(netuid: number): Promise<SubnetMetagraph>;
  getHotkeys(netuid: number): Promise<string[]>;
  getAxons(netuid: number): Promise<AxonInfo[]>;
  getCurrentBlock(): Promise<number>;
  getSubnetHyperparameters(netuid: number): Promise<SubnetHyperparameters>;
  isHotkeyRegistered(netuid: number, hotkey: string, block?: number): Promise<boolean>;
  serveAxon(payload: ServeAxonPayload): Promise<ResponseEnvelope>;
  setWeights(payload: SetWeightsPayload): Promise<ResponseEnvelope>;
  signMessage(message: string): Promise<string | undefined>;
  verify(hotkey: string, message: string, signature: string): Promise<boolean>;
  getKeyringPair(): Promise<KeyringPair>;
  close(): Promise<void>;
}
