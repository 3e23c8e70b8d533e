import type { SubnetHyperparameters } from '@subnet-bridge/core/ports';

export function buildHyperparameters(
  overrides: Partial<SubnetHyperparameters> = {}
): SubnetHyperparameters {
  return {
    rho: 10,
    kappa: 32767,
    immunityPeriod: 5000,
    minAllowedWeights: 1,
    maxWeightsLimit: 65535,
    tempo: 360,
    minDifficulty: 10_000_000n,
    maxDifficulty: 4_611_686_018_427_387_903n,
    difficulty: 10_000_000n,
    weightsVersion: 0,
    weightsRateLimit: 100,
    adjustmentInterval: 112,
    activityCutoff: 5000,
    registrationAllowed: true,
    targetRegsPerInterval: 2,
    minBurn: 500_000,
    maxBurn: 100_000_000_000,
    bondsMovingAvg: 900_000,
    maxRegsPerBlock: 1,
    servingRateLimit: 50,
    maxValidators: 64,
    adjustmentAlpha: 0n,
    commitRevealPeriod: 1,
    commitRevealWeightsEnabled: false,
    alphaHigh: 58982,
    alphaLow: 45875,
    liquidAlphaEnabled: false,
    ...overrides,
  };
}

/** Record as the service sends it: u64 fields hex-encoded */
export function toWire(record: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, value]) => [
      key,
      typeof value === 'bigint' ? `0x${value.toString(16)}` : value,
    ])
  );
}

function axonWire(uid: number): Record<string, unknown> {
  return {
    block: 100 + uid,
    version: 1,
    ip: `10.0.0.${uid + 1}`,
    port: 8091 + uid,
    ipType: 4,
    protocol: 4,
    placeholder1: 0,
    placeholder2: 0,
  };
}

/**
 * Metagraph as the service sends it: axons without keys, participant
 * arrays `numUids` long.
 */
export function buildMetagraphWire(numUids = 2, netuid = 1): Record<string, unknown> {
  const uids = Array.from({ length: numUids }, (_, uid) => uid);
  const numbers = (value: number) => uids.map(() => value);
  const flags = (value: boolean) => uids.map(() => value);

  return {
    netuid,
    name: 'test-subnet',
    symbol: 'T',
    identity: {
      subnetName: 'test-subnet',
      githubRepo: '',
      subnetContact: '',
      subnetUrl: '',
      discord: '',
      description: '',
      additional: '',
    },
    networkRegisteredAt: 10,
    ownerHotkey: 'owner-hotkey',
    ownerColdkey: 'owner-coldkey',
    block: 5000,
    tempo: 360,
    lastStep: 4800,
    blocksSinceLastStep: 200,
    subnetEmission: 0,
    alphaIn: 1,
    alphaOut: 1,
    taoIn: 1,
    alphaOutEmission: 0,
    alphaInEmission: 0,
    taoInEmission: 0,
    pendingAlphaEmission: 0,
    pendingRootEmission: 0,
    subnetVolume: 0,
    movingPrice: { bits: 0 },
    rho: 10,
    kappa: 32767,
    weightsVersion: 0,
    weightsRateLimit: 100,
    activityCutoff: 5000,
    maxValidators: 64,
    numUids,
    maxUids: 256,
    burn: 500_000,
    difficulty: '0x989680',
    registrationAllowed: true,
    powRegistrationAllowed: false,
    immunityPeriod: 5000,
    minDifficulty: '0x989680',
    maxDifficulty: 1_000_000_000,
    minBurn: 500_000,
    maxBurn: 100_000_000_000,
    adjustmentAlpha: '0x0',
    adjustmentInterval: 112,
    targetRegsPerInterval: 2,
    maxRegsPerBlock: 1,
    servingRateLimit: 50,
    commitRevealWeightsEnabled: false,
    commitRevealPeriod: 1,
    liquidAlphaEnabled: false,
    alphaHigh: 58982,
    alphaLow: 45875,
    bondsMovingAvg: 900_000,
    hotkeys: uids.map((uid) => `hotkey-${uid}`),
    coldkeys: uids.map((uid) => `coldkey-${uid}`),
    identities: uids.map(() => null),
    axons: uids.map(axonWire),
    active: flags(true),
    validatorPermit: flags(false),
    pruningScore: numbers(0),
    lastUpdate: numbers(4900),
    emission: numbers(0),
    dividends: numbers(0),
    incentives: numbers(0),
    consensus: numbers(0),
    trust: numbers(0),
    rank: numbers(0),
    blockAtRegistration: numbers(100),
    alphaStake: numbers(1),
    taoStake: numbers(1),
    totalStake: numbers(2),
    taoDividendsPerHotkey: [],
    alphaDividendsPerHotkey: [],
  };
}
