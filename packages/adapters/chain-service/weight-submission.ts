/**
 * Weight Submission
 *
 * Chooses between direct and commit-reveal weight submission from the
 * subnet's hyperparameters:
 *
 *   hyperparameters ─┬─ commit-reveal off ──> POST chain/set-weights
 *                    └─ commit-reveal on  ──> check tempo / reveal period
 *                                             ──> current block
 *                                             ──> time-lock encrypt
 *                                             ──> POST chain/set-commit-reveal-weights
 *
 * The two paths are exclusive. A commit-reveal subnet never receives
 * plaintext weights, whatever fails along the way.
 */

import type { Logger } from 'pino';
import type {
  CommitRevealPayload,
  ResponseEnvelope,
  SetWeightsPayload,
  SubnetHyperparameters,
  TimelockCommit,
  TimelockEncryptor,
} from '@subnet-bridge/core/ports';
import { ConfigurationError, ValidationError, describeError } from './errors.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export const WEIGHT_ENDPOINTS = {
  direct: 'chain/set-weights',
  commitReveal: 'chain/set-commit-reveal-weights',
} as const;

export type WeightSubmissionPath = 'direct' | 'commit_reveal';

export interface WeightSubmissionResult {
  path: WeightSubmissionPath;
  response: ResponseEnvelope;
}

/** Chain service calls the submitter depends on */
export interface WeightSubmissionDeps {
  logger: Logger;
  getSubnetHyperparameters(netuid: number): Promise<SubnetHyperparameters>;
  getCurrentBlock(): Promise<number>;
  post(path: string, body: unknown): Promise<ResponseEnvelope>;
  encryptor?: TimelockEncryptor;
}

// --------------------------------------------------------------------------
// WeightSubmitter
// --------------------------------------------------------------------------

export class WeightSubmitter {
  private readonly log: Logger;

  constructor(private readonly deps: WeightSubmissionDeps) {
    this.log = deps.logger.child({ component: 'WeightSubmitter' });
  }

  async submit(payload: SetWeightsPayload): Promise<WeightSubmissionResult> {
    const hyperparameters = await this.deps.getSubnetHyperparameters(payload.netuid);

    if (!hyperparameters.commitRevealWeightsEnabled) {
      this.log.debug({ netuid: payload.netuid, uids: payload.dests.length }, 'Submitting weights directly');
      const response = await this.deps.post(WEIGHT_ENDPOINTS.direct, payload);
      return { path: 'direct', response };
    }

    return this.submitCommitReveal(payload, hyperparameters);
  }

  private async submitCommitReveal(
    payload: SetWeightsPayload,
    hyperparameters: SubnetHyperparameters
  ): Promise<WeightSubmissionResult> {
    const { tempo, commitRevealPeriod } = hyperparameters;

    if (tempo === 0 || commitRevealPeriod === 0) {
      this.log.error(
        { netuid: payload.netuid, tempo, commitRevealPeriod },
        'Subnet is not provisioned for commit-reveal weights'
      );
      throw new ConfigurationError(
        'Tempo and reveal period must be greater than 0 for commit reveal weights',
        { netuid: payload.netuid, tempo, commitRevealPeriod }
      );
    }

    const encryptor = this.deps.encryptor;
    if (!encryptor) {
      this.log.error({ netuid: payload.netuid }, 'Commit-reveal weights need a time-lock encryptor');
      throw new ConfigurationError(
        'Subnet requires commit-reveal weights but no time-lock encryptor is configured',
        { netuid: payload.netuid }
      );
    }

    this.log.info(
      { netuid: payload.netuid, tempo, revealPeriod: commitRevealPeriod },
      'Commit reveal weights enabled'
    );

    const currentBlock = await this.deps.getCurrentBlock();

    let encrypted: TimelockCommit;
    try {
      encrypted = await encryptor({
        uids: payload.dests,
        weights: payload.weights,
        versionKey: payload.version_key,
        tempo,
        currentBlock,
        netuid: payload.netuid,
        revealPeriod: commitRevealPeriod,
      });
    } catch (error) {
      this.log.error(
        { netuid: payload.netuid, currentBlock, error: describeError(error) },
        'Time-lock encryption of weights failed'
      );
      throw error;
    }

    const commitPayload = this.buildCommitPayload(payload.netuid, encrypted);

    this.log.info(
      {
        netuid: payload.netuid,
        currentBlock,
        revealRound: commitPayload.revealRound,
        commitBytes: encrypted.commit.length,
      },
      'Submitting weight commit'
    );

    const response = await this.deps.post(WEIGHT_ENDPOINTS.commitReveal, commitPayload);
    return { path: 'commit_reveal', response };
  }

  private buildCommitPayload(netuid: number, encrypted: TimelockCommit | undefined): CommitRevealPayload {
    const commit = encrypted?.commit;
    const revealRound = encrypted?.revealRound;

    if (!commit || commit.length === 0 || !revealRound || !Number.isInteger(revealRound) || revealRound < 0) {
      this.log.error(
        { netuid, commitBytes: commit?.length ?? 0, revealRound },
        'Failed to generate commit for reveal'
      );
      throw new ValidationError(
        'Failed to generate commit for reveal. Ensure that tempo and reveal period are set correctly.',
        { netuid, revealRound }
      );
    }

    return {
      netuid,
      commit: Buffer.from(commit).toString('hex'),
      revealRound,
    };
  }
}
