/**
 * SCORE Stage
 * Goal: Assign ICP scores and keep only businesses that clear the profile's bar
 *
 * legacy: score, then admit records at or above the minimum score
 * websiteRequired: score, then categorize into fit tiers; records below the
 * lowest tier are dropped
 */

import { BaseStage } from '../base-stage';
import type { BusinessRecord } from '../../state/types';
import type { ProspectorConfig } from '../../config/types';
import {
  admitByMinimumScore,
  legacyProfile,
  scoreRecord,
  websiteRequiredProfile,
  type ScoringProfile,
} from '../../icp/scoring';
import { categorize } from '../../icp/categorize';
import { logger } from '../../lib/logger';

export type ProfileKind = ScoringProfile['kind'];

export function profileFor(kind: ProfileKind, config: ProspectorConfig): ScoringProfile {
  return kind === 'legacy' ? legacyProfile(config) : websiteRequiredProfile(config);
}

export class ScoreStage extends BaseStage {
  private readonly profile: ScoringProfile;

  constructor(config: ProspectorConfig, kind: ProfileKind) {
    super('score', config);
    this.profile = profileFor(kind, config);
  }

  protected async execute(records: BusinessRecord[]): Promise<BusinessRecord[]> {
    const states = new Set(this.config.usStates);
    const scored = records.map((record) => scoreRecord(record, this.profile, states));
    this.processed = scored.length;

    let kept: BusinessRecord[];
    if (this.profile.kind === 'legacy') {
      kept = admitByMinimumScore(scored, this.profile);
      logger.info(`ICP criteria: ${kept.length}/${scored.length} companies admitted`, {
        minScore: this.profile.minScore,
      });
    } else {
      const { high, medium, low } = categorize(scored, this.config.scoring.fitThresholds);
      logger.info('Fit categories', { high: high.length, medium: medium.length, low: low.length });
      kept = [...high, ...medium, ...low];
    }

    this.passed = kept.length;
    this.failed = scored.length - kept.length;

    for (const record of scored) {
      logger.debug(`Scored ${record.name}`, { score: record.icpScore, breakdown: record.scoreBreakdown });
    }

    return kept;
  }
}

export { ScoreStage as default };
