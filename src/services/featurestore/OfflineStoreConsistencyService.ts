/**
 * Waits for online-store ingestion to show up in the offline (Athena) replica.
 *
 * Replication is asynchronous and can take minutes. The replica is append-only for the
 * duration of the wait, so the first count >= expected settles it. The wait has no
 * built-in limit; pass a PollControl to bound it. A timeout covers the count queries
 * too: each one gets whatever is left of it.
 */

import { Logger } from '../core/Logger';
import { OfflineStoreQueryService } from './OfflineStoreQueryService';
import { pollUntil, systemClock, PollBackoff, PollControl, PollingClock } from '../../utils/polling';
import { FeatureStoreValidationError } from '../../types/FeatureStoreErrors';
import type { ReplicationCheck } from '../../types/FeatureStoreTypes';

export const DEFAULT_REPLICATION_POLL_INTERVAL_SECONDS = 60;

export class OfflineStoreConsistencyService {
  constructor(
    private readonly offlineStore: OfflineStoreQueryService,
    private readonly logger: Logger,
    private readonly pollIntervalSeconds: number = DEFAULT_REPLICATION_POLL_INTERVAL_SECONDS,
    private readonly clock: PollingClock = systemClock,
    private readonly backoff: PollBackoff = {}
  ) {}

  async waitForReplication(
    featureGroupName: string,
    expectedCount: number,
    control?: PollControl
  ): Promise<ReplicationCheck> {
    if (!Number.isInteger(expectedCount) || expectedCount < 0) {
      throw new FeatureStoreValidationError(
        `expectedCount must be a non-negative integer, got ${expectedCount}`,
        'INVALID_EXPECTED_COUNT'
      );
    }

    const log = this.logger.child({ featureGroupName });
    const startedAt = this.clock.now();
    const target = await this.offlineStore.getOfflineStoreTarget(featureGroupName);
    const { value: observedCount, polls } = await pollUntil(
      `waitForReplication(${featureGroupName})`,
      async (): Promise<number | null> => {
        const count = await this.offlineStore.getRecordCount(target, this.remainingControl(control, startedAt));
        if (count === null) {
          log.warn('Count query failed; treating replica as not yet caught up');
        } else if (count < expectedCount) {
          log.info('Waiting for data in offline store', { observedCount: count, expectedCount });
        }
        return count;
      },
      (count: number | null): count is number => count !== null && count >= expectedCount,
      { ...this.backoff, intervalSeconds: this.pollIntervalSeconds },
      control,
      this.clock
    );

    log.info('Features are available in the offline store', {
      observedCount,
      expectedCount,
      polls,
    });
    return { featureGroupName, expectedCount, observedCount, polls, confirmed: true };
  }

  private remainingControl(control: PollControl | undefined, startedAt: number): PollControl {
    if (control?.timeoutSeconds === undefined) {
      return { signal: control?.signal };
    }
    const elapsedSeconds = (this.clock.now() - startedAt) / 1000;
    return {
      signal: control.signal,
      timeoutSeconds: Math.max(0, control.timeoutSeconds - elapsedSeconds),
    };
  }
}
