/**
 * Feature group teardown: offline store objects (best-effort), delete request
 * (idempotent), then poll until describe no longer finds the group.
 *
 * Object cleanup and the delete request are not transactional. Re-running deleteResource
 * after a partial failure is safe: an absent group skips straight to confirmation.
 */

import { Logger } from '../core/Logger';
import { FeatureGroupLifecycleService } from './FeatureGroupLifecycleService';
import { joinS3Key, parseS3Uri } from '../../utils/s3-uri';
import { errorMessage } from '../../utils/aws-errors';
import type { PollControl } from '../../utils/polling';
import type { IAccountIdentity, IFeatureGroupControlPlane, IObjectStorage } from './IFeatureStoreClients';
import type { ObjectCleanupResult, OfflineStoreDescription, TeardownReport } from '../../types/FeatureStoreTypes';

/**
 * <base prefix>/<account>/sagemaker/<region>/offline-store/<name>
 *
 * No trailing slash: the service suffixes the group's folder with its creation time.
 */
export function offlineStoreObjectPrefix(
  baseS3Uri: string,
  accountId: string,
  region: string,
  featureGroupName: string
): { bucket: string; prefix: string } {
  const { bucket, key } = parseS3Uri(baseS3Uri);
  return {
    bucket,
    prefix: joinS3Key(key, accountId, 'sagemaker', region, 'offline-store', featureGroupName),
  };
}

export class FeatureGroupTeardownService {
  constructor(
    private readonly controlPlane: IFeatureGroupControlPlane,
    private readonly objectStorage: IObjectStorage,
    private readonly accountIdentity: IAccountIdentity,
    private readonly lifecycle: FeatureGroupLifecycleService,
    private readonly logger: Logger,
    private readonly region: string
  ) {}

  async deleteResource(
    featureGroupName: string,
    alsoDeleteBackingObjects: boolean = true,
    control?: PollControl
  ): Promise<TeardownReport> {
    const log = this.logger.child({ featureGroupName });
    const description = await this.controlPlane.describeFeatureGroup(featureGroupName);

    let objectCleanup: ObjectCleanupResult;
    if (!alsoDeleteBackingObjects) {
      objectCleanup = { kind: 'skipped', reason: 'not-requested' };
    } else if (!description) {
      objectCleanup = { kind: 'skipped', reason: 'feature-group-absent' };
    } else if (!description.offlineStore) {
      objectCleanup = { kind: 'skipped', reason: 'no-offline-store' };
    } else {
      objectCleanup = await this.deleteOfflineObjects(featureGroupName, description.offlineStore, log);
    }

    const outcome = await this.controlPlane.deleteFeatureGroup(featureGroupName);
    const alreadyAbsent = outcome.kind === 'already-absent';
    log.info('Feature group deletion requested', { alreadyAbsent });

    const { polls } = await this.lifecycle.awaitDeletion(featureGroupName, control);
    log.info('Feature group deleted', { polls, objectCleanup: objectCleanup.kind });
    return { featureGroupName, objectCleanup, alreadyAbsent, polls };
  }

  private async deleteOfflineObjects(
    featureGroupName: string,
    offlineStore: OfflineStoreDescription,
    log: Logger
  ): Promise<ObjectCleanupResult> {
    let bucket = '';
    let prefix = '';
    let deletedCount = 0;
    try {
      const accountId = await this.accountIdentity.getAccountId();
      ({ bucket, prefix } = offlineStoreObjectPrefix(offlineStore.s3Uri, accountId, this.region, featureGroupName));
      log.info('Deleting offline store objects', { bucket, prefix });

      const keys = await this.objectStorage.listObjects(bucket, prefix);
      if (keys.length > 0) {
        deletedCount = await this.objectStorage.deleteObjects(bucket, keys);
      }
      return { kind: 'deleted', bucket, prefix, deletedCount };
    } catch (error) {
      const message = errorMessage(error);
      log.error('Offline store object cleanup failed; continuing teardown', {
        bucket,
        prefix,
        error: message,
      });
      return { kind: 'failed', bucket, prefix, deletedCount, error: message };
    }
  }
}
