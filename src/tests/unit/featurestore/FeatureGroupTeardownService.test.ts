/**
 * FeatureGroupTeardownService Unit Tests
 */

import {
  FeatureGroupTeardownService,
  offlineStoreObjectPrefix,
} from '../../../services/featurestore/FeatureGroupTeardownService';
import { FeatureGroupLifecycleService } from '../../../services/featurestore/FeatureGroupLifecycleService';
import { Logger } from '../../../services/core/Logger';
import { ResourceLifecycleError } from '../../../types/FeatureStoreErrors';
import { createServiceException } from '../../__mocks__/aws-sdk-clients';
import {
  createInstantClock,
  describeAs,
  FixedAccountIdentity,
  InMemoryObjectStorage,
  ScriptedControlPlane,
  TEST_ACCOUNT_ID,
  TEST_REGION,
} from '../../__mocks__/feature-store-fakes';
import type { FeatureGroupDescription } from '../../../types/FeatureStoreTypes';

const BUCKET = 'feature-bucket';
const PREFIX = 'feature-store/111122223333/sagemaker/us-west-2/offline-store/orders';

describe('offlineStoreObjectPrefix', () => {
  it('should derive the prefix under the configured base', () => {
    expect(offlineStoreObjectPrefix('s3://feature-bucket/feature-store/', TEST_ACCOUNT_ID, TEST_REGION, 'orders')).toEqual({
      bucket: BUCKET,
      prefix: PREFIX,
    });
  });

  it('should work from the bucket root', () => {
    expect(offlineStoreObjectPrefix('s3://feature-bucket', TEST_ACCOUNT_ID, 'eu-west-1', 'orders')).toEqual({
      bucket: BUCKET,
      prefix: '111122223333/sagemaker/eu-west-1/offline-store/orders',
    });
  });
});

describe('FeatureGroupTeardownService', () => {
  const logger = new Logger('FeatureGroupTeardownServiceTest');

  function setup(script: Array<FeatureGroupDescription | null>) {
    const controlPlane = new ScriptedControlPlane(script);
    const storage = new InMemoryObjectStorage();
    const identity = new FixedAccountIdentity();
    const { clock, sleeps } = createInstantClock();
    const lifecycle = new FeatureGroupLifecycleService(controlPlane, logger, 5, clock);
    const service = new FeatureGroupTeardownService(controlPlane, storage, identity, lifecycle, logger, TEST_REGION);
    return { controlPlane, storage, identity, service, sleeps };
  }

  function seedOfflineStore(storage: InMemoryObjectStorage): void {
    storage.put(BUCKET, `${PREFIX}-1700000000/data/year=2024/part-0.parquet`, 'p0');
    storage.put(BUCKET, `${PREFIX}-1700000000/data/year=2024/part-1.parquet`, 'p1');
    storage.put(BUCKET, 'feature-store/111122223333/sagemaker/us-west-2/offline-store/customers-1700000000/x.parquet', 'c');
  }

  it('should delete offline objects, request deletion and wait until the group is gone', async () => {
    const { controlPlane, storage, service, sleeps } = setup([
      describeAs('orders', 'Created'),
      describeAs('orders', 'Deleting'),
      null,
    ]);
    seedOfflineStore(storage);

    const report = await service.deleteResource('orders');

    expect(report).toEqual({
      featureGroupName: 'orders',
      objectCleanup: { kind: 'deleted', bucket: BUCKET, prefix: PREFIX, deletedCount: 2 },
      alreadyAbsent: false,
      polls: 2,
    });
    expect(controlPlane.deleteRequests).toEqual(['orders']);
    expect(sleeps).toEqual([5000]);
    expect([...storage.objects.keys()]).toEqual([
      `${BUCKET}/feature-store/111122223333/sagemaker/us-west-2/offline-store/customers-1700000000/x.parquet`,
    ]);
  });

  it('should leave objects alone when cleanup is not requested', async () => {
    const { storage, identity, service } = setup([describeAs('orders', 'Created'), null]);
    seedOfflineStore(storage);

    const report = await service.deleteResource('orders', false);

    expect(report.objectCleanup).toEqual({ kind: 'skipped', reason: 'not-requested' });
    expect(storage.objects.size).toBe(3);
    expect(identity.calls).toBe(0);
  });

  it('should skip cleanup for a group without an offline store', async () => {
    const { storage, service } = setup([describeAs('orders', 'Created', { offlineStore: undefined }), null]);

    const report = await service.deleteResource('orders');

    expect(report.objectCleanup).toEqual({ kind: 'skipped', reason: 'no-offline-store' });
    expect(storage.batchDeletes).toEqual([]);
  });

  it('should confirm an already absent group without failing', async () => {
    const { controlPlane, service } = setup([null]);
    controlPlane.deleteOutcome = { kind: 'already-absent' };

    await expect(service.deleteResource('orders')).resolves.toEqual({
      featureGroupName: 'orders',
      objectCleanup: { kind: 'skipped', reason: 'feature-group-absent' },
      alreadyAbsent: true,
      polls: 1,
    });
    expect(controlPlane.deleteRequests).toEqual(['orders']);
  });

  it('should not issue a batch delete when the prefix is empty', async () => {
    const { storage, service } = setup([describeAs('orders', 'Created'), null]);

    const report = await service.deleteResource('orders');

    expect(report.objectCleanup).toEqual({ kind: 'deleted', bucket: BUCKET, prefix: PREFIX, deletedCount: 0 });
    expect(storage.batchDeletes).toEqual([]);
  });

  it('should report a failed cleanup and still delete the group', async () => {
    const { controlPlane, storage, service } = setup([describeAs('orders', 'Created'), null]);
    seedOfflineStore(storage);
    storage.batchDeleteError = new Error('AccessDenied');

    const report = await service.deleteResource('orders');

    expect(report.objectCleanup).toEqual({
      kind: 'failed',
      bucket: BUCKET,
      prefix: PREFIX,
      deletedCount: 0,
      error: 'AccessDenied',
    });
    expect(controlPlane.deleteRequests).toEqual(['orders']);
    expect(report.polls).toBe(1);
  });

  it('should propagate delete request errors other than not-found', async () => {
    const { controlPlane, service } = setup([describeAs('orders', 'Created')]);
    controlPlane.deleteError = createServiceException('ValidationException', 'Feature group is being created');

    await expect(service.deleteResource('orders', false)).rejects.toThrow('Feature group is being created');
  });

  it('should fail when the group lands in DeleteFailed', async () => {
    const { service } = setup([describeAs('orders', 'Created'), describeAs('orders', 'DeleteFailed')]);

    await expect(service.deleteResource('orders', false)).rejects.toBeInstanceOf(ResourceLifecycleError);
  });
});
