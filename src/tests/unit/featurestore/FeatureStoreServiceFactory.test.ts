/**
 * FeatureStoreServiceFactory Unit Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  createAwsFeatureStoreClients,
  createFeatureStoreServices,
  createParameterStore,
} from '../../../services/featurestore/FeatureStoreServiceFactory';
import { loadFeatureStoreConfig } from '../../../config/featureStoreConfig';
import { Logger } from '../../../services/core/Logger';
import { SageMakerFeatureGroupControlPlane } from '../../../services/aws/SageMakerFeatureGroupControlPlane';
import { AthenaQueryEngine } from '../../../services/aws/AthenaQueryEngine';
import { S3ObjectStorage } from '../../../services/aws/S3ObjectStorage';
import { StsAccountIdentity } from '../../../services/aws/StsAccountIdentity';
import { FeatureGroupLifecycleService } from '../../../services/featurestore/FeatureGroupLifecycleService';
import { QueryExecutionService } from '../../../services/featurestore/QueryExecutionService';
import { OfflineStoreQueryService } from '../../../services/featurestore/OfflineStoreQueryService';
import { OfflineStoreConsistencyService } from '../../../services/featurestore/OfflineStoreConsistencyService';
import { FeatureGroupTeardownService } from '../../../services/featurestore/FeatureGroupTeardownService';
import {
  createInstantClock,
  describeAs,
  FixedAccountIdentity,
  InMemoryObjectStorage,
  ScriptedControlPlane,
  ScriptedQueryEngine,
} from '../../__mocks__/feature-store-fakes';

describe('FeatureStoreServiceFactory', () => {
  const logger = new Logger('FactoryTest');

  it('should build the AWS adapters from config', () => {
    const clients = createAwsFeatureStoreClients(loadFeatureStoreConfig({ AWS_REGION: 'eu-west-1' }), logger);

    expect(clients.controlPlane).toBeInstanceOf(SageMakerFeatureGroupControlPlane);
    expect(clients.queryEngine).toBeInstanceOf(AthenaQueryEngine);
    expect(clients.objectStorage).toBeInstanceOf(S3ObjectStorage);
    expect(clients.accountIdentity).toBeInstanceOf(StsAccountIdentity);
  });

  it('should wire every service over the given clients', () => {
    const storage = new InMemoryObjectStorage();
    const services = createFeatureStoreServices(loadFeatureStoreConfig({}), {
      controlPlane: new ScriptedControlPlane([null]),
      queryEngine: new ScriptedQueryEngine([], storage),
      objectStorage: storage,
      accountIdentity: new FixedAccountIdentity(),
    });

    expect(services.lifecycle).toBeInstanceOf(FeatureGroupLifecycleService);
    expect(services.queryExecution).toBeInstanceOf(QueryExecutionService);
    expect(services.offlineStore).toBeInstanceOf(OfflineStoreQueryService);
    expect(services.consistency).toBeInstanceOf(OfflineStoreConsistencyService);
    expect(services.teardown).toBeInstanceOf(FeatureGroupTeardownService);
  });

  it('should pass configured poll intervals and the clock through', async () => {
    const storage = new InMemoryObjectStorage();
    const { clock, sleeps } = createInstantClock();
    const services = createFeatureStoreServices(
      loadFeatureStoreConfig({ LIFECYCLE_POLL_INTERVAL_SECONDS: '7' }),
      {
        controlPlane: new ScriptedControlPlane([describeAs('orders', 'Creating'), describeAs('orders', 'Created')]),
        queryEngine: new ScriptedQueryEngine([], storage),
        objectStorage: storage,
        accountIdentity: new FixedAccountIdentity(),
      },
      logger,
      clock
    );

    await services.lifecycle.awaitCreation('orders');

    expect(sleeps).toEqual([7000]);
  });

  it('should apply configured backoff to every wait', async () => {
    const storage = new InMemoryObjectStorage();
    const { clock, sleeps } = createInstantClock();
    const services = createFeatureStoreServices(
      loadFeatureStoreConfig({
        LIFECYCLE_POLL_INTERVAL_SECONDS: '5',
        POLL_BACKOFF_MULTIPLIER: '2',
        POLL_MAX_INTERVAL_SECONDS: '8',
      }),
      {
        controlPlane: new ScriptedControlPlane([
          describeAs('orders', 'Creating'),
          describeAs('orders', 'Creating'),
          describeAs('orders', 'Creating'),
          describeAs('orders', 'Created'),
        ]),
        queryEngine: new ScriptedQueryEngine([], storage),
        objectStorage: storage,
        accountIdentity: new FixedAccountIdentity(),
      },
      logger,
      clock
    );

    await services.lifecycle.awaitCreation('orders');

    expect(sleeps).toEqual([5000, 8000, 8000]);
  });

  it('should open a parameter store at the configured path and namespace', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'factory-params-'));
    try {
      const filePath = path.join(dir, 'params.json');
      const store = createParameterStore(
        loadFeatureStoreConfig({ PARAMETER_STORE_PATH: filePath, PARAMETER_STORE_NAMESPACE: 'orders_run' }),
        logger
      );

      expect(store.filePath).toBe(filePath);
      expect(store.getNamespace()).toBe('orders_run');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
