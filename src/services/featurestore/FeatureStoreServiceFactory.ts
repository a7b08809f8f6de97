import { SageMakerClient } from '@aws-sdk/client-sagemaker';
import { AthenaClient } from '@aws-sdk/client-athena';
import { S3Client } from '@aws-sdk/client-s3';
import { STSClient } from '@aws-sdk/client-sts';
import { Logger } from '../core/Logger';
import { getAWSClientConfig } from '../../utils/aws-client-config';
import { systemClock, PollingClock } from '../../utils/polling';
import { FeatureStoreConfig } from '../../config/featureStoreConfig';
import { SageMakerFeatureGroupControlPlane } from '../aws/SageMakerFeatureGroupControlPlane';
import { AthenaQueryEngine } from '../aws/AthenaQueryEngine';
import { S3ObjectStorage } from '../aws/S3ObjectStorage';
import { StsAccountIdentity } from '../aws/StsAccountIdentity';
import { FeatureGroupLifecycleService } from './FeatureGroupLifecycleService';
import { QueryExecutionService } from './QueryExecutionService';
import { OfflineStoreQueryService } from './OfflineStoreQueryService';
import { OfflineStoreConsistencyService } from './OfflineStoreConsistencyService';
import { FeatureGroupTeardownService } from './FeatureGroupTeardownService';
import { ParameterStore } from '../parameters/ParameterStore';
import type {
  IAccountIdentity,
  IFeatureGroupControlPlane,
  IObjectStorage,
  IQueryEngine,
} from './IFeatureStoreClients';

export interface FeatureStoreClients {
  controlPlane: IFeatureGroupControlPlane;
  queryEngine: IQueryEngine;
  objectStorage: IObjectStorage;
  accountIdentity: IAccountIdentity;
}

export interface FeatureStoreServices {
  lifecycle: FeatureGroupLifecycleService;
  queryExecution: QueryExecutionService;
  offlineStore: OfflineStoreQueryService;
  consistency: OfflineStoreConsistencyService;
  teardown: FeatureGroupTeardownService;
}

export function createAwsFeatureStoreClients(config: FeatureStoreConfig, logger: Logger): FeatureStoreClients {
  const clientConfig = getAWSClientConfig(config.region);
  return {
    controlPlane: new SageMakerFeatureGroupControlPlane(new SageMakerClient(clientConfig), logger),
    queryEngine: new AthenaQueryEngine(new AthenaClient(clientConfig), logger, config.athenaWorkGroup),
    objectStorage: new S3ObjectStorage(new S3Client(clientConfig), logger),
    accountIdentity: new StsAccountIdentity(new STSClient(clientConfig)),
  };
}

/**
 * Wire the services over a set of clients. Tests pass in-process clients and a fake clock.
 */
export function createFeatureStoreServices(
  config: FeatureStoreConfig,
  clients: FeatureStoreClients,
  logger: Logger = new Logger('FeatureStore'),
  clock: PollingClock = systemClock
): FeatureStoreServices {
  const lifecycle = new FeatureGroupLifecycleService(
    clients.controlPlane,
    logger,
    config.lifecyclePollIntervalSeconds,
    clock,
    config.pollBackoff
  );
  const queryExecution = new QueryExecutionService(
    clients.queryEngine,
    clients.objectStorage,
    logger,
    config.queryPollIntervalSeconds,
    clock,
    config.pollBackoff
  );
  const offlineStore = new OfflineStoreQueryService(
    clients.controlPlane,
    queryExecution,
    clients.accountIdentity,
    logger,
    { region: config.region, queryResultsBucket: config.queryResultsBucket }
  );
  return {
    lifecycle,
    queryExecution,
    offlineStore,
    consistency: new OfflineStoreConsistencyService(
      offlineStore,
      logger,
      config.replicationPollIntervalSeconds,
      clock,
      config.pollBackoff
    ),
    teardown: new FeatureGroupTeardownService(
      clients.controlPlane,
      clients.objectStorage,
      clients.accountIdentity,
      lifecycle,
      logger,
      config.region
    ),
  };
}

export function createParameterStore(
  config: FeatureStoreConfig,
  logger: Logger = new Logger('ParameterStore')
): ParameterStore {
  return new ParameterStore({
    filename: config.parameterStorePath,
    namespace: config.parameterStoreNamespace,
    logger,
  });
}
