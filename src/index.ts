/**
 * Feature store lifecycle - main entry point
 */

export * from './types/FeatureStoreTypes';
export * from './types/FeatureStoreErrors';
export * from './types/ParameterStoreTypes';

export { loadFeatureStoreConfig, loadEnvFiles, defaultSageMakerBucket } from './config/featureStoreConfig';
export type { FeatureStoreConfig } from './config/featureStoreConfig';

export { Logger } from './services/core/Logger';
export type { LogMeta, LogContext } from './services/core/Logger';

export { pollUntil, systemClock } from './utils/polling';
export type { PollBackoff, PollControl, PollSchedule, PollingClock, PollResult } from './utils/polling';
export { getAWSClientConfig } from './utils/aws-client-config';

export type {
  IFeatureGroupControlPlane,
  IQueryEngine,
  IObjectStorage,
  IAccountIdentity,
} from './services/featurestore/IFeatureStoreClients';
export { FeatureGroupLifecycleService } from './services/featurestore/FeatureGroupLifecycleService';
export { QueryExecutionService } from './services/featurestore/QueryExecutionService';
export { OfflineStoreQueryService } from './services/featurestore/OfflineStoreQueryService';
export { OfflineStoreConsistencyService } from './services/featurestore/OfflineStoreConsistencyService';
export { FeatureGroupTeardownService } from './services/featurestore/FeatureGroupTeardownService';
export {
  createAwsFeatureStoreClients,
  createFeatureStoreServices,
  createParameterStore,
} from './services/featurestore/FeatureStoreServiceFactory';
export type { FeatureStoreClients, FeatureStoreServices } from './services/featurestore/FeatureStoreServiceFactory';

export { SageMakerFeatureGroupControlPlane } from './services/aws/SageMakerFeatureGroupControlPlane';
export { AthenaQueryEngine } from './services/aws/AthenaQueryEngine';
export { S3ObjectStorage } from './services/aws/S3ObjectStorage';
export { StsAccountIdentity } from './services/aws/StsAccountIdentity';

export { ParameterStore } from './services/parameters/ParameterStore';
export type { ParameterStoreOptions } from './services/parameters/ParameterStore';
