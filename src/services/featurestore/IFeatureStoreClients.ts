import type {
  CreateFeatureGroupOutcome,
  DeleteFeatureGroupOutcome,
  FeatureGroupDefinition,
  FeatureGroupDescription,
  QueryExecutionStatus,
} from '../../types/FeatureStoreTypes';

/**
 * Control plane for feature groups.
 * describeFeatureGroup resolves null when the group does not exist.
 */
export interface IFeatureGroupControlPlane {
  describeFeatureGroup(name: string): Promise<FeatureGroupDescription | null>;
  createFeatureGroup(definition: FeatureGroupDefinition): Promise<CreateFeatureGroupOutcome>;
  deleteFeatureGroup(name: string): Promise<DeleteFeatureGroupOutcome>;
}

export interface IQueryEngine {
  submitQuery(queryText: string, outputLocation: string, database: string): Promise<string>;
  getQueryStatus(executionId: string): Promise<QueryExecutionStatus>;
}

export interface IObjectStorage {
  listObjects(bucket: string, prefix: string): Promise<string[]>;
  /** Resolves the number of keys removed; rejects if any key failed. */
  deleteObjects(bucket: string, keys: string[]): Promise<number>;
  downloadObject(bucket: string, key: string): Promise<string>;
  deleteObject(bucket: string, key: string): Promise<void>;
}

export interface IAccountIdentity {
  getAccountId(): Promise<string>;
}
