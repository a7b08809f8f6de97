/**
 * Feature Store Types - feature group lifecycle, offline store queries, replication checks
 */

/**
 * Statuses reported by the control plane for a feature group.
 */
export type FeatureGroupStatus =
  | 'Creating'
  | 'Created'
  | 'CreateFailed'
  | 'Deleting'
  | 'DeleteFailed';

/**
 * 'Absent' is the named terminal condition for "describe no longer finds the group".
 * It only counts as success when the caller lists it as terminal (deletion polling).
 */
export type ObservedFeatureGroupStatus = FeatureGroupStatus | 'Absent';

export interface OfflineStoreDescription {
  s3Uri: string;
  tableName?: string;
  database?: string;
  /** No Glue table is registered, so the replica cannot be queried through Athena. */
  disableGlueTableCreation: boolean;
}

export interface FeatureGroupDescription {
  name: string;
  status: FeatureGroupStatus;
  failureReason?: string;
  offlineStore?: OfflineStoreDescription;
}

export type FeatureType = 'Integral' | 'Fractional' | 'String';

export interface FeatureDefinition {
  name: string;
  type: FeatureType;
}

export interface FeatureGroupDefinition {
  name: string;
  recordIdentifierName: string;
  eventTimeFeatureName: string;
  featureDefinitions: FeatureDefinition[];
  /** s3://bucket/prefix for the offline store; omit for an online-only group. */
  offlineStoreS3Uri?: string;
  roleArn: string;
  enableOnlineStore: boolean;
  description?: string;
}

export type CreateFeatureGroupOutcome =
  | { kind: 'created'; featureGroupArn?: string }
  | { kind: 'already-exists' };

export type DeleteFeatureGroupOutcome = { kind: 'requested' } | { kind: 'already-absent' };

export interface StatusWaitSpec {
  pollIntervalSeconds: number;
  terminalStatuses: readonly ObservedFeatureGroupStatus[];
  failureStatuses: readonly ObservedFeatureGroupStatus[];
}

export interface StatusWaitResult {
  status: ObservedFeatureGroupStatus;
  polls: number;
}

/**
 * Query execution
 */
export type QueryExecutionState = 'Running' | 'Succeeded' | 'Failed';

export interface QueryExecutionStatus {
  state: QueryExecutionState;
  failureReason?: string;
}

export interface ResultTable {
  columns: string[];
  rows: string[][];
}

/** A fresh empty table per call; callers may mutate what they get back. */
export function emptyResultTable(): ResultTable {
  return { columns: [], rows: [] };
}

export type QueryOutcome =
  | { kind: 'succeeded'; executionId: string; table: ResultTable }
  | { kind: 'failed'; executionId: string; reason: string; table: ResultTable };

export interface OfflineStoreTarget {
  featureGroupName: string;
  tableName: string;
  database: string;
  /** s3:// location Athena materializes results under. */
  outputLocation: string;
}

/**
 * Consistency wait
 */
export interface ReplicationCheck {
  featureGroupName: string;
  expectedCount: number;
  observedCount: number;
  polls: number;
  confirmed: true;
}

/**
 * Teardown
 */
export type ObjectCleanupResult =
  | { kind: 'skipped'; reason: 'not-requested' | 'no-offline-store' | 'feature-group-absent' }
  | { kind: 'deleted'; bucket: string; prefix: string; deletedCount: number }
  | { kind: 'failed'; bucket: string; prefix: string; deletedCount: number; error: string };

export interface TeardownReport {
  featureGroupName: string;
  objectCleanup: ObjectCleanupResult;
  alreadyAbsent: boolean;
  polls: number;
}
