import { Logger } from '../core/Logger';
import { QueryExecutionService } from './QueryExecutionService';
import { defaultSageMakerBucket } from '../../config/featureStoreConfig';
import { FeatureStoreConfigurationError, FeatureStoreError } from '../../types/FeatureStoreErrors';
import type { PollControl } from '../../utils/polling';
import type { IAccountIdentity, IFeatureGroupControlPlane } from './IFeatureStoreClients';
import type { OfflineStoreTarget, QueryOutcome } from '../../types/FeatureStoreTypes';

export const QUERY_RESULTS_PREFIX = 'offline-store/query_results/';

export interface OfflineStoreQueryOptions {
  region: string;
  /** Explicit results bucket; otherwise sagemaker-<region>-<account>. */
  queryResultsBucket?: string;
}

export function countQuery(tableName: string): string {
  return `SELECT COUNT(*) FROM "${tableName.replace(/"/g, '""')}"`;
}

/**
 * Resolves a feature group's Glue table and runs Athena queries against it.
 */
export class OfflineStoreQueryService {
  constructor(
    private readonly controlPlane: IFeatureGroupControlPlane,
    private readonly queryExecution: QueryExecutionService,
    private readonly accountIdentity: IAccountIdentity,
    private readonly logger: Logger,
    private readonly options: OfflineStoreQueryOptions
  ) {}

  async getOfflineStoreTarget(featureGroupName: string, outputLocation?: string): Promise<OfflineStoreTarget> {
    const description = await this.controlPlane.describeFeatureGroup(featureGroupName);
    if (!description) {
      throw new FeatureStoreConfigurationError(
        `Feature group ${featureGroupName} does not exist`,
        'FEATURE_GROUP_NOT_FOUND'
      );
    }
    const offlineStore = description.offlineStore;
    if (offlineStore?.disableGlueTableCreation) {
      throw new FeatureStoreConfigurationError(
        `Feature group ${featureGroupName} was created with Glue table creation disabled; it has no table to query`,
        'GLUE_TABLE_DISABLED'
      );
    }
    const tableName = offlineStore?.tableName;
    const database = offlineStore?.database;
    if (!tableName || !database) {
      throw new FeatureStoreConfigurationError(
        `Feature group ${featureGroupName} has no offline store table`,
        'OFFLINE_STORE_NOT_CONFIGURED'
      );
    }
    return {
      featureGroupName,
      tableName,
      database,
      outputLocation: outputLocation ?? (await this.defaultOutputLocation()),
    };
  }

  async defaultOutputLocation(): Promise<string> {
    const bucket =
      this.options.queryResultsBucket ??
      defaultSageMakerBucket(this.options.region, await this.accountIdentity.getAccountId());
    return `s3://${bucket}/${QUERY_RESULTS_PREFIX}`;
  }

  /**
   * Run an ad-hoc query. The table name Athena knows the group by is on the target.
   */
  async queryOfflineStore(
    featureGroupName: string,
    queryText: string,
    outputLocation?: string,
    control?: PollControl
  ): Promise<QueryOutcome> {
    const target = await this.getOfflineStoreTarget(featureGroupName, outputLocation);
    const outcome = await this.queryExecution.runQuery(queryText, target.outputLocation, target.database, control);
    if (outcome.kind === 'failed') {
      this.logger.child({ featureGroupName }).warn('Offline store query failed', {
        tableName: target.tableName,
        reason: outcome.reason,
      });
    }
    return outcome;
  }

  /**
   * Current row count of the replica, or null when the count query failed.
   */
  async getRecordCount(target: OfflineStoreTarget, control?: PollControl): Promise<number | null> {
    const outcome = await this.queryExecution.runQuery(
      countQuery(target.tableName),
      target.outputLocation,
      target.database,
      control
    );
    if (outcome.kind === 'failed') {
      return null;
    }
    const cell = outcome.table.rows[0]?.[0];
    const count = cell === undefined || cell === '' ? NaN : Number(cell);
    if (!Number.isInteger(count) || count < 0) {
      throw new FeatureStoreError(
        `Count query for ${target.tableName} returned "${cell ?? ''}"`,
        'LIFECYCLE',
        'UNEXPECTED_COUNT_RESULT'
      );
    }
    return count;
  }
}
