/**
 * Query execution: submit -> poll -> fetch -> cleanup.
 *
 * A failed query is a recoverable outcome (kind 'failed', empty table), not an exception.
 * On success the CSV artifact and its .metadata sidecar are always deleted after the
 * download, even when parsing or one of the deletes throws.
 */

import { Logger } from '../core/Logger';
import { pollUntil, systemClock, PollBackoff, PollControl, PollingClock } from '../../utils/polling';
import { errorMessage } from '../../utils/aws-errors';
import { parseCsvTable } from '../../utils/csv';
import { joinS3Key, parseS3Uri, S3Location } from '../../utils/s3-uri';
import { emptyResultTable } from '../../types/FeatureStoreTypes';
import type { IObjectStorage, IQueryEngine } from './IFeatureStoreClients';
import type { QueryExecutionStatus, QueryOutcome, ResultTable } from '../../types/FeatureStoreTypes';

export const DEFAULT_QUERY_POLL_INTERVAL_SECONDS = 2;

type FetchResult = { ok: true; table: ResultTable } | { ok: false; error: unknown };

/** Where Athena writes the result of an execution under an output location. */
export function resultArtifactLocation(outputLocation: string, executionId: string): S3Location {
  const { bucket, key } = parseS3Uri(outputLocation);
  return { bucket, key: joinS3Key(key, `${executionId}.csv`) };
}

export class QueryExecutionService {
  constructor(
    private readonly queryEngine: IQueryEngine,
    private readonly objectStorage: IObjectStorage,
    private readonly logger: Logger,
    private readonly pollIntervalSeconds: number = DEFAULT_QUERY_POLL_INTERVAL_SECONDS,
    private readonly clock: PollingClock = systemClock,
    private readonly backoff: PollBackoff = {}
  ) {}

  async runQuery(
    queryText: string,
    outputLocation: string,
    database: string,
    control?: PollControl
  ): Promise<QueryOutcome> {
    // validate the location before anything is submitted
    parseS3Uri(outputLocation);
    this.logger.debug('Running query', { queryText, database, outputLocation });

    const executionId = await this.queryEngine.submitQuery(queryText, outputLocation, database);
    const log = this.logger.child({ executionId });
    const { value: status, polls } = await pollUntil<QueryExecutionStatus>(
      `runQuery(${executionId})`,
      () => this.queryEngine.getQueryStatus(executionId),
      (current) => current.state !== 'Running',
      { ...this.backoff, intervalSeconds: this.pollIntervalSeconds },
      control,
      this.clock
    );

    if (status.state === 'Failed') {
      const reason = status.failureReason ?? 'unknown failure';
      log.warn('Query failed', { database, reason, polls });
      return { kind: 'failed', executionId, reason, table: emptyResultTable() };
    }

    const artifact = resultArtifactLocation(outputLocation, executionId);
    const table = await this.fetchAndCleanup(artifact, log);
    log.info('Query succeeded', { rows: table.rows.length, polls });
    return { kind: 'succeeded', executionId, table };
  }

  /**
   * Both deletes are attempted whatever happens to the download. A download or parse
   * error takes precedence over a delete error.
   */
  private async fetchAndCleanup(artifact: S3Location, log: Logger): Promise<ResultTable> {
    const fetched = await this.objectStorage
      .downloadObject(artifact.bucket, artifact.key)
      .then((body) => parseCsvTable(body))
      .then(
        (table): FetchResult => ({ ok: true, table }),
        (error: unknown): FetchResult => ({ ok: false, error })
      );

    const deletes = await Promise.allSettled([
      this.objectStorage.deleteObject(artifact.bucket, artifact.key),
      this.objectStorage.deleteObject(artifact.bucket, `${artifact.key}.metadata`),
    ]);
    const failedDelete = deletes.find((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failedDelete) {
      log.error('Failed to delete query result artifacts', {
        key: artifact.key,
        error: errorMessage(failedDelete.reason),
      });
    } else {
      log.debug('Deleted query result artifacts', { key: artifact.key });
    }

    if (!fetched.ok) {
      throw fetched.error;
    }
    if (failedDelete) {
      throw failedDelete.reason;
    }
    return fetched.table;
  }
}
