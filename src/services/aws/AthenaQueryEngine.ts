import {
  AthenaClient,
  GetQueryExecutionCommand,
  StartQueryExecutionCommand,
} from '@aws-sdk/client-athena';
import { v4 as uuidv4 } from 'uuid';
import { Logger } from '../core/Logger';
import { FeatureStoreError } from '../../types/FeatureStoreErrors';
import type { IQueryEngine } from '../featurestore/IFeatureStoreClients';
import type { QueryExecutionState, QueryExecutionStatus } from '../../types/FeatureStoreTypes';

export type AthenaSender = Pick<AthenaClient, 'send'>;

/** QUEUED and RUNNING are both in flight; CANCELLED is a failure. */
export function toQueryExecutionState(state: string | undefined): QueryExecutionState {
  switch (state) {
    case 'SUCCEEDED':
      return 'Succeeded';
    case 'FAILED':
    case 'CANCELLED':
      return 'Failed';
    default:
      return 'Running';
  }
}

export class AthenaQueryEngine implements IQueryEngine {
  constructor(
    private readonly athenaClient: AthenaSender,
    private readonly logger: Logger,
    private readonly workGroup?: string
  ) {}

  async submitQuery(queryText: string, outputLocation: string, database: string): Promise<string> {
    const result = await this.athenaClient.send(
      new StartQueryExecutionCommand({
        QueryString: queryText,
        QueryExecutionContext: { Database: database },
        ResultConfiguration: { OutputLocation: outputLocation },
        ClientRequestToken: uuidv4(),
        WorkGroup: this.workGroup,
      })
    );
    if (!result.QueryExecutionId) {
      throw new FeatureStoreError('Athena did not return a QueryExecutionId', 'LIFECYCLE', 'QUERY_SUBMISSION_FAILED', true);
    }
    this.logger.debug('Athena query submitted', { executionId: result.QueryExecutionId, database });
    return result.QueryExecutionId;
  }

  async getQueryStatus(executionId: string): Promise<QueryExecutionStatus> {
    const result = await this.athenaClient.send(
      new GetQueryExecutionCommand({ QueryExecutionId: executionId })
    );
    const status = result.QueryExecution?.Status;
    const state = toQueryExecutionState(status?.State);
    if (state !== 'Failed') {
      return { state };
    }
    return {
      state,
      failureReason: status?.StateChangeReason ?? status?.AthenaError?.ErrorMessage ?? status?.State,
    };
  }
}
