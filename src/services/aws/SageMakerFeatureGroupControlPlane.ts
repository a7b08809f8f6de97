import {
  SageMakerClient,
  CreateFeatureGroupCommand,
  DeleteFeatureGroupCommand,
  DescribeFeatureGroupCommand,
  DescribeFeatureGroupCommandOutput,
} from '@aws-sdk/client-sagemaker';
import { Logger } from '../core/Logger';
import { isAwsErrorNamed } from '../../utils/aws-errors';
import { FeatureStoreError } from '../../types/FeatureStoreErrors';
import type { IFeatureGroupControlPlane } from '../featurestore/IFeatureStoreClients';
import type {
  CreateFeatureGroupOutcome,
  DeleteFeatureGroupOutcome,
  FeatureGroupDefinition,
  FeatureGroupDescription,
  FeatureGroupStatus,
  OfflineStoreDescription,
} from '../../types/FeatureStoreTypes';

export type SageMakerSender = Pick<SageMakerClient, 'send'>;

function toFeatureGroupStatus(name: string, status: string | undefined): FeatureGroupStatus {
  switch (status) {
    case 'Creating':
    case 'Created':
    case 'CreateFailed':
    case 'Deleting':
    case 'DeleteFailed':
      return status;
    default:
      throw new FeatureStoreError(
        `Unrecognised status "${status ?? ''}" for feature group ${name}`,
        'LIFECYCLE',
        'UNKNOWN_FEATURE_GROUP_STATUS'
      );
  }
}

function toOfflineStore(output: DescribeFeatureGroupCommandOutput): OfflineStoreDescription | undefined {
  const config = output.OfflineStoreConfig;
  const s3Uri = config?.S3StorageConfig?.S3Uri;
  if (!config || !s3Uri) {
    return undefined;
  }
  return {
    s3Uri,
    tableName: config.DataCatalogConfig?.TableName,
    database: config.DataCatalogConfig?.Database,
    disableGlueTableCreation: config.DisableGlueTableCreation ?? false,
  };
}

/**
 * SageMaker Feature Store control plane adapter
 */
export class SageMakerFeatureGroupControlPlane implements IFeatureGroupControlPlane {
  constructor(
    private readonly sagemakerClient: SageMakerSender,
    private readonly logger: Logger
  ) {}

  async describeFeatureGroup(name: string): Promise<FeatureGroupDescription | null> {
    let output: DescribeFeatureGroupCommandOutput;
    try {
      output = await this.sagemakerClient.send(
        new DescribeFeatureGroupCommand({ FeatureGroupName: name })
      );
    } catch (error) {
      if (isAwsErrorNamed(error, 'ResourceNotFound')) {
        this.logger.debug('Feature group not found', { featureGroupName: name });
        return null;
      }
      throw error;
    }

    return {
      name: output.FeatureGroupName ?? name,
      status: toFeatureGroupStatus(name, output.FeatureGroupStatus),
      failureReason: output.FailureReason,
      offlineStore: toOfflineStore(output),
    };
  }

  async createFeatureGroup(definition: FeatureGroupDefinition): Promise<CreateFeatureGroupOutcome> {
    try {
      const output = await this.sagemakerClient.send(
        new CreateFeatureGroupCommand({
          FeatureGroupName: definition.name,
          RecordIdentifierFeatureName: definition.recordIdentifierName,
          EventTimeFeatureName: definition.eventTimeFeatureName,
          FeatureDefinitions: definition.featureDefinitions.map((feature) => ({
            FeatureName: feature.name,
            FeatureType: feature.type,
          })),
          OnlineStoreConfig: { EnableOnlineStore: definition.enableOnlineStore },
          OfflineStoreConfig: definition.offlineStoreS3Uri
            ? { S3StorageConfig: { S3Uri: definition.offlineStoreS3Uri } }
            : undefined,
          RoleArn: definition.roleArn,
          Description: definition.description,
        })
      );
      this.logger.info('Feature group creation requested', { featureGroupName: definition.name });
      return { kind: 'created', featureGroupArn: output.FeatureGroupArn };
    } catch (error) {
      if (isAwsErrorNamed(error, 'ResourceInUse')) {
        this.logger.info('Using existing feature group', { featureGroupName: definition.name });
        return { kind: 'already-exists' };
      }
      throw error;
    }
  }

  async deleteFeatureGroup(name: string): Promise<DeleteFeatureGroupOutcome> {
    try {
      await this.sagemakerClient.send(new DeleteFeatureGroupCommand({ FeatureGroupName: name }));
      return { kind: 'requested' };
    } catch (error) {
      if (isAwsErrorNamed(error, 'ResourceNotFound')) {
        return { kind: 'already-absent' };
      }
      throw error;
    }
  }
}
