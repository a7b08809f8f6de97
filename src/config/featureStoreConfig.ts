/**
 * Feature store runtime config, read from the environment and validated with zod.
 * Poll intervals default to the service-friendly fixed values (5s / 2s / 60s).
 */

import * as path from 'path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { FeatureStoreConfigurationError } from '../types/FeatureStoreErrors';
import { DEFAULT_NAMESPACE, DEFAULT_PARAMETER_FILENAME } from '../types/ParameterStoreTypes';
import { DEFAULT_REGION } from '../utils/aws-client-config';
import type { PollBackoff } from '../utils/polling';

/** Empty strings from .env files mean "not set". */
const blankAsUnset = (val: unknown) => (val === '' || val == null ? undefined : val);

const optionalString = z.preprocess(blankAsUnset, z.string().min(1).optional());

const seconds = (fallback: number) => z.preprocess(blankAsUnset, z.coerce.number().positive().default(fallback));

export const FeatureStoreEnvSchema = z.object({
  AWS_REGION: z.preprocess(blankAsUnset, z.string().min(1).default(DEFAULT_REGION)),
  FEATURE_STORE_QUERY_BUCKET: optionalString,
  FEATURE_STORE_ATHENA_WORKGROUP: optionalString,
  LIFECYCLE_POLL_INTERVAL_SECONDS: seconds(5),
  QUERY_POLL_INTERVAL_SECONDS: seconds(2),
  REPLICATION_POLL_INTERVAL_SECONDS: seconds(60),
  POLL_BACKOFF_MULTIPLIER: z.preprocess(blankAsUnset, z.coerce.number().min(1).default(1)),
  POLL_MAX_INTERVAL_SECONDS: z.preprocess(blankAsUnset, z.coerce.number().positive().optional()),
  POLL_JITTER_RATIO: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(1).default(0)),
  PARAMETER_STORE_PATH: z.preprocess(blankAsUnset, z.string().min(1).default(DEFAULT_PARAMETER_FILENAME)),
  PARAMETER_STORE_NAMESPACE: z.preprocess(blankAsUnset, z.string().min(1).default(DEFAULT_NAMESPACE)),
});

/**
 * Load .env.local (local overrides) then .env into process.env. Existing variables win.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  loadDotenv({ path: path.join(cwd, '.env.local') });
  loadDotenv({ path: path.join(cwd, '.env') });
}

export interface FeatureStoreConfig {
  region: string;
  /** Bucket for Athena results; when unset the SageMaker default bucket is derived. */
  queryResultsBucket?: string;
  athenaWorkGroup?: string;
  lifecyclePollIntervalSeconds: number;
  queryPollIntervalSeconds: number;
  replicationPollIntervalSeconds: number;
  /** Applied to every wait; the defaults keep intervals fixed. */
  pollBackoff: PollBackoff;
  parameterStorePath: string;
  parameterStoreNamespace: string;
}

export function loadFeatureStoreConfig(env: NodeJS.ProcessEnv = process.env): FeatureStoreConfig {
  const parsed = FeatureStoreEnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new FeatureStoreConfigurationError(`Invalid feature store configuration: ${detail}`, 'ENV_INVALID');
  }
  const values = parsed.data;
  return {
    region: values.AWS_REGION,
    queryResultsBucket: values.FEATURE_STORE_QUERY_BUCKET,
    athenaWorkGroup: values.FEATURE_STORE_ATHENA_WORKGROUP,
    lifecyclePollIntervalSeconds: values.LIFECYCLE_POLL_INTERVAL_SECONDS,
    queryPollIntervalSeconds: values.QUERY_POLL_INTERVAL_SECONDS,
    replicationPollIntervalSeconds: values.REPLICATION_POLL_INTERVAL_SECONDS,
    pollBackoff: {
      backoffMultiplier: values.POLL_BACKOFF_MULTIPLIER,
      maxIntervalSeconds: values.POLL_MAX_INTERVAL_SECONDS,
      jitterRatio: values.POLL_JITTER_RATIO,
    },
    parameterStorePath: values.PARAMETER_STORE_PATH,
    parameterStoreNamespace: values.PARAMETER_STORE_NAMESPACE,
  };
}

/** SageMaker's default session bucket naming. */
export function defaultSageMakerBucket(region: string, accountId: string): string {
  return `sagemaker-${region}-${accountId}`;
}
