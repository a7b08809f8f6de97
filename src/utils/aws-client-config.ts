/**
 * AWS Client Configuration Helper
 *
 * Builds the shared client configuration for the SageMaker, Athena, S3 and STS clients.
 *
 * Supports:
 * - AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY (direct credentials)
 * - AWS_PROFILE (reads ~/.aws/credentials directly)
 * - otherwise the SDK's default provider chain
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';

export interface AWSStaticCredentials {
  accessKeyId: string;
  secretAccessKey: string;
  sessionToken?: string;
}

export interface AWSClientConfig {
  region: string;
  credentials?: AWSStaticCredentials;
}

export const DEFAULT_REGION = 'us-west-2';

/**
 * Read one profile section from an ini-style credentials file
 */
export function readCredentialsFromProfile(
  profileName: string,
  credentialsPath: string = path.join(os.homedir(), '.aws', 'credentials')
): AWSStaticCredentials | null {
  if (!fs.existsSync(credentialsPath)) {
    return null;
  }

  const lines = fs.readFileSync(credentialsPath, 'utf-8').split('\n');
  const values: Record<string, string> = {};
  let inProfile = false;

  for (const line of lines) {
    const trimmed = line.trim();
    if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
      if (inProfile) break;
      inProfile = trimmed === `[${profileName}]`;
      continue;
    }
    if (!inProfile) continue;

    const separator = trimmed.indexOf('=');
    if (separator > 0) {
      values[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
    }
  }

  const accessKeyId = values['aws_access_key_id'];
  const secretAccessKey = values['aws_secret_access_key'];
  if (!accessKeyId || !secretAccessKey) {
    return null;
  }
  const sessionToken = values['aws_session_token'];
  return {
    accessKeyId,
    secretAccessKey,
    ...(sessionToken ? { sessionToken } : {}),
  };
}

/**
 * Priority:
 * 1. AWS_ACCESS_KEY_ID / AWS_SECRET_ACCESS_KEY
 * 2. AWS_PROFILE from ~/.aws/credentials
 * 3. default provider chain (no credentials set here)
 */
export function getAWSClientConfig(
  region?: string,
  env: NodeJS.ProcessEnv = process.env
): AWSClientConfig {
  const config: AWSClientConfig = { region: region || env.AWS_REGION || DEFAULT_REGION };

  if (env.AWS_ACCESS_KEY_ID && env.AWS_SECRET_ACCESS_KEY) {
    config.credentials = {
      accessKeyId: env.AWS_ACCESS_KEY_ID,
      secretAccessKey: env.AWS_SECRET_ACCESS_KEY,
      ...(env.AWS_SESSION_TOKEN ? { sessionToken: env.AWS_SESSION_TOKEN } : {}),
    };
    return config;
  }

  if (env.AWS_PROFILE) {
    const profileCredentials = readCredentialsFromProfile(env.AWS_PROFILE);
    if (profileCredentials) {
      config.credentials = profileCredentials;
    }
  }

  return config;
}
