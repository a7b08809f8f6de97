import { FeatureStoreConfigurationError } from '../types/FeatureStoreErrors';

export interface S3Location {
  bucket: string;
  /** Key or prefix without a leading slash; '' for the bucket root. */
  key: string;
}

export function parseS3Uri(uri: string): S3Location {
  const match = /^s3:\/\/([^/]+)\/?(.*)$/.exec(uri);
  if (!match || !match[1]) {
    throw new FeatureStoreConfigurationError(`Not an s3:// URI: ${uri}`, 'INVALID_S3_URI');
  }
  return { bucket: match[1], key: match[2] ?? '' };
}

/** Joins key segments with '/', dropping empty ones and stray slashes. */
export function joinS3Key(...segments: string[]): string {
  return segments
    .map((segment) => segment.replace(/^\/+|\/+$/g, ''))
    .filter((segment) => segment.length > 0)
    .join('/');
}
