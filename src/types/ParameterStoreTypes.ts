import type { ParameterNamespaceMissingError } from './FeatureStoreErrors';

export type ParameterValue =
  | string
  | number
  | boolean
  | null
  | ParameterValue[]
  | { [key: string]: ParameterValue };

export type ParameterMap = Record<string, ParameterValue>;

/** namespace -> key -> value, exactly as persisted. */
export type ParameterDocument = Record<string, ParameterMap>;

export type ParameterMutationResult =
  | { ok: true }
  | { ok: false; error: ParameterNamespaceMissingError };

export const TIMESTAMP_KEY = '__timestamp';
export const DEFAULT_NAMESPACE = 'experiment_1';
export const DEFAULT_PARAMETER_FILENAME = 'parameters.json';
