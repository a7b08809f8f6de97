/**
 * ParameterStore - namespaced key/value parameters persisted to a local JSON file.
 *
 * One in-memory document per instance; nothing is written until store() is called.
 * Single writer per file: there is no locking between processes.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Logger } from '../core/Logger';
import {
  ParameterFileNotFoundError,
  ParameterFileParseError,
  ParameterKeyNotFoundError,
  ParameterNamespaceMissingError,
} from '../../types/FeatureStoreErrors';
import {
  DEFAULT_NAMESPACE,
  DEFAULT_PARAMETER_FILENAME,
  TIMESTAMP_KEY,
  ParameterDocument,
  ParameterMap,
  ParameterMutationResult,
  ParameterValue,
} from '../../types/ParameterStoreTypes';

const ParameterValueSchema: z.ZodType<ParameterValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(ParameterValueSchema),
    z.record(ParameterValueSchema),
  ])
);

export const ParameterDocumentSchema = z.record(z.record(ParameterValueSchema));

export interface ParameterStoreOptions {
  /** Directory the file lives in. */
  path?: string;
  filename?: string;
  /** Namespaces merged over whatever is loaded from disk. */
  parameters?: ParameterDocument;
  namespace?: string;
  verbose?: boolean;
  logger?: Logger;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** dd/mm/yyyy HH:MM:SS in local time. */
export function formatTimestamp(date: Date): string {
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

function isFileNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/** Own enumerable property, even for names like "__proto__" that plain assignment would not create. */
function putNamespace(document: ParameterDocument, name: string, entry: ParameterMap): void {
  Object.defineProperty(document, name, { value: entry, enumerable: true, writable: true, configurable: true });
}

export class ParameterStore {
  readonly filePath: string;
  private namespace: string;
  private parameters: ParameterDocument = {};
  private readonly verbose: boolean;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: ParameterStoreOptions = {}) {
    this.filePath = path.join(options.path ?? '', options.filename ?? DEFAULT_PARAMETER_FILENAME);
    this.namespace = options.namespace ?? DEFAULT_NAMESPACE;
    this.verbose = options.verbose ?? true;
    this.logger = options.logger ?? new Logger('ParameterStore');
    this.now = options.now ?? (() => new Date());

    const defaults = structuredClone(options.parameters ?? {});
    if (fs.existsSync(this.filePath)) {
      this.load();
      this.parameters = { ...this.parameters, ...defaults };
    } else {
      this.parameters = defaults;
    }
  }

  setNamespace(namespace: string): void {
    this.namespace = namespace;
  }

  getNamespace(): string {
    return this.namespace;
  }

  /**
   * Replace the active namespace's mapping.
   */
  create(parameters: ParameterMap = {}): void {
    putNamespace(this.parameters, this.namespace, structuredClone(parameters));
    if (this.verbose) {
      this.logger.info('Creating namespace', { namespace: this.namespace, parameters });
    }
  }

  /**
   * Active namespace's mapping. Null when the whole document is empty, which is a
   * coarser check than "this namespace is empty"; also null (with a warning) when the
   * document has other namespaces but not this one.
   */
  read(): ParameterMap | null {
    if (Object.keys(this.parameters).length === 0) {
      return null;
    }
    const current = this.namespaceEntry(this.namespace);
    if (!current) {
      this.logger.warn('Namespace not found', { namespace: this.namespace });
      return null;
    }
    if (this.verbose) {
      this.logger.info('Reading namespace', { namespace: this.namespace, parameters: current });
    }
    return structuredClone(current);
  }

  readAll(): ParameterDocument {
    return structuredClone(this.parameters);
  }

  /**
   * Merge into the active namespace. The namespace must have been created first.
   */
  add(parameters: ParameterMap = {}): ParameterMutationResult {
    const current = this.namespaceEntry(this.namespace);
    if (!current) {
      const error = new ParameterNamespaceMissingError(this.namespace);
      this.logger.error('Cannot add parameters', { namespace: this.namespace, error: error.message });
      return { ok: false, error };
    }
    Object.assign(current, structuredClone(parameters));
    if (this.verbose) {
      this.logger.info('Updating parameters', { namespace: this.namespace, parameters });
    }
    return { ok: true };
  }

  delete(key: string): void {
    const current = this.namespaceEntry(this.namespace);
    if (!current) {
      throw new ParameterNamespaceMissingError(this.namespace);
    }
    if (!Object.prototype.hasOwnProperty.call(current, key)) {
      throw new ParameterKeyNotFoundError(this.namespace, key);
    }
    delete current[key];
  }

  clear(): void {
    putNamespace(this.parameters, this.namespace, {});
  }

  clearAll(): void {
    this.parameters = {};
  }

  /**
   * Replace the in-memory document with the file's contents.
   */
  load(): void {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, 'utf-8');
    } catch (error) {
      if (isFileNotFound(error)) {
        throw new ParameterFileNotFoundError(this.filePath);
      }
      throw error;
    }

    let document: unknown;
    try {
      document = JSON.parse(raw);
    } catch (error) {
      throw new ParameterFileParseError(
        this.filePath,
        'invalid JSON',
        error instanceof Error ? error : undefined
      );
    }

    const parsed = ParameterDocumentSchema.safeParse(document);
    if (!parsed.success) {
      throw new ParameterFileParseError(this.filePath, parsed.error.issues[0]?.message ?? 'unexpected shape');
    }
    this.parameters = parsed.data;
    if (this.verbose) {
      this.logger.info('Loaded parameters', { filePath: this.filePath, namespaces: Object.keys(this.parameters) });
    }
  }

  /**
   * Sort namespaces, stamp the active one with __timestamp, then write through a temp
   * file and rename so a crash never leaves a partial document.
   */
  store(): void {
    const ordered: ParameterDocument = {};
    for (const name of Object.keys(this.parameters).sort()) {
      const entry = this.namespaceEntry(name);
      if (entry) putNamespace(ordered, name, entry);
    }
    this.parameters = ordered;

    const timestamp = formatTimestamp(this.now());
    const current = this.namespaceEntry(this.namespace);
    if (current) {
      current[TIMESTAMP_KEY] = timestamp;
    } else {
      this.logger.warn('Active namespace missing; stored without timestamp', { namespace: this.namespace });
    }

    this.writeAtomically(JSON.stringify(this.parameters));
    if (this.verbose) {
      this.logger.info('Stored parameters', { filePath: this.filePath, timestamp });
    }
  }

  /** Namespace names are arbitrary strings, so only own properties count. */
  private namespaceEntry(name: string): ParameterMap | undefined {
    return Object.prototype.hasOwnProperty.call(this.parameters, name) ? this.parameters[name] : undefined;
  }

  private writeAtomically(content: string): void {
    const tmp = `${this.filePath}.tmp.${crypto.randomBytes(4).toString('hex')}`;
    fs.mkdirSync(path.dirname(path.resolve(this.filePath)), { recursive: true });
    try {
      const fd = fs.openSync(tmp, 'w', 0o644);
      try {
        fs.writeFileSync(fd, content, 'utf-8');
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmp, this.filePath);
    } catch (error) {
      fs.rmSync(tmp, { force: true });
      throw error;
    }
  }
}
