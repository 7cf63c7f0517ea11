import { freeze } from 'immer';
import { join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { DownloadConfig } from '../../config/download-config.schema';
import { BackendTarget, describeTarget } from '../value-objects/backend-target.vo';

/**
 * Download Job Entity - one request to fetch a source into a destination
 *
 * Immutable once created: the data is deep-frozen, and nothing in the
 * download flow produces a modified copy.
 */
export interface DownloadJobEntity {
  readonly jobId: string;
  readonly source: string;
  readonly outputDir: string;
  readonly modelName?: string;
  /** `outputDir/modelName`, or `outputDir` when no model name was given */
  readonly destination: string;
  readonly target: BackendTarget;
  readonly config: DownloadConfig;
  readonly createdAt: Date;
}

// eslint-disable-next-line @typescript-eslint/no-namespace
export namespace DownloadJobEntity {
  export interface CreateProps {
    jobId?: string;
    source: string;
    outputDir: string;
    modelName?: string;
    target: BackendTarget;
    config: DownloadConfig;
    createdAt?: Date;
  }

  export function create(props: CreateProps): DownloadJobEntity {
    validate(props);

    const job: DownloadJobEntity = {
      jobId: props.jobId ?? uuidv4(),
      source: props.source,
      outputDir: props.outputDir,
      modelName: props.modelName,
      destination: props.modelName ? join(props.outputDir, props.modelName) : props.outputDir,
      target: { ...props.target },
      config: { ...props.config },
      createdAt: props.createdAt ?? new Date(),
    };

    return freeze(job, true);
  }

  export function lockPath(job: DownloadJobEntity, lockFileName: string): string {
    return join(job.destination, lockFileName);
  }

  /**
   * Loggable view; credentials are reduced to whether they are set.
   */
  export function toJSON(job: DownloadJobEntity): Record<string, unknown> {
    return {
      jobId: job.jobId,
      source: job.source,
      destination: job.destination,
      modelName: job.modelName,
      backend: job.target.kind,
      target: describeTarget(job.target),
      hasAccessKey: Boolean(job.config.accessKey),
      hasSecretKey: Boolean(job.config.secretKey),
      hasHfToken: Boolean(job.config.hfToken),
      endpoint: job.config.endpoint,
      createdAt: job.createdAt.toISOString(),
    };
  }

  function validate(props: CreateProps): void {
    if (!props.source || props.source.trim().length === 0) {
      throw new Error('Source is required');
    }
    if (!props.outputDir || props.outputDir.trim().length === 0) {
      throw new Error('Output directory is required');
    }
    if (props.modelName !== undefined) {
      const name = props.modelName;
      if (name.trim().length === 0 || name === '.' || name === '..' || /[\\/]/.test(name)) {
        throw new Error(`Model name must be a single path segment: '${name}'`);
      }
    }
  }
}
