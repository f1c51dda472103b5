/**
 * Artifact persistence.
 *
 * Accepted games are written to `<outputDir>/<slug>/`; discarded attempts to
 * `<outputDir>/failed/<timestamp>-attempt-<n>/`. Each file is written to a
 * temporary name and renamed into place.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import { join } from 'node:path';
import { REQUIRED_ARTIFACTS, type ArtifactSet } from '../pipeline/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import {
  PathValidationError,
  resolveWithin,
  safeMkdir,
  safeRemove,
  safeRename,
  safeWriteFile,
} from '../utils/safe-fs.js';

/**
 * Directory name used when a title has no usable characters.
 */
export const UNNAMED_GAME_SLUG = 'unnamed-game';

/**
 * Subdirectory of the output directory that holds discarded attempts.
 */
export const FAILED_DIR_NAME = 'failed';

/**
 * Where accepted and discarded artifacts go.
 */
export interface ArtifactStore {
  /**
   * Persists accepted (or best-effort) artifacts under the game's title.
   *
   * @returns The directory written to.
   * @throws ArtifactStoreError when the files cannot be written.
   */
  save(artifacts: Readonly<ArtifactSet>, title: string): Promise<string>;

  /**
   * Persists artifacts from an attempt that failed validation.
   *
   * @param attempt - 1-based attempt number.
   * @returns The directory written to.
   * @throws ArtifactStoreError when the files cannot be written.
   */
  saveFailed(artifacts: Readonly<ArtifactSet>, attempt: number): Promise<string>;
}

/**
 * Error type for artifact store operations.
 */
export type ArtifactStoreErrorType = 'path_error' | 'write_error';

/**
 * Error class for artifact store operations.
 */
export class ArtifactStoreError extends Error {
  /** The type of storage error. */
  public readonly errorType: ArtifactStoreErrorType;
  /** Directory the operation was writing to. */
  public readonly directory: string;
  /** The underlying cause of the error if available. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ArtifactStoreError.
   *
   * @param message - Human-readable error message.
   * @param errorType - The type of storage error.
   * @param directory - Target directory.
   * @param cause - Underlying error.
   */
  constructor(
    message: string,
    errorType: ArtifactStoreErrorType,
    directory: string,
    cause?: Error
  ) {
    super(message);
    this.name = 'ArtifactStoreError';
    this.errorType = errorType;
    this.directory = directory;
    this.cause = cause;
  }
}

/**
 * Turns a game title into a directory name.
 *
 * @example
 * ```typescript
 * slugify('Space Blaster 2!'); // 'space-blaster-2'
 * slugify('!!!');              // 'unnamed-game'
 * ```
 */
export function slugify(title: string): string {
  const slug = title
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug !== '' ? slug : UNNAMED_GAME_SLUG;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * Formats a local time as `YYYYMMDD-HHMMSS`.
 */
export function formatTimestamp(date: Date): string {
  const day = `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

/**
 * Options for {@link FileArtifactStore}.
 */
export interface FileArtifactStoreOptions {
  /** Root output directory. */
  outputDir: string;
  /** Logger for save events. */
  logger?: Logger;
  /** Clock for failed-attempt directory names (injectable for testing). */
  now?: () => Date;
}

/**
 * {@link ArtifactStore} backed by the local file system.
 */
export class FileArtifactStore implements ArtifactStore {
  private readonly outputDir: string;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: FileArtifactStoreOptions) {
    this.outputDir = options.outputDir;
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? ((): Date => new Date());
  }

  async save(artifacts: Readonly<ArtifactSet>, title: string): Promise<string> {
    const directory = await this.writeAll(slugify(title), artifacts);
    this.logger.info('artifacts_saved', { title, directory });
    return directory;
  }

  async saveFailed(artifacts: Readonly<ArtifactSet>, attempt: number): Promise<string> {
    const name = `${formatTimestamp(this.now())}-attempt-${String(attempt)}`;
    const directory = await this.writeAll(join(FAILED_DIR_NAME, name), artifacts);
    this.logger.warn('failed_attempt_saved', { attempt, directory });
    return directory;
  }

  private async writeAll(relativeDir: string, artifacts: Readonly<ArtifactSet>): Promise<string> {
    let directory: string;
    try {
      directory = resolveWithin(this.outputDir, relativeDir);
    } catch (error) {
      if (error instanceof PathValidationError) {
        throw new ArtifactStoreError(
          `Invalid output location "${relativeDir}": ${error.message}`,
          'path_error',
          relativeDir,
          error
        );
      }
      throw error;
    }

    await safeMkdir(directory).catch((error: unknown) => {
      throw this.writeError(directory, error);
    });

    for (const name of REQUIRED_ARTIFACTS) {
      const target = join(directory, name);
      const temp = join(directory, `.${name}-${randomUUID()}.tmp`);
      try {
        await safeWriteFile(temp, artifacts[name]);
        await safeRename(temp, target);
      } catch (error) {
        await safeRemove(temp);
        throw this.writeError(directory, error);
      }
      this.logger.debug('artifact_written', {
        file: target,
        bytes: Buffer.byteLength(artifacts[name], 'utf8'),
      });
    }

    return directory;
  }

  private writeError(directory: string, error: unknown): ArtifactStoreError {
    const cause = error instanceof Error ? error : new Error(String(error));
    return new ArtifactStoreError(
      `Failed to save artifacts to "${directory}": ${cause.message}`,
      'write_error',
      directory,
      cause
    );
  }
}
