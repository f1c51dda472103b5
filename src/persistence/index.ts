/**
 * Artifact persistence.
 *
 * @packageDocumentation
 */

export {
  ArtifactStoreError,
  FAILED_DIR_NAME,
  FileArtifactStore,
  UNNAMED_GAME_SLUG,
  formatTimestamp,
  slugify,
  type ArtifactStore,
  type ArtifactStoreErrorType,
  type FileArtifactStoreOptions,
} from './artifact-store.js';
