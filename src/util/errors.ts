// src/util/errors.ts

/**
 * Invalid or incomplete configuration. Raised before any artifact is written.
 */
export class ConfigError extends Error {
   constructor(message: string) {
      super(message);
      this.name = 'ConfigError';
   }
}

/**
 * An optimizer failed on a source. The artifact is not written.
 */
export class TransformError extends Error {
   constructor(
      readonly extension: string,
      readonly sourceLabel: string,
      cause: unknown,
   ) {
      const detail = cause instanceof Error ? cause.message : String(cause);
      super(`Failed to optimize ${sourceLabel} (${extension}): ${detail}`, { cause });
      this.name = 'TransformError';
   }
}

/**
 * Two different sources claimed the same output path within one build run.
 */
export class DuplicateArtifactError extends Error {
   constructor(readonly artifactKey: string) {
      super(`Artifact "${artifactKey}" was already written from a different source in this build`);
      this.name = 'DuplicateArtifactError';
   }
}
