// src/schema/target.ts

/**
 * Where the bytes of an artifact come from.
 *
 * - `file`: a path on disk, read (or linked) when the artifact is stale.
 * - `inline`: literal content produced during the build, e.g. rendered HTML.
 */
export type ArtifactSource =
   | { kind: 'file'; path: string }
   | { kind: 'inline'; content: string | Buffer };

/**
 * One artifact destined for the build output directory.
 */
export interface BuildTarget {
   /**
    * Per-site subdirectory of the build directory (e.g. "science").
    */
   siteDir: string;

   /**
    * Site-relative output path, POSIX style. A leading "/" is ignored.
    * Example: "assets/favicon-32.png", "teaching.html".
    */
   logicalPath: string;

   source: ArtifactSource;
}

export type WriteOutcome = 'created' | 'updated' | 'unchanged';

/**
 * How an artifact is physically present in the build directory.
 */
export type MaterializeMethod = 'write' | 'copy' | 'link';

export interface WriteResult {
   outcome: WriteOutcome;
   method: MaterializeMethod;
   /** Absolute path of the artifact. */
   targetPath: string;
   /** Fingerprint of the written bytes; absent for linked artifacts. */
   fingerprint?: string;
}

export function fileSource(filePath: string): ArtifactSource {
   return { kind: 'file', path: filePath };
}

export function inlineSource(content: string | Buffer): ArtifactSource {
   return { kind: 'inline', content };
}
