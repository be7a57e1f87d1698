// src/core/artifact-writer.ts

import fs from 'fs';
import path from 'path';
import type {
   ArtifactSource,
   BuildTarget,
   MaterializeMethod,
   WriteOutcome,
   WriteResult,
} from '../schema/target';
import { DuplicateArtifactError } from '../util/errors';
import {
   ensureDirSync,
   lstatSafeSync,
   resolveInsideRoot,
   toPosixPath,
} from '../util/fs-utils';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import type { BuildManifest } from './build-manifest';
import { fingerprint } from './content-address';
import { OptimizationDispatcher } from './optimize';

export const DEFAULT_LARGE_FILE_THRESHOLD = 4 * 1024 * 1024;

const ARTIFACT_MODE = 0o644;

/** Modification times closer than this are considered equal. */
const MTIME_TOLERANCE_MS = 1;

export interface ArtifactWriterOptions {
   /** Root of the build output, e.g. `<dataRoot>/build/dev`. */
   buildDir: string;
   dispatcher?: OptimizationDispatcher;
   manifest?: BuildManifest;
   /** File sources strictly larger than this many bytes are symlinked. */
   largeFileThreshold?: number;
   logger?: Logger;
}

interface Claim {
   identity: string;
   result: WriteResult;
}

/**
 * Incremental build cache: decides per artifact whether to write,
 * how to materialize it and which optimizer to run.
 */
export class ArtifactWriter {
   private readonly buildDir: string;
   private readonly dispatcher: OptimizationDispatcher;
   private readonly manifest: BuildManifest | undefined;
   private readonly threshold: number;
   private readonly logger: Logger;

   private readonly claims = new Map<string, Claim>();
   private readonly hashes: Record<string, string> = {};
   private readonly counts: Record<WriteOutcome, number> = {
      created: 0,
      updated: 0,
      unchanged: 0,
   };

   constructor(options: ArtifactWriterOptions) {
      this.buildDir = path.resolve(options.buildDir);
      this.dispatcher = options.dispatcher ?? new OptimizationDispatcher();
      this.manifest = options.manifest;
      this.threshold = options.largeFileThreshold ?? DEFAULT_LARGE_FILE_THRESHOLD;
      this.logger = options.logger ?? defaultLogger.child('[writer]');
   }

   /**
    * Fingerprints of written artifacts keyed by `<siteDir>/<logicalPath>`.
    * Handed to templates for cache-busting query strings.
    */
   get fileHash(): Readonly<Record<string, string>> {
      return this.hashes;
   }

   summary(): Readonly<Record<WriteOutcome, number>> {
      return this.counts;
   }

   async write(target: BuildTarget): Promise<WriteResult> {
      const logicalPath = toPosixPath(target.logicalPath).replace(/^\/+/, '');
      if (!logicalPath) {
         throw new Error(`Empty logical path for site "${target.siteDir}"`);
      }

      const siteRoot = resolveInsideRoot(this.buildDir, target.siteDir);
      const targetPath = resolveInsideRoot(siteRoot, logicalPath);
      const key = toPosixPath(path.relative(this.buildDir, targetPath));

      const source = target.source;
      const identity = sourceIdentity(source);

      const claim = this.claims.get(key);
      if (claim) {
         if (claim.identity !== identity) {
            throw new DuplicateArtifactError(key);
         }
         this.logger.debug(`${key} already written in this build`);
         return { ...claim.result, outcome: 'unchanged' };
      }

      const existing = lstatSafeSync(targetPath);
      if (existing?.isDirectory()) {
         throw new Error(`Cannot write artifact ${key}: a directory is in the way`);
      }

      const ext = path.extname(logicalPath).toLowerCase();
      const result =
         source.kind === 'file'
            ? await this.writeFromFile(key, targetPath, source, ext, existing)
            : await this.writeInline(key, targetPath, toBuffer(source.content), ext, existing);

      this.claims.set(key, { identity, result });
      this.counts[result.outcome] += 1;
      if (result.fingerprint) {
         this.hashes[key] = result.fingerprint;
      }
      this.logger.debug(`${result.outcome} (${result.method}) ${key}`);
      return result;
   }

   private async writeFromFile(
      key: string,
      targetPath: string,
      source: { kind: 'file'; path: string },
      ext: string,
      existing: fs.Stats | null,
   ): Promise<WriteResult> {
      const srcAbs = path.resolve(source.path);
      const srcStat = fs.statSync(srcAbs);
      const isLarge = srcStat.size > this.threshold;

      if (existing) {
         if (existing.isSymbolicLink()) {
            if (isLarge && fs.readlinkSync(targetPath) === srcAbs) {
               return this.record(key, 'unchanged', 'link', targetPath);
            }
         } else if (existing.isFile() && !isLarge && !this.isStale(srcStat, existing, ext)) {
            // no read: the fingerprint is only known if the manifest kept it
            const known = this.manifest?.get(key)?.fingerprint;
            return this.record(key, 'unchanged', 'copy', targetPath, { fingerprint: known });
         }
         fs.unlinkSync(targetPath);
      }

      ensureDirSync(path.dirname(targetPath));
      const outcome: WriteOutcome = existing ? 'updated' : 'created';

      if (isLarge) {
         fs.symlinkSync(srcAbs, targetPath);
         return this.record(key, outcome, 'link', targetPath);
      }

      const data = await this.dispatcher.transform(source, ext);
      writeArtifact(targetPath, data);
      fs.utimesSync(targetPath, srcStat.atime, srcStat.mtime);
      return this.record(key, outcome, 'copy', targetPath, { fingerprint: fingerprint(data) });
   }

   private async writeInline(
      key: string,
      targetPath: string,
      raw: Buffer,
      ext: string,
      existing: fs.Stats | null,
   ): Promise<WriteResult> {
      const inputFingerprint = fingerprint(raw);

      if (existing?.isFile()) {
         const current = fs.readFileSync(targetPath);
         const entry = this.manifest?.get(key);
         if (
            entry?.fingerprint &&
            entry.inputFingerprint === inputFingerprint &&
            fingerprint(current) === entry.fingerprint
         ) {
            return this.record(key, 'unchanged', 'write', targetPath, {
               fingerprint: entry.fingerprint,
               inputFingerprint,
            });
         }

         const data = await this.dispatcher.transform({ kind: 'inline', content: raw }, ext);
         if (current.equals(data)) {
            return this.record(key, 'unchanged', 'write', targetPath, {
               fingerprint: fingerprint(data),
               inputFingerprint,
            });
         }

         fs.unlinkSync(targetPath);
         writeArtifact(targetPath, data);
         return this.record(key, 'updated', 'write', targetPath, {
            fingerprint: fingerprint(data),
            inputFingerprint,
         });
      }

      if (existing) {
         // never write through a link into its source
         fs.unlinkSync(targetPath);
      }

      const data = await this.dispatcher.transform({ kind: 'inline', content: raw }, ext);
      ensureDirSync(path.dirname(targetPath));
      writeArtifact(targetPath, data);
      return this.record(key, existing ? 'updated' : 'created', 'write', targetPath, {
         fingerprint: fingerprint(data),
         inputFingerprint,
      });
   }

   private isStale(src: fs.Stats, dst: fs.Stats, ext: string): boolean {
      if (Math.abs(src.mtimeMs - dst.mtimeMs) >= MTIME_TOLERANCE_MS) return true;
      return this.dispatcher.optimizerFor(ext).sizePreserving && src.size !== dst.size;
   }

   private record(
      key: string,
      outcome: WriteOutcome,
      method: MaterializeMethod,
      targetPath: string,
      fingerprints: { fingerprint?: string; inputFingerprint?: string } = {},
   ): WriteResult {
      if (this.manifest) {
         const previous = this.manifest.get(key);
         this.manifest.set({
            path: key,
            method,
            inputFingerprint: fingerprints.inputFingerprint,
            fingerprint: fingerprints.fingerprint,
            writtenAt:
               outcome === 'unchanged' && previous
                  ? previous.writtenAt
                  : new Date().toISOString(),
         });
      }
      return { outcome, method, targetPath, fingerprint: fingerprints.fingerprint };
   }
}

function toBuffer(content: string | Buffer): Buffer {
   return Buffer.isBuffer(content) ? content : Buffer.from(content, 'utf8');
}

/**
 * Two claims on the same artifact are compatible iff their identities match.
 */
function sourceIdentity(source: ArtifactSource): string {
   return source.kind === 'file'
      ? `file:${path.resolve(source.path)}`
      : `inline:${fingerprint(toBuffer(source.content))}`;
}

function writeArtifact(targetPath: string, data: Buffer): void {
   fs.writeFileSync(targetPath, data, { mode: ARTIFACT_MODE });
   fs.chmodSync(targetPath, ARTIFACT_MODE);
}
