// src/core/build-manifest.ts

import fs from 'fs';
import path from 'path';
import type { MaterializeMethod } from '../schema/target';
import { ensureDirSync, toPosixPath } from '../util/fs-utils';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[manifest]');

export interface ManifestEntry {
   /**
    * Artifact key: `<siteDir>/<logicalPath>`, POSIX style.
    */
   path: string;

   method: MaterializeMethod;

   /**
    * Fingerprint of the inline content before optimization.
    */
   inputFingerprint?: string;

   /**
    * Fingerprint of the bytes on disk. Absent for linked artifacts.
    */
   fingerprint?: string;

   writtenAt: string;
}

export interface ManifestFile {
   version: 1;
   entries: Record<string, ManifestEntry>;
}

function emptyManifest(): ManifestFile {
   return { version: 1, entries: {} };
}

function isManifestFile(value: unknown): value is ManifestFile {
   if (typeof value !== 'object' || value === null) return false;
   if (!('version' in value) || value.version !== 1) return false;
   if (!('entries' in value)) return false;
   return typeof value.entries === 'object' && value.entries !== null;
}

/**
 * Persisted record of what each artifact was last written from.
 * One file per build profile.
 *
 * `save()` keeps only the entries recorded since `load()`, so artifacts a
 * build no longer produces drop out of the manifest.
 */
export class BuildManifest {
   private manifest: ManifestFile = emptyManifest();
   private readonly recorded = new Set<string>();

   constructor(private readonly manifestPath: string) { }

   static forProfile(dataRoot: string, profile: string): BuildManifest {
      return new BuildManifest(
         path.resolve(dataRoot, 'cache', `manifest-${profile}.json`),
      );
   }

   get filePath(): string {
      return this.manifestPath;
   }

   load(): void {
      this.recorded.clear();
      if (!fs.existsSync(this.manifestPath)) {
         this.manifest = emptyManifest();
         return;
      }

      try {
         const raw = fs.readFileSync(this.manifestPath, 'utf8');
         const parsed: unknown = JSON.parse(raw);
         if (isManifestFile(parsed)) {
            this.manifest = parsed;
         } else {
            logger.warn('Manifest version mismatch or invalid, starting empty.');
            this.manifest = emptyManifest();
         }
      } catch (err) {
         logger.warn('Failed to read manifest, starting empty.', err);
         this.manifest = emptyManifest();
      }
   }

   save(): void {
      for (const key of Object.keys(this.manifest.entries)) {
         if (!this.recorded.has(key)) delete this.manifest.entries[key];
      }

      ensureDirSync(path.dirname(this.manifestPath));
      fs.writeFileSync(
         this.manifestPath,
         JSON.stringify(this.manifest, null, 2),
         'utf8',
      );
   }

   get(key: string): ManifestEntry | undefined {
      return this.manifest.entries[toPosixPath(key)];
   }

   set(entry: ManifestEntry): void {
      const key = toPosixPath(entry.path);
      this.manifest.entries[key] = { ...entry, path: key };
      this.recorded.add(key);
   }

   entries(): ManifestEntry[] {
      return Object.values(this.manifest.entries);
   }
}
