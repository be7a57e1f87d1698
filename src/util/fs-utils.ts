// src/util/fs-utils.ts

import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';

/**
 * Convert any path to a POSIX-style path with forward slashes.
 */
export function toPosixPath(p: string): string {
   return p.replace(/\\/g, '/');
}

/**
 * Ensure a directory exists (like mkdir -p).
 * Returns the absolute path of the directory.
 */
export function ensureDirSync(dirPath: string): string {
   if (!fs.existsSync(dirPath)) {
      fs.mkdirSync(dirPath, { recursive: true });
   }
   return dirPath;
}

function isMissing(err: unknown): boolean {
   return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Get file stats (following symlinks) if the path exists, otherwise null.
 * Errors other than "does not exist" are rethrown.
 */
export function statSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.statSync(targetPath);
   } catch (err) {
      if (isMissing(err)) return null;
      throw err;
   }
}

/**
 * Like statSafeSync, but describes a symlink itself rather than its target.
 */
export function lstatSafeSync(targetPath: string): fs.Stats | null {
   try {
      return fs.lstatSync(targetPath);
   } catch (err) {
      if (isMissing(err)) return null;
      throw err;
   }
}

/**
 * Resolve an absolute path from root + relative path,
 * and assert it stays within the root.
 *
 * Throws if the resolved path escapes the root.
 */
export function resolveInsideRoot(root: string, relPath: string): string {
   const absRoot = path.resolve(root);
   const absTarget = path.resolve(absRoot, relPath);

   const rootWithSep = absRoot.endsWith(path.sep) ? absRoot : absRoot + path.sep;
   if (!absTarget.startsWith(rootWithSep)) {
      throw new Error(
         `Attempted to resolve path outside build root: ` +
         `root="${absRoot}", target="${absTarget}"`,
      );
   }

   return absTarget;
}

/**
 * Recursively list regular files under rootDir as POSIX paths relative to it,
 * sorted, skipping anything matching one of the ignore globs.
 */
export function listFilesRecursive(rootDir: string, ignore: string[] = []): string[] {
   const absRoot = path.resolve(rootDir);
   const out: string[] = [];

   function isIgnored(rel: string): boolean {
      return ignore.some((pattern) => minimatch(rel, pattern, { dot: true }));
   }

   function walk(currentAbs: string) {
      const dirents = fs.readdirSync(currentAbs, { withFileTypes: true });
      dirents.sort((a, b) => a.name.localeCompare(b.name));

      for (const dirent of dirents) {
         const absPath = path.join(currentAbs, dirent.name);
         const rel = toPosixPath(path.relative(absRoot, absPath));
         if (isIgnored(rel)) continue;

         if (dirent.isDirectory()) {
            walk(absPath);
         } else if (dirent.isFile() || dirent.isSymbolicLink()) {
            out.push(rel);
         }
      }
   }

   if (statSafeSync(absRoot)?.isDirectory()) {
      walk(absRoot);
   }
   return out;
}
