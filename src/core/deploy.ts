// src/core/deploy.ts

import { spawn } from 'child_process';
import path from 'path';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[sync]');

export interface SyncOptions {
   /** Keep symlinks as links on the target instead of copying what they point at. */
   preserveLinks?: boolean;
}

/**
 * rsync arguments mirroring `sourceDir` into `targetDir`.
 * Both are passed with a trailing slash so contents, not the directory, are synced.
 */
export function buildRsyncArgs(sourceDir: string, targetDir: string, options: SyncOptions = {}): string[] {
   const linkArgs = options.preserveLinks ? ['--links'] : ['--copy-links', '--safe-links'];
   return [
      '--recursive',
      '--times',
      '--perms',
      '--delete',
      ...linkArgs,
      withTrailingSlash(sourceDir),
      withTrailingSlash(targetDir),
   ];
}

function withTrailingSlash(dir: string): string {
   return dir.endsWith('/') ? dir : `${dir}/`;
}

/**
 * Run rsync with inherited stdio. Rejects on a non-zero exit.
 */
export function syncBuild(
   sourceDir: string,
   targetDir: string,
   options: SyncOptions = {},
   command = 'rsync',
): Promise<void> {
   const args = buildRsyncArgs(path.resolve(sourceDir), targetDir, options);
   logger.info(`Syncing ${sourceDir} → ${targetDir}`);
   logger.debug(`${command} ${args.join(' ')}`);

   return new Promise((resolve, reject) => {
      const child = spawn(command, args, { stdio: 'inherit' });
      child.on('error', reject);
      child.on('close', (code) => {
         if (code === 0) {
            resolve();
         } else {
            reject(new Error(`${command} exited with code ${code ?? 'null'}`));
         }
      });
   });
}
