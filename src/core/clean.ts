// src/core/clean.ts

import fs from 'fs';
import path from 'path';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[clean]');

/**
 * Remove everything inside `<dataRoot>/build`, keeping the directory itself.
 * Returns the number of removed top-level entries.
 */
export function cleanBuild(dataRoot: string): number {
   const buildDir = path.join(dataRoot, 'build');
   if (!fs.existsSync(buildDir)) {
      logger.debug(`Nothing to clean, ${buildDir} does not exist`);
      return 0;
   }

   const names = fs.readdirSync(buildDir);
   for (const name of names) {
      fs.rmSync(path.join(buildDir, name), { recursive: true, force: true });
   }

   logger.info(`Removed ${names.length} entr${names.length === 1 ? 'y' : 'ies'} from ${buildDir}`);
   return names.length;
}
