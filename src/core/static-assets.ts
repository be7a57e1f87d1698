// src/core/static-assets.ts

import path from 'path';
import { fileSource } from '../schema/target';
import { listFilesRecursive } from '../util/fs-utils';
import type { SiteContext } from './pages';

/**
 * Publish `static/all` and `static/<site>` under the site root, keeping
 * their relative layout. A file in the site tree replaces the shared file
 * at the same path.
 */
export async function publishStatic(ctx: SiteContext, ignore: string[]): Promise<number> {
   const sources = new Map<string, string>();

   for (const tree of ['all', ctx.siteDir]) {
      const root = path.join(ctx.dataRoot, 'static', tree);
      const files = listFilesRecursive(root, ignore);
      ctx.logger.debug(`static/${tree}: ${files.length} file(s)`);

      for (const rel of files) {
         if (sources.has(rel)) ctx.logger.debug(`static/${tree}/${rel} overrides static/all/${rel}`);
         sources.set(rel, path.join(root, rel));
      }
   }

   for (const [rel, abs] of sources) {
      // eslint-disable-next-line no-await-in-loop
      await ctx.writer.write({
         siteDir: ctx.siteDir,
         logicalPath: rel,
         source: fileSource(abs),
      });
   }

   return sources.size;
}
