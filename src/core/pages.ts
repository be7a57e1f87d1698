// src/core/pages.ts

import path from 'path';
import type { SiteConfig } from '../schema';
import { inlineSource } from '../schema/target';
import type { Logger } from '../util/logger';
import type { ArtifactWriter } from './artifact-writer';
import { readContent, type PageContent } from './content';
import type { MarkdownCapability } from './markdown';
import { renderPlaceholders, type TemplateParams, type TemplateRenderer } from './render';
import type { StructureTree } from './structure-tree';

export const PAGE_TEMPLATE = 'page.html';
export const PAGE_DESTINATION = '{{ slug }}.html';

const IMPRINT_HEAD = '<meta name="robots" content="noindex, follow">';
const BREADCRUMB_WITH_WEIGHT = /^(.+?)\s+(-?\d+)$/;

/**
 * Everything page generation needs from the running site build.
 */
export interface SiteContext {
   site: SiteConfig;
   siteDir: string;
   dataRoot: string;
   tree: StructureTree;
   writer: ArtifactWriter;
   renderer: TemplateRenderer;
   markdown: MarkdownCapability;
   /** Shared template parameters of the site. */
   params: TemplateParams;
   logger: Logger;
}

export interface GeneratedPage extends PageContent {
   /** Site-relative output path, e.g. "teaching.html". */
   dstPath: string;
   selfPath?: string;
}

/**
 * "/teaching.html" → "/teaching", "/index.html" → "", "/a/index.html" → "/a".
 */
export function selfPathFor(dstPath: string): string {
   let selfPath = '/' + dstPath;
   if (selfPath.endsWith('.html')) selfPath = selfPath.slice(0, -'.html'.length);
   if (selfPath.endsWith('index')) selfPath = selfPath.slice(0, -'index'.length);
   if (selfPath.endsWith('/')) selfPath = selfPath.slice(0, -1);
   return selfPath;
}

/**
 * "research/projects 5" → breadcrumb + weight; a missing weight is 0.
 */
export function parseBreadcrumb(value: string): { breadcrumb: string; weight: number } {
   const match = BREADCRUMB_WITH_WEIGHT.exec(value.trim());
   if (!match) return { breadcrumb: value.trim(), weight: 0 };
   return { breadcrumb: match[1], weight: Number(match[2]) };
}

function stripHtml(dstPath: string): string {
   return dstPath.endsWith('.html') ? dstPath.slice(0, -'.html'.length) : dstPath;
}

/**
 * Render content files through a template, write them and register them
 * in the navigation tree.
 *
 * Returns the pages newest first.
 */
export async function makePages(
   files: string[],
   ctx: SiteContext,
   destination = PAGE_DESTINATION,
   templateId = PAGE_TEMPLATE,
): Promise<GeneratedPage[]> {
   const pages: GeneratedPage[] = [];

   for (const file of files) {
      const baseName = path.basename(file);
      if (/^\d/.test(baseName)) {
         ctx.logger.debug(`Skipping ${baseName}: name starts with a digit`);
         continue;
      }

      // eslint-disable-next-line no-await-in-loop
      const content = await readContent(file, ctx.markdown, ctx.logger);
      const pageParams: TemplateParams = {
         ...ctx.params,
         ...content.headers,
         date: content.date,
         slug: content.slug,
         content: content.content,
         rfc2822Date: content.rfc2822Date,
         openGraph: content.openGraph,
      };

      const dstPath = renderPlaceholders(destination, pageParams);
      const hidden = baseName.startsWith('_');
      const selfPath = hidden ? undefined : selfPathFor(dstPath);
      const extraHead = dstPath === 'imprint.html' ? [IMPRINT_HEAD] : [];

      const output = ctx.renderer.render(templateId, { ...pageParams, selfPath, extraHead });

      if (!hidden && dstPath !== 'index.html') {
         const header = content.headers.breadcrumb;
         const { breadcrumb, weight } = header
            ? parseBreadcrumb(header)
            : { breadcrumb: stripHtml(dstPath), weight: 0 };

         let title = content.headers.title;
         if (!title) {
            ctx.logger.warn(`${baseName} has no title header, using "${content.slug}"`);
            title = content.slug;
         }

         ctx.tree.insert(title, `${ctx.site.name}/${breadcrumb}`, stripHtml(dstPath), weight);
      }

      // eslint-disable-next-line no-await-in-loop
      await ctx.writer.write({
         siteDir: ctx.siteDir,
         logicalPath: dstPath,
         source: inlineSource(output),
      });

      pages.push({ ...content, dstPath, selfPath });
   }

   return pages.sort((a, b) => (a.date < b.date ? 1 : a.date > b.date ? -1 : 0));
}
