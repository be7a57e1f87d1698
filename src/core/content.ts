// src/core/content.ts

import fs from 'fs';
import path from 'path';
import { rfc2822 } from '../util/dates';
import type { Logger } from '../util/logger';
import { defaultLogger } from '../util/logger';
import { isMarkdownFile, MARKDOWN_EXTENSIONS, type MarkdownCapability } from './markdown';

export const PAGE_EXTENSIONS = ['.html', ...MARKDOWN_EXTENSIONS];

const HEADER_OR_LINE = /\s*<!--\s*(.+?)\s*:\s+(.+?)\s*-->\s*|.+/g;
const DATE_SLUG = /^(?:(\d\d\d\d-\d\d-\d\d)-)?(.+)$/;
const DEFAULT_DATE = '1970-01-01';

export interface PageContent {
   /** Absolute source path. */
   sourcePath: string;

   /** "YYYY-MM-DD" from the filename, or 1970-01-01. */
   date: string;
   slug: string;

   /** Leading `<!-- key: value -->` headers in order of appearance. */
   headers: Record<string, string>;

   /** `og:*` headers without their prefix. */
   openGraph: Record<string, string>;

   /** Body after the headers; rendered to HTML for markdown sources. */
   content: string;

   rfc2822Date: string;
}

export interface ParsedHeaders {
   headers: Record<string, string>;
   /** Offset of the first character after the last header. */
   end: number;
}

/**
 * Read leading `<!-- key: value -->` comments.
 * Parsing stops at the first line that is not a header.
 */
export function readHeaders(text: string): ParsedHeaders {
   const headers: Record<string, string> = {};
   let end = 0;

   for (const match of text.matchAll(HEADER_OR_LINE)) {
      const [whole, key, value] = match;
      if (key === undefined || value === undefined) break;
      headers[key] = value;
      end = (match.index ?? 0) + whole.length;
   }

   return { headers, end };
}

/**
 * Split "2024-03-01-hello.md" into date and slug.
 * Everything after the first "." of the basename is ignored.
 */
export function parseDateSlug(fileName: string): { date: string; slug: string } {
   const stem = path.basename(fileName).split('.')[0];
   const match = DATE_SLUG.exec(stem);
   if (!match) {
      throw new Error(`Cannot derive a slug from "${fileName}"`);
   }
   return { date: match[1] ?? DEFAULT_DATE, slug: match[2] };
}

export async function readContent(
   filePath: string,
   markdown: MarkdownCapability,
   logger: Logger = defaultLogger.child('[content]'),
): Promise<PageContent> {
   const text = fs.readFileSync(filePath, 'utf8');
   const { date, slug } = parseDateSlug(filePath);
   const { headers, end } = readHeaders(text);

   let content = text.slice(end);
   if (isMarkdownFile(filePath)) {
      if (markdown.status === 'available') {
         content = await markdown.render(content);
      } else {
         logger.warn(`Cannot render Markdown in ${filePath}: ${markdown.reason}`);
      }
   }

   const openGraph: Record<string, string> = {};
   for (const [key, value] of Object.entries(headers)) {
      if (key.startsWith('og:')) {
         openGraph[key.slice(3)] = value;
      }
   }

   return {
      sourcePath: filePath,
      date,
      slug,
      headers,
      openGraph,
      content,
      rfc2822Date: rfc2822(date),
   };
}

function listPageFiles(dir: string): string[] {
   if (!fs.existsSync(dir)) return [];
   return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((d) => d.isFile())
      .map((d) => d.name)
      .filter((name) => !name.endsWith('.include.html'))
      .filter((name) => PAGE_EXTENSIONS.includes(path.extname(name).toLowerCase()))
      .sort();
}

/**
 * Content pages for a site: `content/<site>` first, then `content/all`
 * files whose name the site does not override.
 */
export function listContentPages(dataRoot: string, siteDir: string): string[] {
   const siteContent = path.join(dataRoot, 'content', siteDir);
   const sharedContent = path.join(dataRoot, 'content', 'all');

   const own = listPageFiles(siteContent);
   const ownNames = new Set(own);
   const shared = listPageFiles(sharedContent).filter((name) => !ownNames.has(name));

   return [
      ...own.map((name) => path.join(siteContent, name)),
      ...shared.map((name) => path.join(sharedContent, name)),
   ];
}
