// src/core/markdown.ts

import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[markdown]');

export const MARKDOWN_EXTENSIONS = ['.md', '.mkd', '.mkdn', '.mdown', '.markdown'];

/**
 * The part of the markdown library the builder relies on.
 */
export interface MarkdownModule {
   marked: {
      parse(src: string): string | Promise<string>;
   };
}

export type MarkdownCapability =
   | { status: 'available'; render(src: string): Promise<string> }
   | { status: 'unavailable'; reason: string };

export function isMarkdownFile(fileName: string): boolean {
   const lower = fileName.toLowerCase();
   return MARKDOWN_EXTENSIONS.some((ext) => lower.endsWith(ext));
}

/**
 * Check once per run whether markdown can be rendered.
 * A failing loader yields 'unavailable' instead of an error.
 */
export async function detectMarkdown(
   load: () => Promise<MarkdownModule> = () => import('marked'),
): Promise<MarkdownCapability> {
   try {
      const mod = await load();
      return {
         status: 'available',
         render: async (src) => mod.marked.parse(src),
      };
   } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.debug(`Markdown renderer unavailable: ${reason}`);
      return { status: 'unavailable', reason };
   }
}
