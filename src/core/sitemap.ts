// src/core/sitemap.ts

import type { StructureNode } from '../schema/structure';

export interface FlattenOptions {
   /**
    * Stripped paths that are left out together with their subtree.
    */
   exclude?: string[];
}

export const DEFAULT_SITEMAP_EXCLUDE = ['imprint'];

function stripFragment(p: string): string {
   const idx = p.indexOf('#');
   return idx === -1 ? p : p.slice(0, idx);
}

/**
 * Flatten finalized structure nodes into an ordered list of unique URLs,
 * depth-first with parents before their children.
 *
 * Relative paths (no ":") are prefixed with `baseUrl`.
 */
export function flattenSitemap(
   nodes: StructureNode | StructureNode[],
   baseUrl: string,
   options: FlattenOptions = {},
): string[] {
   const exclude = new Set(options.exclude ?? DEFAULT_SITEMAP_EXCLUDE);
   const seen = new Set<string>();
   const urls: string[] = [];

   const visit = (node: StructureNode): void => {
      if (node.path !== undefined) {
         const stripped = stripFragment(node.path);
         if (exclude.has(stripped)) return;

         const url = stripped.includes(':') ? stripped : baseUrl + stripped;
         if (!seen.has(url)) {
            seen.add(url);
            urls.push(url);
         }
      }
      node.children.forEach(visit);
   };

   (Array.isArray(nodes) ? nodes : [nodes]).forEach(visit);
   return urls;
}

function escapeXml(value: string): string {
   return value
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;')
      .replace(/'/g, '&apos;');
}

/**
 * Minimal sitemaps.org document, used when no sitemap.xml template exists.
 */
export function renderSitemapXml(urls: string[]): string {
   const lines = urls.map((url) => `  <url><loc>${escapeXml(url)}</loc></url>`);
   return [
      '<?xml version="1.0" encoding="UTF-8"?>',
      '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
      ...lines,
      '</urlset>',
      '',
   ].join('\n');
}
