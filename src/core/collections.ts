// src/core/collections.ts

import fs from 'fs';
import path from 'path';
import type { CollectionConfig } from '../schema';
import { inlineSource } from '../schema/target';
import { dateNumber, parseIsoDate, prettyDate, rfc2822 } from '../util/dates';
import type { Logger } from '../util/logger';
import type { SiteContext } from './pages';

export interface CollectionItem {
   /** Key of the item in the data file. */
   id: string;
   urlId: string;
   title: string;
   date?: string;
   prettyDate?: string;
   rfc2822Date?: string;
   weight: number;
   /** The item's fields as found in the data file. */
   fields: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
   return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readCollectionData(file: string): Record<string, unknown> {
   const raw = fs.readFileSync(file, 'utf8');
   let parsed: unknown;
   try {
      parsed = JSON.parse(raw);
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new Error(`Collection data ${file} is not valid JSON: ${detail}`);
   }
   if (!isRecord(parsed)) {
      throw new Error(`Collection data ${file} must be an object keyed by item id`);
   }
   return parsed;
}

function compareItems(sortBy: CollectionConfig['sortBy']) {
   return (a: CollectionItem, b: CollectionItem): number => {
      const left = sortBy === 'date' ? a.date ?? '' : a.title.toLowerCase();
      const right = sortBy === 'date' ? b.date ?? '' : b.title.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
   };
}

/**
 * Read, validate, sort and weight the items of a collection.
 * Items without `url_id` are skipped; items without `title` fall back to it.
 */
export function loadCollectionItems(
   collection: CollectionConfig,
   dataRoot: string,
   logger: Logger,
): CollectionItem[] {
   const file = path.resolve(dataRoot, collection.data);
   const data = readCollectionData(file);
   const items: CollectionItem[] = [];

   for (const [id, value] of Object.entries(data)) {
      if (!isRecord(value)) {
         logger.warn(`${collection.data}: item "${id}" is not an object, skipping`);
         continue;
      }

      const urlId = value.url_id;
      if (typeof urlId !== 'string' || urlId.length === 0) {
         logger.warn(`${collection.data}: item "${id}" has no url_id, skipping`);
         continue;
      }

      let title = value.title;
      if (typeof title !== 'string' || title.length === 0) {
         logger.warn(`${collection.data}: item "${id}" has no title, using "${urlId}"`);
         title = urlId;
      }

      const item: CollectionItem = { id, urlId, title: String(title), weight: 0, fields: value };

      if (typeof value.date === 'string') {
         try {
            parseIsoDate(value.date);
            item.date = value.date;
            item.prettyDate = prettyDate(value.date);
            item.rfc2822Date = rfc2822(value.date);
         } catch (err) {
            logger.warn(`${collection.data}: item "${id}": ${err instanceof Error ? err.message : String(err)}`);
         }
      }

      items.push(item);
   }

   const compare = compareItems(collection.sortBy);
   items.sort(collection.order === 'desc' ? (a, b) => compare(b, a) : compare);

   items.forEach((item, index) => {
      item.weight =
         collection.weighting === 'reverse-date'
            ? item.date ? -dateNumber(item.date) : 0
            : index + 1;
   });

   return items;
}

/**
 * Render a collection's index page and one page per item.
 */
export async function buildCollection(
   collection: CollectionConfig,
   ctx: SiteContext,
): Promise<CollectionItem[]> {
   const items = loadCollectionItems(collection, ctx.dataRoot, ctx.logger);
   const { urlSegment } = collection;

   const indexOutput = ctx.renderer.render(collection.indexTemplate, {
      ...ctx.params,
      title: collection.title,
      selfPath: `/${urlSegment}`,
      openGraph: collection.description ? { description: collection.description } : {},
      extraHead: [],
      items: items.map(templateItem),
   });
   ctx.tree.insert(collection.title, `${ctx.site.name}/${urlSegment}`, urlSegment, collection.weight);
   await ctx.writer.write({
      siteDir: ctx.siteDir,
      logicalPath: `${urlSegment}.html`,
      source: inlineSource(indexOutput),
   });

   for (const item of items) {
      const summary = item.fields.summary;
      const output = ctx.renderer.render(collection.itemTemplate, {
         ...ctx.params,
         title: item.title,
         selfPath: `/${item.urlId}`,
         openGraph: typeof summary === 'string' ? { description: summary } : {},
         extraHead: [],
         item: templateItem(item),
      });
      ctx.tree.insert(item.title, `${ctx.site.name}/${urlSegment}/${item.urlId}`, item.urlId, item.weight);
      // eslint-disable-next-line no-await-in-loop
      await ctx.writer.write({
         siteDir: ctx.siteDir,
         logicalPath: `${item.urlId}.html`,
         source: inlineSource(output),
      });
   }

   return items;
}

function templateItem(item: CollectionItem): Record<string, unknown> {
   return {
      ...item.fields,
      title: item.title,
      urlId: item.urlId,
      prettyDate: item.prettyDate,
      rfc2822Date: item.rfc2822Date,
   };
}
