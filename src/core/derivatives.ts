// src/core/derivatives.ts

import fs from 'fs';
import path from 'path';
import sharp from 'sharp';
import { fileSource } from '../schema/target';
import { parseAccentColor, type Rgb } from '../util/color';
import { ensureDirSync } from '../util/fs-utils';
import type { SiteContext } from './pages';

export { parseAccentColor };

export const FAVICON_SIZES = [32, 128, 152, 167, 180, 192, 196, 600];
export const FAVICON_ICO_SIZES = [16, 24, 32];
export const FAVICON_TEMPLATE = 'favicon.png';

export const ERROR_404_BASE = 'error_404_base.png';
export const ERROR_404_OVERLAY = 'error_404_overlay.png';

const ICO_HEADER_SIZE = 6;
const ICO_ENTRY_SIZE = 16;

function tint(image: sharp.Sharp, color: Rgb): sharp.Sharp {
   return image
      .ensureAlpha()
      .linear([color.r / 255, color.g / 255, color.b / 255, 1], [0, 0, 0, 0]);
}

/**
 * Multiply every pixel channel by the tint colour; alpha is kept.
 */
export async function tintImage(sourcePath: string, targetPath: string, color: Rgb): Promise<void> {
   await tint(sharp(sourcePath), color).png().toFile(targetPath);
}

export async function resizeSquare(sourcePath: string, targetPath: string, size: number): Promise<void> {
   await sharp(sourcePath)
      .resize(size, size, { kernel: 'lanczos3' })
      .png()
      .toFile(targetPath);
}

/**
 * ICO container with one PNG-compressed image per entry.
 */
export function encodeIco(images: { size: number; png: Buffer }[]): Buffer {
   const header = Buffer.alloc(ICO_HEADER_SIZE);
   header.writeUInt16LE(0, 0);
   header.writeUInt16LE(1, 2);
   header.writeUInt16LE(images.length, 4);

   let offset = ICO_HEADER_SIZE + ICO_ENTRY_SIZE * images.length;
   const entries = images.map(({ size, png }) => {
      const entry = Buffer.alloc(ICO_ENTRY_SIZE);
      // 0 stands for 256
      entry.writeUInt8(size >= 256 ? 0 : size, 0);
      entry.writeUInt8(size >= 256 ? 0 : size, 1);
      entry.writeUInt8(0, 2);
      entry.writeUInt8(0, 3);
      entry.writeUInt16LE(1, 4);
      entry.writeUInt16LE(32, 6);
      entry.writeUInt32LE(png.length, 8);
      entry.writeUInt32LE(offset, 12);
      offset += png.length;
      return entry;
   });

   return Buffer.concat([header, ...entries, ...images.map((image) => image.png)]);
}

async function writeIco(sourcePath: string, targetPath: string): Promise<void> {
   const images = await Promise.all(
      FAVICON_ICO_SIZES.map(async (size) => ({
         size,
         png: await sharp(sourcePath)
            .resize(size, size, { kernel: 'lanczos3' })
            .png()
            .toBuffer(),
      })),
   );
   fs.writeFileSync(targetPath, encodeIco(images));
}

/**
 * Tinted favicons in the persisted cache, published as favicon.ico and
 * assets/favicon-<size>.png.
 *
 * Cached files are reused as they are; delete `cache/favicon` after
 * changing a site's accent colour or the favicon template.
 *
 * Returns the number of published files (0 without a favicon template).
 */
export async function buildFavicons(ctx: SiteContext): Promise<number> {
   const template = path.join(ctx.dataRoot, 'templates', FAVICON_TEMPLATE);
   if (!fs.existsSync(template)) {
      ctx.logger.debug(`No ${FAVICON_TEMPLATE} template, skipping favicons`);
      return 0;
   }

   const color = parseAccentColor(ctx.site.accentColor);
   const cacheDir = ensureDirSync(path.join(ctx.dataRoot, 'cache', 'favicon'));

   const original = path.join(cacheDir, `${ctx.site.name}-original.png`);
   if (!fs.existsSync(original)) {
      ctx.logger.debug(`Tinting favicon for ${ctx.site.name} with ${ctx.site.accentColor}`);
      await tintImage(template, original, color);
   }

   const ico = path.join(cacheDir, `${ctx.site.name}.ico`);
   if (!fs.existsSync(ico)) {
      await writeIco(original, ico);
   }
   await ctx.writer.write({
      siteDir: ctx.siteDir,
      logicalPath: 'favicon.ico',
      source: fileSource(ico),
   });

   for (const size of FAVICON_SIZES) {
      const cached = path.join(cacheDir, `${ctx.site.name}-${size}.png`);
      if (!fs.existsSync(cached)) {
         // eslint-disable-next-line no-await-in-loop
         await resizeSquare(original, cached, size);
      }
      // eslint-disable-next-line no-await-in-loop
      await ctx.writer.write({
         siteDir: ctx.siteDir,
         logicalPath: `assets/favicon-${size}.png`,
         source: fileSource(cached),
      });
   }

   return FAVICON_SIZES.length + 1;
}

/**
 * The 404 illustration: the overlay tinted with the accent colour and
 * composited onto the base, published as assets/error_404.png and .webp.
 *
 * Returns the number of published files (0 without both templates).
 */
export async function buildErrorIllustration(ctx: SiteContext): Promise<number> {
   const templates = path.join(ctx.dataRoot, 'templates');
   const basePath = path.join(templates, ERROR_404_BASE);
   const overlayPath = path.join(templates, ERROR_404_OVERLAY);
   if (!fs.existsSync(basePath) || !fs.existsSync(overlayPath)) {
      ctx.logger.debug(`No ${ERROR_404_BASE}/${ERROR_404_OVERLAY} templates, skipping the 404 illustration`);
      return 0;
   }

   const cacheDir = ensureDirSync(path.join(ctx.dataRoot, 'cache', 'illustrations'));
   const stem = path.join(cacheDir, `error-404-${ctx.site.name}`);

   const full = `${stem}-full.png`;
   if (!fs.existsSync(full)) {
      const overlay = await tint(sharp(overlayPath), parseAccentColor(ctx.site.accentColor))
         .png()
         .toBuffer();
      await sharp(basePath)
         .ensureAlpha()
         .composite([{ input: overlay }])
         .png()
         .toFile(full);
   }

   const png = `${stem}-optimized.png`;
   if (!fs.existsSync(png)) {
      await sharp(full).png({ palette: true, colours: 256, dither: 0 }).toFile(png);
   }

   const webp = `${stem}-optimized.webp`;
   if (!fs.existsSync(webp)) {
      await sharp(full).webp({ preset: 'drawing', quality: 55, effort: 6 }).toFile(webp);
   }

   await ctx.writer.write({
      siteDir: ctx.siteDir,
      logicalPath: 'assets/error_404.png',
      source: fileSource(png),
   });
   await ctx.writer.write({
      siteDir: ctx.siteDir,
      logicalPath: 'assets/error_404.webp',
      source: fileSource(webp),
   });

   return 2;
}
