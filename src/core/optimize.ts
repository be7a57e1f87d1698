// src/core/optimize.ts

import fs from 'fs';
import { transform as esbuildTransform } from 'esbuild';
import { minify as minifyHtml } from 'html-minifier-terser';
import { optimize as optimizeSvg } from 'svgo';
import type { ArtifactSource } from '../schema/target';
import { TransformError } from '../util/errors';

export type OptimizerKind = 'html' | 'css' | 'js' | 'svg' | 'passthrough';

export interface Optimizer {
   kind: OptimizerKind;
   /**
    * True when output bytes equal input bytes, so artifact size can stand
    * in for source size when checking staleness.
    */
   sizePreserving: boolean;
   transform(input: Buffer): Promise<Buffer>;
}

const STRICT_MARKER = Buffer.from("'use strict';", 'utf8');

export const passthroughOptimizer: Optimizer = {
   kind: 'passthrough',
   sizePreserving: true,
   transform: async (input) => input,
};

export const htmlOptimizer: Optimizer = {
   kind: 'html',
   sizePreserving: false,
   async transform(input) {
      const out = await minifyHtml(input.toString('utf8'), {
         collapseWhitespace: true,
         removeComments: true,
         removeAttributeQuotes: false,
      });
      return Buffer.from(out, 'utf8');
   },
};

export const cssOptimizer: Optimizer = {
   kind: 'css',
   sizePreserving: false,
   async transform(input) {
      const result = await esbuildTransform(input.toString('utf8'), {
         loader: 'css',
         minify: true,
      });
      return Buffer.from(result.code, 'utf8');
   },
};

/**
 * Only sources that opt in with a leading `'use strict';` are minified;
 * everything else is copied verbatim.
 */
export const jsOptimizer: Optimizer = {
   kind: 'js',
   sizePreserving: false,
   async transform(input) {
      if (!hasStrictMarker(input)) return input;
      const result = await esbuildTransform(input.toString('utf8'), {
         loader: 'js',
         minify: true,
      });
      return Buffer.from(result.code, 'utf8');
   },
};

export const svgOptimizer: Optimizer = {
   kind: 'svg',
   sizePreserving: false,
   async transform(input) {
      const result = optimizeSvg(input.toString('utf8'), { multipass: false });
      return Buffer.from(result.data, 'utf8');
   },
};

export function hasStrictMarker(input: Buffer): boolean {
   return (
      input.length >= STRICT_MARKER.length &&
      input.subarray(0, STRICT_MARKER.length).equals(STRICT_MARKER)
   );
}

function normalizeExtension(ext: string): string {
   const lower = ext.toLowerCase();
   return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Registration table mapping file extensions to optimizers.
 *
 * Unregistered extensions fall back to pass-through. The dispatcher does no
 * caching of its own; callers decide when a transform is needed.
 */
export class OptimizationDispatcher {
   private readonly table = new Map<string, Optimizer>();

   constructor(registerDefaults = true) {
      if (registerDefaults) {
         this.register('.html', htmlOptimizer);
         this.register('.css', cssOptimizer);
         this.register('.js', jsOptimizer);
         this.register('.svg', svgOptimizer);
      }
   }

   register(ext: string, optimizer: Optimizer): this {
      this.table.set(normalizeExtension(ext), optimizer);
      return this;
   }

   extensions(): string[] {
      return [...this.table.keys()];
   }

   optimizerFor(ext: string): Optimizer {
      return this.table.get(normalizeExtension(ext)) ?? passthroughOptimizer;
   }

   /**
    * Produce the bytes to write for a source. File sources are read here.
    * Optimizer failures are rethrown as TransformError.
    */
   async transform(source: ArtifactSource, ext: string): Promise<Buffer> {
      const input =
         source.kind === 'file'
            ? fs.readFileSync(source.path)
            : Buffer.isBuffer(source.content)
               ? source.content
               : Buffer.from(source.content, 'utf8');

      const optimizer = this.optimizerFor(ext);
      try {
         return await optimizer.transform(input);
      } catch (err) {
         const label = source.kind === 'file' ? source.path : '<inline>';
         throw new TransformError(normalizeExtension(ext), label, err);
      }
   }
}
