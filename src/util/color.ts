// src/util/color.ts

import { ConfigError } from './errors';

export const ACCENT_COLOR_PATTERN = /^#(?:[0-9a-f]{3}|[0-9a-f]{6})$/i;

export interface Rgb {
   r: number;
   g: number;
   b: number;
}

/**
 * Parse "#abc" or "#aabbcc" into channel values 0..255.
 */
export function parseAccentColor(value: string): Rgb {
   if (!ACCENT_COLOR_PATTERN.test(value)) {
      throw new ConfigError(`Failed to parse accent color: ${value}`);
   }

   let hex = value.slice(1);
   if (hex.length === 3) {
      hex = hex
         .split('')
         .map((c) => c + c)
         .join('');
   }

   return {
      r: parseInt(hex.slice(0, 2), 16),
      g: parseInt(hex.slice(2, 4), 16),
      b: parseInt(hex.slice(4, 6), 16),
   };
}
