// src/core/render.ts

import fs from 'fs';
import path from 'path';
import { Environment, FileSystemLoader } from 'nunjucks';

export type TemplateParams = Record<string, unknown>;

/**
 * Renders a named template with a parameter map.
 */
export interface TemplateRenderer {
   render(templateId: string, params: TemplateParams): string;
   has(templateId: string): boolean;
}

/**
 * nunjucks environment over `templatesDir`. Output is not autoescaped:
 * page content is already HTML.
 */
export function createTemplateRenderer(templatesDir: string): TemplateRenderer {
   const env = new Environment(
      new FileSystemLoader(templatesDir, { noCache: true }),
      { autoescape: false },
   );

   return {
      render: (templateId, params) => env.render(templateId, params),
      has: (templateId) => fs.existsSync(path.join(templatesDir, templateId)),
   };
}

const PLACEHOLDER = /{{\s*([^}\s]+)\s*}}/g;

/**
 * Replace `{{ name }}` placeholders with values from params.
 * Unknown names are left as they are.
 */
export function renderPlaceholders(template: string, params: TemplateParams): string {
   return template.replace(PLACEHOLDER, (match: string, name: string) => {
      const value = params[name];
      return value === undefined ? match : String(value);
   });
}
