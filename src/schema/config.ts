// src/schema/config.ts

import { z } from 'zod';
import { ACCENT_COLOR_PATTERN } from '../util/color';

export const CONFIG_FILE_NAME = 'sitewright.config.json';

export const DEFAULT_EXTRA_TEMPLATES = ['main.css', 'robots.txt'];

export type Profile = 'dev' | 'prod';

const nonEmpty = z.string().min(1);

/**
 * A JSON-described list of items rendered into one index page plus
 * one page per item.
 */
export const collectionSchema = z.object({
    /**
     * JSON file relative to the data root, e.g. "content/software/projects.json".
     * Top level is an object keyed by item id.
     */
    data: nonEmpty,

    /** Title of the index page and its navigation node. */
    title: nonEmpty,

    /**
     * Route of the index page ("games" → games.html) and breadcrumb
     * segment under which the item pages are inserted.
     */
    urlSegment: z
        .string()
        .regex(/^[A-Za-z0-9_-]+$/, 'urlSegment may only contain letters, digits, "_" and "-"'),

    /** Weight of the index page among the site's children. */
    weight: z.number().int().default(0),

    indexTemplate: nonEmpty,
    itemTemplate: nonEmpty,

    /** open-graph description of the index page. */
    description: z.string().optional(),

    sortBy: z.enum(['title', 'date']).default('title'),
    order: z.enum(['asc', 'desc']).default('asc'),

    /**
     * - 'sequence': items get weights 1, 2, … in sorted order.
     * - 'reverse-date': items get -YYYYMMDD so newer items sort first.
     */
    weighting: z.enum(['sequence', 'reverse-date']).default('sequence'),
});

export const siteSchema = z.object({
    /** Display name; its lower-case form names the site directory. */
    name: nonEmpty,
    hostname: nonEmpty,
    accentColor: z
        .string()
        .regex(ACCENT_COLOR_PATTERN, 'accentColor must look like "#rgb" or "#rrggbb"'),
    /** Title of the site's root node in the structure. Defaults to `name`. */
    navTitle: z.string().optional(),
    collections: z.array(collectionSchema).default([]),
});

/**
 * Per-profile overrides applied on top of the top-level values.
 */
export const profileSchema = z.object({
    protocol: z.string().optional(),
    hostnameSuffix: z.string().optional(),
    targetRoot: z.string().optional(),
    params: z.record(z.unknown()).optional(),
});

export const configSchema = z
    .object({
        /** Root of content/, templates/, static/, cache/ and build/. Relative to the config file. */
        dataRoot: z.string().default('.'),
        protocol: z.string().default('https://'),
        hostnameSuffix: z.string().default(''),
        /** Sync destination. No sync happens when unset. */
        targetRoot: z.string().optional(),

        sites: z.array(siteSchema).min(1, 'at least one site is required'),

        env: z
            .object({
                dev: profileSchema.default({}),
                prod: profileSchema.default({}),
            })
            .default({}),

        /** Free template parameters. */
        params: z.record(z.unknown()).default({}),

        /** Templates rendered verbatim into each site under their own name. */
        extraTemplates: z.array(nonEmpty).default(DEFAULT_EXTRA_TEMPLATES),

        /** File sources above this many bytes are symlinked instead of copied. */
        largeFileThreshold: z.number().int().positive().default(4 * 1024 * 1024),

        stripTitlePrefix: z.string().default('Student Project: '),

        /** Stripped paths left out of sitemap.xml. */
        sitemapExclude: z.array(z.string()).default(['imprint']),

        /** minimatch globs, relative to each static root. */
        staticIgnore: z.array(z.string()).default(['**/.DS_Store']),

        deploy: z
            .object({
                /** Keep symlinks as links on the target instead of copying their contents. */
                preserveLinks: z.boolean().default(false),
            })
            .default({}),
    })
    .superRefine((config, ctx) => {
        const seen = new Set<string>();
        config.sites.forEach((site, index) => {
            const dir = site.name.toLowerCase();
            if (seen.has(dir)) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    path: ['sites', index, 'name'],
                    message: `duplicate site directory "${dir}"`,
                });
            }
            seen.add(dir);
        });
    });

export type CollectionConfig = z.infer<typeof collectionSchema>;
export type SiteConfig = z.infer<typeof siteSchema>;
export type ProfileConfig = z.infer<typeof profileSchema>;

/** Config file contents after validation and defaults. */
export type SitewrightConfig = z.infer<typeof configSchema>;

/** Config file contents as written by hand. */
export type SitewrightConfigInput = z.input<typeof configSchema>;

/**
 * Validated config with the selected profile applied and paths made absolute.
 */
export interface ResolvedConfig {
    profile: Profile;

    /** Absolute path of the config file. */
    configPath: string;

    /** Absolute data root. */
    dataRoot: string;

    protocol: string;
    hostnameSuffix: string;

    /** Absolute sync destination, if any. */
    targetRoot?: string;

    sites: SiteConfig[];
    params: Record<string, unknown>;
    extraTemplates: string[];
    largeFileThreshold: number;
    stripTitlePrefix: string;
    sitemapExclude: string[];
    staticIgnore: string[];
    deploy: { preserveLinks: boolean };
}
