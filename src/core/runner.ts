// src/core/runner.ts

import path from 'path';
import pluralize from 'pluralize';
import {loadConfig} from './config-loader';
import {BuildManifest} from './build-manifest';
import {ArtifactWriter} from './artifact-writer';
import {OptimizationDispatcher} from './optimize';
import {StructureTree} from './structure-tree';
import {flattenSitemap, renderSitemapXml} from './sitemap';
import {createTemplateRenderer, type TemplateParams} from './render';
import {detectMarkdown, type MarkdownCapability} from './markdown';
import {listContentPages} from './content';
import {makePages, type SiteContext} from './pages';
import {buildCollection} from './collections';
import {publishStatic} from './static-assets';
import {buildErrorIllustration, buildFavicons} from './derivatives';
import {syncBuild} from './deploy';
import type {FinalizedStructure, Profile, ResolvedConfig, SiteConfig} from '../schema';
import {inlineSource, type WriteOutcome} from '../schema/target';
import {rfc2822} from '../util/dates';
import type {Logger} from '../util/logger';
import {defaultLogger} from '../util/logger';

const SITEMAP_WEIGHT = 999;
const SITEMAP_DESCRIPTION = 'This is a human-readable complete sitemap for this website.';

export interface RunOptions {
    /**
     * Optional logger override.
     */
    logger?: Logger;

    /**
     * Optional explicit config file (absolute or relative to cwd).
     */
    configPath?: string;

    /**
     * Build profile. Default: 'dev'.
     */
    profile?: Profile;

    /**
     * Mirror the build to the profile's targetRoot afterwards.
     * Has no effect when no targetRoot is configured. Default: true.
     */
    sync?: boolean;

    /**
     * Overrides, mainly for tests.
     */
    markdown?: MarkdownCapability;
    dispatcher?: OptimizationDispatcher;
    now?: Date;
    syncCommand?: string;
}

export interface SiteReport {
    name: string;
    siteDir: string;
    staticFiles: number;
    pages: number;
    collectionItems: number;
    favicons: number;
    illustrations: number;
    sitemapUrls: string[];
}

export interface BuildReport {
    profile: Profile;
    /** Absolute `<dataRoot>/build/<profile>`. */
    buildDir: string;
    outcomes: Readonly<Record<WriteOutcome, number>>;
    sites: SiteReport[];
    structure: FinalizedStructure;
    synced: boolean;
}

function siteBaseUrl(config: ResolvedConfig, site: SiteConfig): string {
    return config.protocol + site.hostname + config.hostnameSuffix;
}

/**
 * Build every configured site once.
 */
export async function runOnce(cwd: string, options: RunOptions = {}): Promise<BuildReport> {
    const logger = options.logger ?? defaultLogger.child('[runner]');
    const config = loadConfig(cwd, {
        configPath: options.configPath,
        profile: options.profile,
    });

    const buildDir = path.join(config.dataRoot, 'build', config.profile);
    const manifest = BuildManifest.forProfile(config.dataRoot, config.profile);
    manifest.load();

    const writer = new ArtifactWriter({
        buildDir,
        manifest,
        dispatcher: options.dispatcher,
        largeFileThreshold: config.largeFileThreshold,
        logger: logger.child('[writer]'),
    });
    const tree = new StructureTree({stripTitlePrefix: config.stripTitlePrefix});
    const renderer = createTemplateRenderer(path.join(config.dataRoot, 'templates'));

    const markdown = options.markdown ?? (await detectMarkdown());
    if (markdown.status === 'unavailable') {
        logger.warn(`Markdown pages will be published unrendered: ${markdown.reason}`);
    }

    const now = options.now ?? new Date();
    const baseParams: TemplateParams = {
        ...config.params,
        protocol: config.protocol,
        hostnameSuffix: config.hostnameSuffix,
        buildTarget: config.profile,
        currentYear: now.getUTCFullYear(),
        rfc2822Now: rfc2822(now),
        fileHash: writer.fileHash,
    };

    logger.info(`Building ${pluralize('site', config.sites.length, true)} (${config.profile})`);

    const contexts: SiteContext[] = [];
    const reports: SiteReport[] = [];

    let weight = 1;
    for (const site of config.sites) {
        const siteDir = site.name.toLowerCase();
        const ctx: SiteContext = {
            site,
            siteDir,
            dataRoot: config.dataRoot,
            tree,
            writer,
            renderer,
            markdown,
            params: {
                ...baseParams,
                siteName: site.name,
                siteDir,
                hostname: site.hostname,
                accentColor: site.accentColor,
                title: site.name,
            },
            logger: logger.child(`[site:${site.name}]`),
        };
        contexts.push(ctx);

        tree.insert(site.navTitle ?? site.name, site.name, siteBaseUrl(config, site), weight);
        tree.insert('Sitemap', `${site.name}/sitemap`, 'sitemap', SITEMAP_WEIGHT);

        // eslint-disable-next-line no-await-in-loop
        const report = await buildSite(ctx, config);
        reports.push(report);
        weight += 1;
    }

    const structure = tree.finalize(true);

    for (const [index, ctx] of contexts.entries()) {
        // eslint-disable-next-line no-await-in-loop
        reports[index].sitemapUrls = await writeSitemaps(ctx, config, structure);
    }

    manifest.save();
    logger.debug(`Saved ${pluralize('manifest entry', manifest.entries().length, true)} to ${manifest.filePath}`);

    const outcomes = writer.summary();
    const total = outcomes.created + outcomes.updated + outcomes.unchanged;
    logger.info(
        `${pluralize('artifact', total, true)}: ${outcomes.created} created, ` +
        `${outcomes.updated} updated, ${outcomes.unchanged} unchanged`,
    );

    let synced = false;
    if ((options.sync ?? true) && config.targetRoot) {
        await syncBuild(buildDir, config.targetRoot, config.deploy, options.syncCommand);
        synced = true;
    } else if (options.sync !== false) {
        logger.debug('No targetRoot configured, skipping sync');
    }

    return {
        profile: config.profile,
        buildDir,
        outcomes,
        sites: reports,
        structure,
        synced,
    };
}

async function buildSite(ctx: SiteContext, config: ResolvedConfig): Promise<SiteReport> {
    ctx.logger.debug(`Building into ${ctx.siteDir}/`);

    const staticFiles = await publishStatic(ctx, config.staticIgnore);

    for (const templateId of config.extraTemplates) {
        const output = ctx.renderer.render(templateId, ctx.params);
        // eslint-disable-next-line no-await-in-loop
        await ctx.writer.write({
            siteDir: ctx.siteDir,
            logicalPath: templateId,
            source: inlineSource(output),
        });
    }

    const pages = await makePages(listContentPages(ctx.dataRoot, ctx.siteDir), ctx);

    let collectionItems = 0;
    for (const collection of ctx.site.collections) {
        // eslint-disable-next-line no-await-in-loop
        const items = await buildCollection(collection, ctx);
        collectionItems += items.length;
    }

    const favicons = await buildFavicons(ctx);
    const illustrations = await buildErrorIllustration(ctx);

    ctx.logger.info(
        `${pluralize('page', pages.length, true)}, ${pluralize('collection item', collectionItems, true)}, ` +
        `${pluralize('static file', staticFiles, true)}`,
    );

    return {
        name: ctx.site.name,
        siteDir: ctx.siteDir,
        staticFiles,
        pages: pages.length,
        collectionItems,
        favicons,
        illustrations,
        sitemapUrls: [],
    };
}

/**
 * sitemap.xml from the site's node plus the collated shared nodes,
 * and the human sitemap page from the whole finalized structure.
 */
async function writeSitemaps(
    ctx: SiteContext,
    config: ResolvedConfig,
    structure: FinalizedStructure,
): Promise<string[]> {
    const siteNode = structure.roots.find((node) => node.key === ctx.site.name);
    const nodes = siteNode ? [siteNode, ...structure.shared] : structure.shared;
    const urls = flattenSitemap(nodes, siteBaseUrl(config, ctx.site) + '/', {
        exclude: config.sitemapExclude,
    });

    const xml = ctx.renderer.has('sitemap.xml')
        ? ctx.renderer.render('sitemap.xml', {...ctx.params, entries: urls})
        : renderSitemapXml(urls);
    await ctx.writer.write({
        siteDir: ctx.siteDir,
        logicalPath: 'sitemap.xml',
        source: inlineSource(xml),
    });

    if (ctx.renderer.has('sitemap.html')) {
        const html = ctx.renderer.render('sitemap.html', {
            ...ctx.params,
            title: 'Sitemap',
            selfPath: '/sitemap',
            openGraph: {description: SITEMAP_DESCRIPTION},
            extraHead: [],
            structure: structure.roots,
        });
        await ctx.writer.write({
            siteDir: ctx.siteDir,
            logicalPath: 'sitemap.html',
            source: inlineSource(html),
        });
    } else {
        ctx.logger.warn('No sitemap.html template, skipping the human sitemap');
    }

    return urls;
}
