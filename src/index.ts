// src/index.ts

export * from './schema';

export { fingerprint } from './core/content-address';
export {
   OptimizationDispatcher,
   type Optimizer,
   type OptimizerKind,
} from './core/optimize';
export { BuildManifest, type ManifestEntry } from './core/build-manifest';
export {
   ArtifactWriter,
   DEFAULT_LARGE_FILE_THRESHOLD,
   type ArtifactWriterOptions,
} from './core/artifact-writer';
export { StructureTree, type StructureTreeOptions } from './core/structure-tree';
export { flattenSitemap, renderSitemapXml, type FlattenOptions } from './core/sitemap';
export { loadConfig, parseConfig, resolveProfile, type LoadConfigOptions } from './core/config-loader';
export { detectMarkdown, type MarkdownCapability } from './core/markdown';
export { createTemplateRenderer, renderPlaceholders, type TemplateRenderer } from './core/render';
export { readContent, readHeaders, listContentPages, type PageContent } from './core/content';
export { makePages, type SiteContext, type GeneratedPage } from './core/pages';
export { buildCollection, loadCollectionItems, type CollectionItem } from './core/collections';
export { publishStatic } from './core/static-assets';
export { buildErrorIllustration, buildFavicons, parseAccentColor } from './core/derivatives';
export { cleanBuild } from './core/clean';
export { buildRsyncArgs, syncBuild, type SyncOptions } from './core/deploy';
export { runOnce, type RunOptions, type BuildReport, type SiteReport } from './core/runner';
export { watchSites, type WatchOptions } from './core/watcher';

export { ConfigError, TransformError, DuplicateArtifactError } from './util/errors';
export { Logger, defaultLogger, type LogLevel } from './util/logger';
