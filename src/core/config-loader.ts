// src/core/config-loader.ts

import fs from 'fs';
import path from 'path';
import type { ZodError } from 'zod';

import {
   CONFIG_FILE_NAME,
   configSchema,
   type Profile,
   type ResolvedConfig,
   type SitewrightConfig,
} from '../schema';
import { ConfigError } from '../util/errors';
import { defaultLogger } from '../util/logger';

const logger = defaultLogger.child('[config]');

export interface LoadConfigOptions {
   /**
    * Optional explicit config file path (absolute or relative to cwd).
    * If not provided, we look for sitewright.config.json in cwd.
    */
   configPath?: string;

   /**
    * Build profile to apply. Defaults to 'dev'.
    */
   profile?: Profile;
}

/**
 * Locate, parse and validate the config, then apply the selected profile.
 *
 * Resolution rules:
 * - dataRoot and targetRoot are resolved relative to the config file.
 * - env.<profile> overrides protocol, hostnameSuffix and targetRoot;
 *   its params are merged over the top-level params.
 *
 * Any problem is reported as a ConfigError before anything is built.
 */
export function loadConfig(cwd: string, options: LoadConfigOptions = {}): ResolvedConfig {
   const absCwd = path.resolve(cwd);
   const configPath = options.configPath
      ? path.resolve(absCwd, options.configPath)
      : resolveConfigPath(absCwd);

   const config = parseConfig(readConfigFile(configPath), configPath);
   const resolved = resolveProfile(config, options.profile ?? 'dev', configPath);

   logger.debug(
      `Loaded config: configPath=${configPath}, dataRoot=${resolved.dataRoot}, profile=${resolved.profile}`,
   );

   return resolved;
}

function resolveConfigPath(cwd: string): string {
   const full = path.join(cwd, CONFIG_FILE_NAME);
   if (fs.existsSync(full)) {
      return full;
   }
   throw new ConfigError(`Could not find ${CONFIG_FILE_NAME} in ${cwd}`);
}

function readConfigFile(configPath: string): unknown {
   let raw: string;
   try {
      raw = fs.readFileSync(configPath, 'utf8');
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Cannot read config ${configPath}: ${detail}`);
   }

   try {
      return JSON.parse(raw);
   } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      throw new ConfigError(`Config ${configPath} is not valid JSON: ${detail}`);
   }
}

/**
 * Validate raw config data and fill in defaults.
 */
export function parseConfig(data: unknown, label = CONFIG_FILE_NAME): SitewrightConfig {
   const result = configSchema.safeParse(data);
   if (!result.success) {
      throw new ConfigError(`Invalid config ${label}:\n${formatIssues(result.error)}`);
   }
   return result.data;
}

function formatIssues(error: ZodError): string {
   return error.issues
      .map((issue) => {
         const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
         return `  - ${where}: ${issue.message}`;
      })
      .join('\n');
}

/**
 * Apply a profile to a validated config.
 */
export function resolveProfile(
   config: SitewrightConfig,
   profile: Profile,
   configPath: string,
): ResolvedConfig {
   const configDir = path.dirname(path.resolve(configPath));
   const overrides = config.env[profile];
   const targetRoot = overrides.targetRoot ?? config.targetRoot;

   return {
      profile,
      configPath: path.resolve(configPath),
      dataRoot: path.resolve(configDir, config.dataRoot),
      protocol: overrides.protocol ?? config.protocol,
      hostnameSuffix: overrides.hostnameSuffix ?? config.hostnameSuffix,
      targetRoot: targetRoot !== undefined ? path.resolve(configDir, targetRoot) : undefined,
      sites: config.sites,
      params: { ...config.params, ...overrides.params },
      extraTemplates: config.extraTemplates,
      largeFileThreshold: config.largeFileThreshold,
      stripTitlePrefix: config.stripTitlePrefix,
      sitemapExclude: config.sitemapExclude,
      staticIgnore: config.staticIgnore,
      deploy: config.deploy,
   };
}
