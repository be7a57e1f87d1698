// src/core/watcher.ts

import path from 'path';
import { watch, type FSWatcher } from 'chokidar';
import { runOnce, type RunOptions } from './runner';
import { loadConfig } from './config-loader';
import { defaultLogger, type Logger } from '../util/logger';

export const WATCHED_DIRS = ['content', 'templates', 'static'];

export interface WatchOptions extends RunOptions {
    /**
     * Debounce delay in milliseconds between detected changes
     * and a rebuild.
     *
     * Default: 150 ms
     */
    debounceMs?: number;

    /**
     * Optional logger; falls back to defaultLogger.child('[watch]').
     */
    logger?: Logger;
}

/**
 * Watch the config file and the data root's content/, templates/ and
 * static/ directories, rebuilding on changes.
 *
 * Runs never overlap: a change during a build schedules exactly one
 * follow-up build. The returned watcher can be closed to stop watching.
 */
export function watchSites(cwd: string, options: WatchOptions = {}): FSWatcher {
    const logger = options.logger ?? defaultLogger.child('[watch]');
    const debounceMs = options.debounceMs ?? 150;

    const config = loadConfig(cwd, { configPath: options.configPath, profile: options.profile });
    const targets = [
        config.configPath,
        ...WATCHED_DIRS.map((dir) => path.join(config.dataRoot, dir)),
    ];

    logger.info(`Watching ${targets.join(', ')}`);

    let timer: NodeJS.Timeout | undefined;
    let running = false;
    let pending = false;

    async function run() {
        if (running) {
            pending = true;
            return;
        }
        running = true;
        try {
            logger.info('Change detected → rebuilding...');
            await runOnce(cwd, options);
            logger.info('Build completed');
        } catch (err) {
            logger.error('Build failed:', err);
        } finally {
            running = false;
            if (pending) {
                pending = false;
                timer = setTimeout(() => void run(), debounceMs);
            }
        }
    }

    function scheduleRun() {
        if (timer) clearTimeout(timer);
        timer = setTimeout(() => void run(), debounceMs);
    }

    const watcher = watch(targets, {
        ignoreInitial: true,
        persistent: true,
    });

    watcher
        .on('all', (event, filePath) => {
            logger.debug(`Event ${event} on ${filePath}`);
            scheduleRun();
        })
        .on('error', (error) => {
            logger.error('Watcher error:', error);
        });

    // Initial run
    scheduleRun();

    return watcher;
}
