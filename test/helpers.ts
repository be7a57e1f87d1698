// test/helpers.ts

import fs from 'fs';
import os from 'os';
import path from 'path';
import {Logger} from '../src/util/logger';

export const silentLogger = new Logger({level: 'silent'});

export function makeTempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'sitewright-'));
}

export function removeDir(dir: string): void {
    fs.rmSync(dir, {recursive: true, force: true});
}

/**
 * Write a file below root, creating parent directories. Returns the absolute path.
 */
export function writeFile(root: string, rel: string, content: string | Buffer): string {
    const abs = path.join(root, rel);
    fs.mkdirSync(path.dirname(abs), {recursive: true});
    fs.writeFileSync(abs, content);
    return abs;
}

export function setMtime(file: string, date: Date): void {
    fs.utimesSync(file, date, date);
}
