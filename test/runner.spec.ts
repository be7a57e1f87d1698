// test/runner.spec.ts

import fs from 'fs';
import path from 'path';
import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {runOnce} from '../src/core/runner';
import {fingerprint} from '../src/core/content-address';
import {renderSitemapXml} from '../src/core/sitemap';
import {makeTempDir, removeDir, silentLogger, writeFile} from './helpers';

const NOW = new Date('2024-06-01T12:00:00Z');

function writeFixture(root: string): void {
    writeFile(
        root,
        'sitewright.config.json',
        JSON.stringify({
            sites: [
                {
                    name: 'Science',
                    hostname: 'science.example.com',
                    accentColor: '#336699',
                    collections: [
                        {
                            data: 'content/science/projects.json',
                            title: 'Projects',
                            urlSegment: 'projects',
                            weight: 5,
                            indexTemplate: 'projects.html',
                            itemTemplate: 'project.html',
                        },
                    ],
                },
                {name: 'Media', hostname: 'media.example.com', accentColor: '#a33'},
            ],
            env: {dev: {protocol: 'http://', hostnameSuffix: '.localhost'}},
        }),
    );

    writeFile(
        root,
        'templates/page.html',
        '<html><head><title>{{ title }}</title>' +
        '<link rel="stylesheet" href="/main.css?v={{ fileHash[siteDir + \'/main.css\'] }}">' +
        '{% for h in extraHead %}{{ h }}{% endfor %}</head><body>{{ content }}</body></html>',
    );
    writeFile(root, 'templates/main.css', 'body { color: {{ accentColor }}; }\n');
    writeFile(root, 'templates/robots.txt', 'Sitemap: {{ protocol }}{{ hostname }}{{ hostnameSuffix }}/sitemap.xml\n');
    writeFile(root, 'templates/sitemap.html', '<ul>{% for node in structure %}<li>{{ node.title }}</li>{% endfor %}</ul>');
    writeFile(root, 'templates/projects.html', '<ul>{% for item in items %}<li>{{ item.title }}</li>{% endfor %}</ul>');
    writeFile(root, 'templates/project.html', '<h1>{{ item.title }}</h1>');

    writeFile(root, 'content/all/imprint.html', '<!-- title: Imprint -->\n<p>Legal</p>\n');
    writeFile(root, 'content/science/teaching.html', '<!-- title: Teaching -->\n<!-- breadcrumb: teaching 20 -->\n<p>Courses</p>\n');
    writeFile(
        root,
        'content/science/projects.json',
        JSON.stringify({p2: {url_id: 'beta', title: 'Beta'}, p1: {url_id: 'alpha', title: 'Alpha'}}),
    );

    writeFile(root, 'static/all/files/notes.txt', 'hello');
    writeFile(root, 'static/all/.DS_Store', 'junk');
}

describe('runOnce', () => {
    let root: string;

    beforeEach(() => {
        root = makeTempDir();
        writeFixture(root);
    });

    afterEach(() => {
        removeDir(root);
    });

    const build = () => runOnce(root, {logger: silentLogger, now: NOW});

    it('builds every site into build/<profile>/<site>', async () => {
        const report = await build();
        const science = path.join(root, 'build', 'dev', 'science');
        const media = path.join(root, 'build', 'dev', 'media');

        expect(report.profile).toBe('dev');
        expect(report.synced).toBe(false);
        expect(report.outcomes.updated).toBe(0);
        expect(report.outcomes.unchanged).toBe(0);

        expect(fs.readFileSync(path.join(science, 'files', 'notes.txt'), 'utf8')).toBe('hello');
        expect(fs.existsSync(path.join(science, '.DS_Store'))).toBe(false);
        expect(fs.readFileSync(path.join(media, 'robots.txt'), 'utf8')).toBe(
            'Sitemap: http://media.example.com.localhost/sitemap.xml\n',
        );

        const cssHash = fingerprint(fs.readFileSync(path.join(science, 'main.css')));
        expect(fs.readFileSync(path.join(science, 'imprint.html'), 'utf8')).toBe(
            '<html><head><title>Imprint</title>' +
            `<link rel="stylesheet" href="/main.css?v=${cssHash}">` +
            '<meta name="robots" content="noindex, follow"></head><body><p>Legal</p></body></html>',
        );
        expect(fs.readFileSync(path.join(science, 'projects.html'), 'utf8')).toBe(
            '<ul><li>Alpha</li><li>Beta</li></ul>',
        );
        expect(fs.readFileSync(path.join(science, 'alpha.html'), 'utf8')).toBe('<h1>Alpha</h1>');
        expect(fs.existsSync(path.join(root, 'cache', 'manifest-dev.json'))).toBe(true);
    });

    it('collates shared pages and writes sitemaps after finalizing', async () => {
        const report = await build();

        expect(report.structure.roots.map((n) => n.key)).toEqual(['Science', 'Media', 'Sitemap', 'Imprint']);
        expect(report.structure.roots[0].children.map((n) => n.key)).toEqual(['projects', 'teaching']);
        expect(report.structure.roots[1].children).toEqual([]);

        const scienceUrls = [
            'http://science.example.com.localhost',
            'http://science.example.com.localhost/projects',
            'http://science.example.com.localhost/alpha',
            'http://science.example.com.localhost/beta',
            'http://science.example.com.localhost/teaching',
            'http://science.example.com.localhost/sitemap',
        ];
        expect(report.sites[0].sitemapUrls).toEqual(scienceUrls);
        expect(report.sites[1].sitemapUrls).toEqual([
            'http://media.example.com.localhost',
            'http://media.example.com.localhost/sitemap',
        ]);

        const science = path.join(root, 'build', 'dev', 'science');
        expect(fs.readFileSync(path.join(science, 'sitemap.xml'), 'utf8')).toBe(renderSitemapXml(scienceUrls));
        expect(fs.readFileSync(path.join(science, 'sitemap.html'), 'utf8')).toBe(
            '<ul><li>Science</li><li>Media</li><li>Sitemap</li><li>Imprint</li></ul>',
        );
    });

    it('reports every artifact unchanged on a second run', async () => {
        const first = await build();
        const imprint = path.join(root, 'build', 'dev', 'science', 'imprint.html');
        const mtime = fs.statSync(imprint).mtimeMs;

        const second = await build();

        expect(second.outcomes).toEqual({created: 0, updated: 0, unchanged: first.outcomes.created});
        expect(fs.statSync(imprint).mtimeMs).toBe(mtime);
    });

    it('rebuilds only what changed', async () => {
        await build();
        writeFile(
            root,
            'content/science/teaching.html',
            '<!-- title: Teaching -->\n<!-- breadcrumb: teaching 20 -->\n<p>New courses</p>\n',
        );

        const report = await build();

        expect(report.outcomes.updated).toBe(1);
        expect(report.outcomes.created).toBe(0);
        expect(fs.readFileSync(path.join(root, 'build', 'dev', 'science', 'teaching.html'), 'utf8')).toContain(
            '<body><p>New courses</p></body>',
        );
    });

    it('forgets artifacts that are no longer produced', async () => {
        await build();
        const manifestPath = path.join(root, 'cache', 'manifest-dev.json');
        const keys = () => Object.keys(JSON.parse(fs.readFileSync(manifestPath, 'utf8')).entries);
        expect(keys()).toContain('science/teaching.html');

        fs.rmSync(path.join(root, 'content', 'science', 'teaching.html'));
        await build();

        expect(keys()).not.toContain('science/teaching.html');
        expect(keys()).toContain('science/imprint.html');
    });
});

