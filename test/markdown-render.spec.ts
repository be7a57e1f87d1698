// test/markdown-render.spec.ts

import {afterEach, beforeEach, describe, expect, it} from 'vitest';
import {detectMarkdown, isMarkdownFile} from '../src/core/markdown';
import {createTemplateRenderer, renderPlaceholders} from '../src/core/render';
import {makeTempDir, removeDir, writeFile} from './helpers';

describe('detectMarkdown', () => {
    it('renders with the installed library', async () => {
        const markdown = await detectMarkdown();
        if (markdown.status !== 'available') throw new Error(markdown.reason);

        expect(await markdown.render('# Hi')).toBe('<h1>Hi</h1>\n');
    });

    it('reports a loader failure as unavailable', async () => {
        const markdown = await detectMarkdown(async () => {
            throw new Error('Cannot find module');
        });
        expect(markdown).toEqual({status: 'unavailable', reason: 'Cannot find module'});
    });

    it('accepts an asynchronous renderer', async () => {
        const markdown = await detectMarkdown(async () => ({
            marked: {parse: async (src: string) => `<p>${src}</p>`},
        }));
        if (markdown.status !== 'available') throw new Error(markdown.reason);

        expect(await markdown.render('x')).toBe('<p>x</p>');
    });
});

describe('isMarkdownFile', () => {
    it('knows the markdown extensions', () => {
        expect(['a.md', 'a.MKD', 'a.mkdn', 'a.mdown', 'a.markdown'].every(isMarkdownFile)).toBe(true);
        expect(isMarkdownFile('a.html')).toBe(false);
    });
});

describe('renderPlaceholders', () => {
    it('substitutes known names and keeps unknown ones', () => {
        expect(renderPlaceholders('{{ slug }}.html', {slug: 'about'})).toBe('about.html');
        expect(renderPlaceholders('{{slug}}-{{ date }}/{{ missing }}', {slug: 'a', date: '2024-03-01'})).toBe(
            'a-2024-03-01/{{ missing }}',
        );
    });
});

describe('createTemplateRenderer', () => {
    let root: string;

    beforeEach(() => {
        root = makeTempDir();
    });

    afterEach(() => {
        removeDir(root);
    });

    it('renders templates from the directory without escaping', () => {
        writeFile(root, 'base.html', '<title>{{ title }}</title>{% block body %}{% endblock %}');
        writeFile(
            root,
            'page.html',
            '{% extends "base.html" %}{% block body %}{{ content }}{% for h in extraHead %}[{{ h }}]{% endfor %}{% endblock %}',
        );

        const renderer = createTemplateRenderer(root);

        expect(renderer.has('page.html')).toBe(true);
        expect(renderer.has('missing.html')).toBe(false);
        expect(renderer.render('page.html', {title: 'A & B', content: '<p>x</p>', extraHead: ['<meta>']})).toBe(
            '<title>A & B</title><p>x</p>[<meta>]',
        );
    });
});
