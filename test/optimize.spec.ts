// test/optimize.spec.ts

import {describe, it, expect} from 'vitest';
import {OptimizationDispatcher, hasStrictMarker, type Optimizer} from '../src/core/optimize';
import {TransformError} from '../src/util/errors';

const inline = (content: string) => ({kind: 'inline' as const, content});

describe('OptimizationDispatcher', () => {
    const dispatcher = new OptimizationDispatcher();

    it('registers html, css, js and svg by default', () => {
        expect(dispatcher.extensions()).toEqual(['.html', '.css', '.js', '.svg']);
    });

    it('minifies html: collapses whitespace and drops comments', async () => {
        const out = await dispatcher.transform(
            inline('<div>\n  <p>Hi</p>\n  <!-- note -->\n</div>\n'),
            '.html',
        );
        expect(out.toString('utf8')).toBe('<div><p>Hi</p></div>');
    });

    it('keeps attribute quotes in html', async () => {
        const out = await dispatcher.transform(inline('<a href="x" class="y">z</a>'), '.html');
        expect(out.toString('utf8')).toBe('<a href="x" class="y">z</a>');
    });

    it('minifies css', async () => {
        const out = await dispatcher.transform(inline('.a {\n  margin: 0 ;\n}\n'), '.css');
        expect(out.toString('utf8')).toBe('.a{margin:0}\n');
    });

    it('leaves javascript without the strict marker untouched', async () => {
        const source = 'var  legacy = 1;\n\n// keep me\n';
        const out = await dispatcher.transform(inline(source), '.js');
        expect(out.toString('utf8')).toBe(source);
    });

    it('minifies javascript that starts with the strict marker', async () => {
        const source = "'use strict';\nfunction add(first, second) {\n  return first + second;\n}\n";
        const out = (await dispatcher.transform(inline(source), '.js')).toString('utf8');
        expect(out).toMatch(/^['"]use strict['"];function add\((\w),(\w)\)\{return \1\+\2\}\n$/);
    });

    it('strips comments from svg', async () => {
        const source =
            '<svg xmlns="http://www.w3.org/2000/svg">\n  <!-- icon -->\n  <circle cx="5" cy="5" r="5"/>\n</svg>\n';
        const out = (await dispatcher.transform(inline(source), '.svg')).toString('utf8');
        expect(out).not.toContain('<!--');
        expect(out.length).toBeLessThan(source.length);
    });

    it('passes unknown extensions through', async () => {
        const bytes = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
        const out = await dispatcher.transform({kind: 'inline', content: bytes}, '.png');
        expect(out.equals(bytes)).toBe(true);
        expect(dispatcher.optimizerFor('.png').sizePreserving).toBe(true);
        expect(dispatcher.optimizerFor('.HTML').kind).toBe('html');
    });

    it('wraps optimizer failures in TransformError', async () => {
        const failing: Optimizer = {
            kind: 'passthrough',
            sizePreserving: false,
            transform: async () => {
                throw new Error('boom');
            },
        };
        const custom = new OptimizationDispatcher(false).register('txt', failing);

        expect(custom.extensions()).toEqual(['.txt']);
        await expect(custom.transform(inline('x'), '.txt')).rejects.toBeInstanceOf(TransformError);
        await expect(custom.transform(inline('x'), '.txt')).rejects.toThrow(
            'Failed to optimize <inline> (.txt): boom',
        );
    });
});

describe('hasStrictMarker', () => {
    it('only matches the marker at the very start', () => {
        expect(hasStrictMarker(Buffer.from("'use strict';\nx()"))).toBe(true);
        expect(hasStrictMarker(Buffer.from("\n'use strict';"))).toBe(false);
        expect(hasStrictMarker(Buffer.from('"use strict";'))).toBe(false);
        expect(hasStrictMarker(Buffer.from("'use"))).toBe(false);
    });
});
