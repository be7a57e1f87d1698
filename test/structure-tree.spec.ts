// test/structure-tree.spec.ts

import {describe, it, expect} from 'vitest';
import {StructureTree} from '../src/core/structure-tree';
import type {StructureNode} from '../src/schema/structure';

const keys = (nodes: StructureNode[]) => nodes.map((n) => n.key);

describe('StructureTree.insert', () => {
    it('creates intermediate nodes titled by their segment', () => {
        const tree = new StructureTree();
        tree.insert('Alpha', 'Software/major_projects/alpha', 'alpha', 1);

        const {roots} = tree.finalize(false);
        const software = roots[0];
        expect(software).toMatchObject({key: 'Software', title: 'Software', path: undefined, weight: 0});
        expect(software.children[0]).toMatchObject({key: 'major_projects', title: 'major_projects', path: undefined});
        expect(software.children[0].children[0]).toEqual({
            key: 'alpha',
            title: 'Alpha',
            path: 'alpha',
            weight: 1,
            children: [],
        });
    });

    it('is last-write-wins for the same breadcrumb', () => {
        const tree = new StructureTree();
        tree.insert('Teaching', 'Science/teaching', 'teaching', 20);
        tree.insert('Teaching', 'Science/teaching', 'teaching', 20);
        tree.insert('Lectures', 'Science/teaching', 'lectures', 5);

        const {roots} = tree.finalize(false);
        expect(roots[0].children).toHaveLength(1);
        expect(roots[0].children[0]).toMatchObject({title: 'Lectures', path: 'lectures', weight: 5});
    });

    it('keeps an intermediate node when it is inserted later', () => {
        const tree = new StructureTree();
        tree.insert('Student Projects', 'Science/teaching/student_projects', 'teaching#student_projects', 20);
        tree.insert('Teaching', 'Science/teaching', 'teaching', 20);

        const teaching = tree.finalize(false).roots[0].children[0];
        expect(teaching.title).toBe('Teaching');
        expect(keys(teaching.children)).toEqual(['student_projects']);
    });

    it('rejects empty breadcrumbs', () => {
        expect(() => new StructureTree().insert('x', '/', 'x', 0)).toThrow('Invalid breadcrumb path "/"');
    });
});

describe('StructureTree.finalize', () => {
    it('sorts children by ascending weight, keeping insertion order for ties', () => {
        const tree = new StructureTree();
        tree.insert('Three', 'Site/c', 'c', 3);
        tree.insert('One', 'Site/a', 'a', 1);
        tree.insert('Two', 'Site/b', 'b', 2);
        tree.insert('Also one', 'Site/d', 'd', 1);
        tree.insert('Newest', 'Site/e', 'e', -20240301);

        const site = tree.finalize(false).roots[0];
        expect(keys(site.children)).toEqual(['e', 'a', 'd', 'b', 'c']);
    });

    it('keeps top-level nodes in insertion order', () => {
        const tree = new StructureTree();
        tree.insert('Zeta', 'Zeta', 'https://zeta.example.com', 2);
        tree.insert('Alpha', 'Alpha', 'https://alpha.example.com', 1);

        expect(keys(tree.finalize(false).roots)).toEqual(['Zeta', 'Alpha']);
    });

    it('lifts children shared by every section to the top level', () => {
        const tree = new StructureTree();
        tree.insert('A', 'A', 'a', 1);
        tree.insert('X', 'A/x', 'x', 1);
        tree.insert('Y', 'A/y', 'y', 2);
        tree.insert('B', 'B', 'b', 2);
        tree.insert('X elsewhere', 'B/x', 'bx', 1);
        tree.insert('Z', 'B/z', 'z', 2);
        tree.insert('C', 'C', 'c', 3);

        const {roots, shared} = tree.finalize(true);

        expect(keys(roots)).toEqual(['A', 'B', 'C', 'X']);
        expect(keys(roots[0].children)).toEqual(['y']);
        expect(keys(roots[1].children)).toEqual(['z']);
        expect(roots[2].children).toEqual([]);
        expect(shared).toEqual([{key: 'X', title: 'X', path: 'x', weight: 1, children: []}]);
    });

    it('rejects a shared section whose title is already a top-level key', () => {
        const tree = new StructureTree();
        tree.insert('Science', 'Science', 'https://science.example.com', 1);
        tree.insert('Media', 'Media', 'https://media.example.com', 2);
        tree.insert('Media', 'Science/media', 'media', 5);
        tree.insert('Media', 'Media/media', 'media', 5);

        expect(() => tree.finalize(true)).toThrow(
            'Cannot lift shared section "media": a top-level entry "Media" already exists',
        );
    });

    it('rejects two shared sections with the same title', () => {
        const tree = new StructureTree();
        tree.insert('Notes', 'Science/notes', 'notes', 1);
        tree.insert('Notes', 'Science/notes-old', 'notes-old', 2);
        tree.insert('Notes', 'Media/notes', 'notes', 1);
        tree.insert('Notes', 'Media/notes-old', 'notes-old', 2);

        expect(() => tree.finalize(true)).toThrow(
            'Cannot lift shared section "notes-old": a top-level entry "Notes" already exists',
        );
    });

    it('does not collate with fewer than two sections', () => {
        const tree = new StructureTree();
        tree.insert('Sitemap', 'A/sitemap', 'sitemap', 999);
        tree.insert('B', 'B', 'b', 2);

        const {roots, shared} = tree.finalize(true);
        expect(shared).toEqual([]);
        expect(keys(roots[0].children)).toEqual(['sitemap']);
    });

    it('does not collate when asked not to', () => {
        const tree = new StructureTree();
        tree.insert('Sitemap', 'A/sitemap', 'sitemap', 999);
        tree.insert('Sitemap', 'B/sitemap', 'sitemap', 999);

        const {roots, shared} = tree.finalize(false);
        expect(shared).toEqual([]);
        expect(keys(roots)).toEqual(['A', 'B']);
    });

    it('strips the title prefix at every level', () => {
        const tree = new StructureTree();
        tree.insert('Student Project: Robots', 'Science/teaching/robots', 'robots', 1);
        tree.insert('Student Project: Top', 'Top', 'top', 2);

        const {roots} = tree.finalize(false);
        expect(roots[0].children[0].children[0].title).toBe('Robots');
        expect(roots[1].title).toBe('Top');
    });

    it('accepts a custom prefix', () => {
        const tree = new StructureTree({stripTitlePrefix: 'Draft: '});
        tree.insert('Draft: Notes', 'Site/notes', 'notes', 0);
        tree.insert('Student Project: Kept', 'Site/kept', 'kept', 1);

        const children = tree.finalize(false).roots[0].children;
        expect(children.map((c) => c.title)).toEqual(['Notes', 'Student Project: Kept']);
    });

    it('can only be finalized once and is frozen afterwards', () => {
        const tree = new StructureTree();
        tree.insert('A', 'A', 'a', 1);
        tree.finalize(true);

        expect(tree.isFinalized).toBe(true);
        expect(() => tree.finalize(true)).toThrow('Structure tree is already finalized');
        expect(() => tree.insert('B', 'B', 'b', 2)).toThrow(/already finalized/);
    });
});
