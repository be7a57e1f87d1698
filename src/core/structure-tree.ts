// src/core/structure-tree.ts

import type { FinalizedStructure, StructureNode } from '../schema/structure';

export const DEFAULT_TITLE_PREFIX = 'Student Project: ';

class TreeNode {
   title: string;
   path: string | undefined;
   weight: number;
   children: Map<string, TreeNode> | null = null;

   constructor(readonly key: string) {
      this.title = key;
      this.path = undefined;
      this.weight = 0;
   }

   child(key: string): TreeNode {
      if (!this.children) this.children = new Map();
      let node = this.children.get(key);
      if (!node) {
         node = new TreeNode(key);
         this.children.set(key, node);
      }
      return node;
   }
}

export interface StructureTreeOptions {
   /**
    * Removed from the start of every node title on finalize.
    * Pass an empty string to disable.
    */
   stripTitlePrefix?: string;
}

/**
 * Navigation tree keyed by breadcrumb segments.
 *
 * Pages insert themselves while they are generated; once every site is
 * built the tree is finalized exactly once into plain `StructureNode`s.
 */
export class StructureTree {
   private readonly root = new TreeNode('');
   private readonly prefix: string;
   private finalized = false;

   constructor(options: StructureTreeOptions = {}) {
      this.prefix = options.stripTitlePrefix ?? DEFAULT_TITLE_PREFIX;
   }

   get isFinalized(): boolean {
      return this.finalized;
   }

   /**
    * Insert or overwrite the node at `breadcrumbPath` ("Science/teaching").
    * Missing intermediate nodes are created with their segment as title.
    * Re-inserting the same breadcrumb updates title, path and weight.
    */
   insert(title: string, breadcrumbPath: string, canonicalPath: string, weight: number): void {
      if (this.finalized) {
         throw new Error(`Cannot insert "${breadcrumbPath}": structure tree is already finalized`);
      }

      const segments = breadcrumbPath.split('/').filter((s) => s.length > 0);
      if (segments.length === 0) {
         throw new Error(`Invalid breadcrumb path "${breadcrumbPath}"`);
      }

      let node = this.root;
      for (const segment of segments) {
         node = node.child(segment);
      }

      node.title = title;
      node.path = canonicalPath;
      node.weight = weight;
   }

   /**
    * Sort, optionally collate shared sections, strip title prefixes and
    * freeze the tree.
    *
    * Collation: among top-level nodes that have children (at least two of
    * them), child keys present under every one are removed from all of them
    * and the first section's copy is lifted to the top level under its title.
    * A lifted title that is already a top-level key is an error.
    */
   finalize(collateShared: boolean): FinalizedStructure {
      if (this.finalized) {
         throw new Error('Structure tree is already finalized');
      }
      this.finalized = true;

      const topLevel = this.root.children ?? new Map<string, TreeNode>();
      const lifted: TreeNode[] = [];

      if (collateShared) {
         const sections = [...topLevel.values()].filter(
            (n): n is TreeNode & { children: Map<string, TreeNode> } => n.children !== null,
         );

         if (sections.length >= 2) {
            const [first, ...rest] = sections;
            const sharedKeys = [...first.children.keys()].filter((key) =>
               rest.every((section) => section.children.has(key)),
            );

            for (const key of sharedKeys) {
               const keep = first.children.get(key);
               for (const section of sections) {
                  section.children.delete(key);
               }
               if (keep) lifted.push(keep);
            }
         }
      }

      for (const node of lifted) {
         if (topLevel.has(node.title)) {
            throw new Error(
               `Cannot lift shared section "${node.key}": a top-level entry "${node.title}" already exists`,
            );
         }
         topLevel.set(node.title, node);
      }

      const liftedNodes = new Set(lifted);
      const roots: StructureNode[] = [];
      const shared: StructureNode[] = [];
      for (const [key, node] of topLevel) {
         const frozen = this.freeze(node, key);
         roots.push(frozen);
         if (liftedNodes.has(node)) shared.push(frozen);
      }

      return { roots, shared };
   }

   private freeze(node: TreeNode, keyOverride?: string): StructureNode {
      const children = node.children
         ? [...node.children.values()]
            .map((child) => this.freeze(child))
            .sort((a, b) => a.weight - b.weight)
         : [];

      return {
         key: keyOverride ?? node.key,
         title: this.stripPrefix(node.title),
         path: node.path,
         weight: node.weight,
         children,
      };
   }

   private stripPrefix(title: string): string {
      return this.prefix && title.startsWith(this.prefix)
         ? title.slice(this.prefix.length)
         : title;
   }
}
