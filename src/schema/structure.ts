// src/schema/structure.ts

/**
 * A single finalized entry of the site structure.
 *
 * Produced by `StructureTree.finalize()`; plain data that templates
 * (the human sitemap) and the sitemap extractor walk.
 */
export interface StructureNode {
   /**
    * Breadcrumb segment this node was stored under
    * (or its title, for nodes lifted to the top level by collation).
    */
   key: string;

   /** Display title. */
   title: string;

   /**
    * Canonical route fragment or absolute URL, e.g. "teaching#student_projects".
    *
    * Undefined for intermediate nodes that only ever appeared as a
    * breadcrumb prefix and were never inserted themselves.
    */
   path?: string;

   /** Sibling ordering key, ascending. Negative values are valid. */
   weight: number;

   /** Children sorted by ascending weight (stable). Empty for leaves. */
   children: StructureNode[];
}

/**
 * Result of finalizing a structure tree.
 */
export interface FinalizedStructure {
   /**
    * Top-level nodes in insertion order (one per site, followed by
    * nodes lifted out of the sections by collation).
    */
   roots: StructureNode[];

   /**
    * The lifted nodes only (a subset of `roots`).
    */
   shared: StructureNode[];
}
