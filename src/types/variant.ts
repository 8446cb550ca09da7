/**
 * Core data model for variants, predictions and truth labels.
 *
 * Everything here is a plain immutable value. Parsing and canonicalization
 * live in src/variants/variant-key.ts; these are only the shapes.
 */

/**
 * Canonical identity of a genomic variant.
 *
 * Instances are produced by `parseVariantKey` and frozen. The canonical
 * string form `chrom:pos:ref:alt` is the join key everywhere.
 */
export interface VariantKey {
  /** Chromosome without a `chr` prefix, uppercased (e.g. `1`, `X`, `M`) */
  readonly chrom: string;
  /** 1-based position */
  readonly pos: number;
  /** Reference allele, uppercased nucleotides */
  readonly ref: string;
  /** Alternate allele, uppercased nucleotides */
  readonly alt: string;
}

/**
 * Ground-truth class: 1 = pathogenic, 0 = benign.
 */
export type BinaryLabel = 0 | 1;

/**
 * A single score emitted by an external tool for a variant.
 *
 * Higher scores are assumed to be more pathogenic-like.
 */
export interface PredictionRecord {
  variant: VariantKey;
  tool: string;
  score: number;
}

/**
 * A single ground-truth label.
 */
export interface LabelRecord {
  variant: VariantKey;
  label: BinaryLabel;
}

/**
 * Effective (deduplicated) score for one variant under one tool.
 */
export interface ScoredVariant {
  variant: VariantKey;
  /** Arithmetic mean of all observations */
  score: number;
  /** Number of raw rows that contributed to `score` */
  observations: number;
}
