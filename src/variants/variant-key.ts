/**
 * Variant key parsing and canonicalization.
 *
 * Canonicalization policy (applied to every key, from every input):
 * - all fields are trimmed
 * - chrom: a leading `chr` prefix is removed (any case), the rest uppercased
 * - pos: decimal digits only, a positive safe integer (leading zeros dropped)
 * - ref/alt: uppercased, nucleotides `ACGTN` only
 *
 * So `chr1:00123:a:g` and `1:123:A:G` are the same variant.
 */
import { MalformedVariant } from '../errors/benchmark-errors.js';
import type { VariantKey } from '../types/variant.js';

const CHROM_PREFIX = /^chr/i;
const CHROM_PATTERN = /^[A-Z0-9_.]+$/;
const POSITION_PATTERN = /^\d+$/;
const ALLELE_PATTERN = /^[ACGTN]+$/;

/** Separator of the canonical `chrom:pos:ref:alt` form. */
export const VARIANT_ID_SEPARATOR = ':';

function normalizeChrom(raw: string): string {
  const chrom = raw.trim().replace(CHROM_PREFIX, '').toUpperCase();
  if (!chrom) {
    throw new MalformedVariant(`chrom is empty (got "${raw}")`);
  }
  if (!CHROM_PATTERN.test(chrom)) {
    throw new MalformedVariant(`chrom "${raw}" contains invalid characters`);
  }
  return chrom;
}

function normalizePosition(raw: string | number): number {
  const text = typeof raw === 'number' ? String(raw) : raw.trim();
  if (!POSITION_PATTERN.test(text)) {
    throw new MalformedVariant(`pos must be a positive integer (got "${raw}")`);
  }
  const pos = Number.parseInt(text, 10);
  if (pos < 1 || !Number.isSafeInteger(pos)) {
    throw new MalformedVariant(`pos must be a positive integer (got "${raw}")`);
  }
  return pos;
}

function normalizeAllele(raw: string, field: 'ref' | 'alt'): string {
  const allele = raw.trim().toUpperCase();
  if (!allele) {
    throw new MalformedVariant(`${field} is empty`);
  }
  if (!ALLELE_PATTERN.test(allele)) {
    throw new MalformedVariant(`${field} "${raw}" is not a nucleotide sequence`);
  }
  return allele;
}

/**
 * Build a canonical, frozen VariantKey from its four fields.
 *
 * @throws {MalformedVariant} When any field fails the canonicalization rules
 */
export function parseVariantKey(
  chrom: string,
  pos: string | number,
  ref: string,
  alt: string,
): VariantKey {
  return Object.freeze({
    chrom: normalizeChrom(chrom),
    pos: normalizePosition(pos),
    ref: normalizeAllele(ref, 'ref'),
    alt: normalizeAllele(alt, 'alt'),
  });
}

/**
 * Parse a pre-joined `chrom:pos:ref:alt` identifier.
 *
 * @throws {MalformedVariant} When the id does not have exactly four parts
 */
export function parseVariantId(variantId: string): VariantKey {
  const parts = variantId.trim().split(VARIANT_ID_SEPARATOR);
  if (parts.length !== 4) {
    throw new MalformedVariant(
      `variant_id "${variantId}" must have the form chrom:pos:ref:alt`,
    );
  }
  const [chrom, pos, ref, alt] = parts;
  return parseVariantKey(chrom, pos, ref, alt);
}

/**
 * Canonical join key. Integer formatting only, so it is locale-independent.
 */
export function canonicalForm(key: VariantKey): string {
  return [key.chrom, String(key.pos), key.ref, key.alt].join(VARIANT_ID_SEPARATOR);
}

export function variantKeysEqual(a: VariantKey, b: VariantKey): boolean {
  return a.chrom === b.chrom && a.pos === b.pos && a.ref === b.ref && a.alt === b.alt;
}
