/**
 * Run provenance: what went in, which config was used, and when.
 *
 * Provenance is an explicit value built after the run and handed to the
 * report writers; nothing is collected behind the caller's back.
 */
import { createHash } from 'crypto';
import { readFile } from 'fs/promises';
import type { EvaluationConfig } from '../config/types.js';
import type { EvaluationResult } from '../types/evaluation.js';

export type InputRole = 'predictions' | 'labels';

export interface InputProvenance {
  role: InputRole;
  path: string;
  /** Hex SHA-256 of the file bytes */
  sha256: string;
  /** Non-blank lines after the header */
  rows: number;
}

export interface RunProvenance {
  /** ISO-8601 timestamp */
  generatedAt: string;
  inputs: InputProvenance[];
  config: EvaluationConfig;
  nTools: number;
  nEvaluated: number;
  nLabels: number;
  nErrors: number;
}

/**
 * Count data rows of a delimited text: non-blank lines minus the header.
 */
export function countDataRows(text: string): number {
  const nonBlank = text.split(/\r?\n/).filter((line) => line.trim() !== '').length;
  return Math.max(nonBlank - 1, 0);
}

export function describeInput(role: InputRole, path: string, content: Buffer): InputProvenance {
  return {
    role,
    path,
    sha256: createHash('sha256').update(content).digest('hex'),
    rows: countDataRows(content.toString('utf-8')),
  };
}

/**
 * Hash and count one input file.
 */
export async function hashInput(role: InputRole, path: string): Promise<InputProvenance> {
  return describeInput(role, path, await readFile(path));
}

/**
 * Assemble the provenance record of a finished run.
 */
export function buildProvenance(
  inputs: readonly InputProvenance[],
  result: EvaluationResult,
  now: Date = new Date(),
): RunProvenance {
  return {
    generatedAt: now.toISOString(),
    inputs: [...inputs],
    config: result.config,
    nTools: result.coverage.size,
    nEvaluated: result.metrics.length,
    nLabels: result.nLabels,
    nErrors: result.errors.length,
  };
}
