/**
 * Writes the report artifacts of a run into one directory.
 */
import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { formatMetricsTable } from './metrics-table.js';
import { renderMarkdownReport } from './markdown-report.js';
import type { RunProvenance } from './provenance.js';
import type { EvaluationResult } from '../types/evaluation.js';

export const ARTIFACT_FILES = {
  metricsTable: 'metrics.tsv',
  report: 'report.md',
  manifest: 'manifest.json',
} as const;

export type ArtifactPaths = Record<keyof typeof ARTIFACT_FILES, string>;

/**
 * JSON-ready view of a result: coverage as a plain object, NaN as null.
 */
export function serializeResult(result: EvaluationResult): string {
  return JSON.stringify(
    {
      metrics: result.metrics,
      coverage: Object.fromEntries(result.coverage),
      errors: result.errors,
      nLabels: result.nLabels,
      config: result.config,
    },
    null,
    2,
  );
}

/**
 * Write metrics.tsv, report.md and manifest.json, creating `outDir` if needed.
 */
export async function writeReportArtifacts(
  outDir: string,
  result: EvaluationResult,
  provenance: RunProvenance,
): Promise<ArtifactPaths> {
  await mkdir(outDir, { recursive: true });

  const paths: ArtifactPaths = {
    metricsTable: join(outDir, ARTIFACT_FILES.metricsTable),
    report: join(outDir, ARTIFACT_FILES.report),
    manifest: join(outDir, ARTIFACT_FILES.manifest),
  };

  await writeFile(paths.metricsTable, formatMetricsTable(result), 'utf-8');
  await writeFile(paths.report, renderMarkdownReport(result, provenance), 'utf-8');
  await writeFile(paths.manifest, JSON.stringify(provenance, null, 2) + '\n', 'utf-8');

  return paths;
}
