/**
 * @fileoverview Catalog pipeline - load, validate, render, write
 * @module initialization/catalogOrchestrator
 *
 * Called by cli.ts with a resolved config. Runs the three phases in order
 * and hands the rendered report back to the caller.
 *
 * Execution flow:
 * 1. Load principle articles from config.inputDir (LoadError is fatal)
 * 2. Validate each document's required sections (never fatal)
 * 3. Render the index in canonical order
 * 4. Write the report to config.outputPath when one is set
 */

import fs from 'fs';
import path from 'path';
import type { CatalogConfig } from '../core/configSchema.js';
import type {
  CatalogIndex,
  SkippedFile,
  ValidationResult,
  ValidationWarning,
} from '../core/catalogTypes.js';
import { loadCatalog } from './catalogLoader.js';
import { collectWarnings, validateCatalog } from '../validation/principleValidator.js';
import { buildCatalogIndex, renderCatalog } from '../rendering/catalogRenderer.js';

export interface CatalogRunResult {
  report: string;
  index: CatalogIndex;
  results: ValidationResult[];
  warnings: ValidationWarning[];
  skipped: SkippedFile[];
}

// ============================================================================
// MAIN ORCHESTRATION
// ============================================================================

/**
 * Run the catalog pipeline end to end.
 *
 * Validation warnings and skipped files are logged and returned; only an
 * unreadable content directory or a failed report write aborts the run.
 *
 * @throws {LoadError} If config.inputDir cannot be read
 */
export function runCatalogPipeline(config: CatalogConfig): CatalogRunResult {
  const progress = (message: string): void => {
    if (!config.quiet) console.log(message);
  };

  // Phase 1: Load
  progress(`📚 Loading principle articles from ${config.inputDir}...`);
  const { documents, skipped } = loadCatalog(config.inputDir);

  for (const file of skipped) {
    console.warn(`⚠️ Skipped ${file.filename} (${file.reason}): ${file.detail}`);
  }
  progress(`✅ Loaded ${documents.length} principle article(s), skipped ${skipped.length} file(s)`);

  // Phase 2: Validate
  progress('🔍 Validating required sections...');
  const results = validateCatalog(documents);
  const warnings = collectWarnings(documents, results);

  for (const warning of warnings) {
    console.warn(`⚠️ ${warning.message}`);
  }
  progress(`✅ ${results.length - warnings.length}/${results.length} article(s) passed validation`);

  // Phase 3: Render
  progress(`📝 Rendering ${config.format} report...`);
  const report = renderCatalog(documents, results, {
    format: config.format,
    linkBase: config.outputPath === null ? '' : linkBaseFor(config.outputPath, config.inputDir),
  });

  // Phase 4: Write
  if (config.outputPath !== null) {
    fs.mkdirSync(path.dirname(config.outputPath), { recursive: true });
    fs.writeFileSync(config.outputPath, report, 'utf8');
    progress(`✅ Report written to ${config.outputPath}`);
  }

  return {
    report,
    index: buildCatalogIndex(documents),
    results,
    warnings,
    skipped,
  };
}

/**
 * Relative link prefix from the report's directory to the content
 * directory, with forward slashes so links work on every platform.
 */
export function linkBaseFor(outputPath: string, inputDir: string): string {
  const relative = path
    .relative(path.dirname(path.resolve(outputPath)), path.resolve(inputDir))
    .split(path.sep)
    .join('/');
  return relative === '' ? '' : `${relative}/`;
}
