/**
 * @fileoverview Catalog index and report rendering
 * @module rendering/catalogRenderer
 *
 * Builds the CatalogIndex from loaded documents and renders it, together
 * with each document's ValidationResult, as a markdown or plain text report.
 *
 * Output order is always SRP, OCP, LSP, ISP, DIP. The report carries no
 * timestamps, so rendering the same catalog twice gives identical text.
 */

import {
  canonicalRank,
  type CatalogIndex,
  type CatalogIndexEntry,
  type PrincipleCode,
  type PrincipleDocument,
  type ValidationResult,
} from '../core/catalogTypes.js';

export const REPORT_TITLE = 'SOLID Principle Catalog';

export type ReportFormat = 'markdown' | 'text';

export interface RenderOptions {
  format: ReportFormat;
  /** Prefix for document links in markdown output, e.g. "../docs/principles/" */
  linkBase?: string;
}

/**
 * Error thrown when a document has no validation result to render
 */
export class RenderError extends Error {
  public readonly principle: PrincipleCode;

  constructor(principle: PrincipleCode) {
    super(`No validation result for ${principle}; validate every document before rendering`);
    this.name = 'RenderError';
    this.principle = principle;
  }
}

interface ReportRow {
  entry: CatalogIndexEntry;
  result: ValidationResult;
}

/**
 * Derive the index from the documents, in canonical order.
 */
export function buildCatalogIndex(documents: ReadonlyArray<PrincipleDocument>): CatalogIndex {
  return Object.freeze(
    [...documents]
      .sort((a, b) => canonicalRank(a.principle) - canonicalRank(b.principle))
      .map(document =>
        Object.freeze({
          principle: document.principle,
          title: document.title,
          filename: document.filename,
        })
      )
  );
}

/**
 * Render the full report.
 *
 * @throws {RenderError} If any document lacks a ValidationResult
 */
export function renderCatalog(
  documents: ReadonlyArray<PrincipleDocument>,
  results: ReadonlyArray<ValidationResult>,
  options: RenderOptions = { format: 'markdown' }
): string {
  const rows: ReportRow[] = buildCatalogIndex(documents).map(entry => {
    const result = results.find(candidate => candidate.principle === entry.principle);
    if (!result) {
      throw new RenderError(entry.principle);
    }
    return { entry, result };
  });

  const lines =
    options.format === 'text'
      ? renderText(rows)
      : renderMarkdown(rows, options.linkBase ?? '');

  return lines.join('\n') + '\n';
}

// ============================================================================
// FORMATS
// ============================================================================

function renderMarkdown(rows: ReportRow[], linkBase: string): string[] {
  const lines = [`# ${REPORT_TITLE}`, ''];

  if (rows.length === 0) {
    lines.push('_No principle documents found._');
  }

  for (const { entry, result } of rows) {
    const link = `[${escapeLinkText(entry.title)}](${encodeURI(linkBase + entry.filename)})`;
    lines.push(`- **${entry.principle}** ${link}: ${statusText(result)}`);
  }

  lines.push('', summaryLine(rows));
  return lines;
}

function renderText(rows: ReportRow[]): string[] {
  const lines = [REPORT_TITLE, ''];

  if (rows.length === 0) {
    lines.push('No principle documents found.');
  }

  for (const { entry, result } of rows) {
    const marker = result.passed ? 'PASS' : 'FAIL';
    const missing = result.passed ? '' : ` (missing: ${result.missing.join(', ')})`;
    lines.push(`${entry.principle}  ${marker}  ${entry.title}${missing}`);
  }

  lines.push('', summaryLine(rows));
  return lines;
}

function statusText(result: ValidationResult): string {
  return result.passed ? 'PASS' : `FAIL (missing: ${result.missing.join(', ')})`;
}

function summaryLine(rows: ReportRow[]): string {
  const passed = rows.filter(row => row.result.passed).length;
  return `${passed} of ${rows.length} principles pass.`;
}

function escapeLinkText(text: string): string {
  return text.replace(/([\\[\]])/g, '\\$1');
}
