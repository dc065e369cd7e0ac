/**
 * @fileoverview Principle article loading from a content directory
 * @module initialization/catalogLoader
 *
 * Reads every markdown file directly inside the content directory, parses
 * its front matter and heading structure, and returns one frozen
 * PrincipleDocument per recognized article.
 *
 * Only an unreadable directory is fatal. Individual files that do not follow
 * the article convention are skipped and reported with a reason.
 */

import fs from 'fs';
import path from 'path';
import {
  PrincipleCodeSchema,
  type PrincipleCode,
  type PrincipleDocument,
  type SkippedFile,
} from '../core/catalogTypes.js';
import {
  extractHeadings,
  FrontMatterParseError,
  FrontMatterValidationError,
  splitArticle,
  type SplitArticle,
} from './frontMatter.js';

const MARKDOWN_EXTENSIONS = new Set(['.md', '.markdown']);

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Error thrown when the content directory is absent or cannot be read
 */
export class LoadError extends Error {
  public readonly directory: string;
  public readonly reason: string;

  constructor(directory: string, reason: string) {
    super(`Cannot load principle catalog from ${directory}: ${reason}`);
    this.name = 'LoadError';
    this.directory = directory;
    this.reason = reason;
  }
}

// ============================================================================
// TYPES
// ============================================================================

export interface CatalogLoadResult {
  documents: PrincipleDocument[];
  skipped: SkippedFile[];
}

type ArticleOutcome =
  | { kind: 'document'; document: PrincipleDocument }
  | { kind: 'skipped'; skipped: SkippedFile };

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load all principle articles in a directory, in file-name order.
 *
 * A second article claiming an already loaded principle is skipped as a
 * duplicate; the first one by file name wins.
 *
 * @param directory - Content directory (subdirectories are ignored)
 * @throws {LoadError} If the directory is absent, not a directory, or unreadable
 */
export function loadCatalog(directory: string): CatalogLoadResult {
  const filenames = listFiles(directory);

  const documents: PrincipleDocument[] = [];
  const skipped: SkippedFile[] = [];
  const seen = new Map<PrincipleCode, string>();

  for (const filename of filenames) {
    const outcome = readArticle(directory, filename);

    if (outcome.kind === 'skipped') {
      skipped.push(outcome.skipped);
      continue;
    }

    const { document } = outcome;
    const firstFile = seen.get(document.principle);
    if (firstFile !== undefined) {
      skipped.push({
        filename,
        reason: 'duplicate-principle',
        detail: `${document.principle} is already defined by ${firstFile}`,
      });
      continue;
    }

    seen.set(document.principle, filename);
    documents.push(document);
  }

  return { documents, skipped };
}

// ============================================================================
// PRIVATE HELPERS
// ============================================================================

function listFiles(directory: string): string[] {
  let entries: fs.Dirent[];
  try {
    if (!fs.statSync(directory).isDirectory()) {
      throw new LoadError(directory, 'not a directory');
    }
    entries = fs.readdirSync(directory, { withFileTypes: true });
  } catch (error) {
    if (error instanceof LoadError) {
      throw error;
    }
    throw new LoadError(directory, error instanceof Error ? error.message : String(error));
  }

  return entries
    .filter(entry => entry.isFile())
    .map(entry => entry.name)
    .sort();
}

function readArticle(directory: string, filename: string): ArticleOutcome {
  const skip = (reason: SkippedFile['reason'], detail: string): ArticleOutcome => ({
    kind: 'skipped',
    skipped: { filename, reason, detail },
  });

  if (!MARKDOWN_EXTENSIONS.has(path.extname(filename).toLowerCase())) {
    return skip('not-markdown', 'not a .md or .markdown file');
  }

  let text: string;
  try {
    text = fs.readFileSync(path.join(directory, filename), 'utf8');
  } catch (error) {
    return skip('unreadable', error instanceof Error ? error.message : String(error));
  }

  let article: SplitArticle | null;
  try {
    article = splitArticle(filename, text);
  } catch (error) {
    if (error instanceof FrontMatterParseError || error instanceof FrontMatterValidationError) {
      return skip('invalid-front-matter', error.message);
    }
    throw error;
  }

  if (article === null) {
    return skip('no-front-matter', 'file does not start with a --- front matter block');
  }

  const code = PrincipleCodeSchema.safeParse(article.frontMatter.principle.toUpperCase());
  if (!code.success) {
    return skip('unknown-principle', `"${article.frontMatter.principle}" is not a SOLID principle code`);
  }

  const headings = extractHeadings(article.body);
  const title = article.frontMatter.title ?? headings.find(heading => heading.level === 1)?.text;
  if (title === undefined) {
    return skip('invalid-front-matter', 'no title in front matter and no level-1 heading');
  }

  const document: PrincipleDocument = Object.freeze({
    principle: code.data,
    title,
    createdAt: article.frontMatter.date,
    body: article.body,
    headings: Object.freeze(headings.map(heading => heading.text)),
    filename,
  });

  return { kind: 'document', document };
}
