/**
 * @fileoverview Front matter and heading extraction for principle articles
 * @module initialization/frontMatter
 *
 * Splits a markdown article into its YAML front matter block and body,
 * validates the front matter against FrontMatterSchema, and lists the
 * body's headings in document order.
 *
 * Nothing here touches the filesystem; catalogLoader.ts reads the files
 * and decides what to skip.
 */

import yaml from 'js-yaml';
import { marked } from 'marked';
import { z } from 'zod';

// ============================================================================
// ERROR CLASSES
// ============================================================================

/**
 * Error thrown when the front matter block is not valid YAML
 */
export class FrontMatterParseError extends Error {
  public readonly filename: string;
  public readonly yamlError: Error;

  constructor(filename: string, yamlError: Error) {
    super(`Failed to parse front matter in ${filename}: ${yamlError.message}`);
    this.name = 'FrontMatterParseError';
    this.filename = filename;
    this.yamlError = yamlError;
  }
}

/**
 * Error thrown when the front matter parses but fails schema validation
 */
export class FrontMatterValidationError extends Error {
  public readonly filename: string;
  public readonly zodError: z.ZodError;

  constructor(filename: string, zodError: z.ZodError) {
    const issues = zodError.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    super(`Front matter validation failed for ${filename}: ${issues}`);
    this.name = 'FrontMatterValidationError';
    this.filename = filename;
    this.zodError = zodError;
  }
}

// ============================================================================
// SCHEMAS
// ============================================================================

/**
 * Front matter schema
 *
 * `principle` is checked against the SOLID codes by the loader, so an
 * unknown code can be reported separately from a malformed block.
 * The block is loaded with the YAML core schema, so `date` always arrives
 * as a string and must be a real calendar date in YYYY-MM-DD form.
 */
export const FrontMatterSchema = z.object({
  principle: z.string().trim().min(1),
  title: z.string().trim().min(1).optional(),
  date: z
    .string()
    .date('Date must be a valid YYYY-MM-DD calendar date')
    .optional()
    .transform(value => value ?? null),
});

export type FrontMatter = z.infer<typeof FrontMatterSchema>;

export interface SplitArticle {
  frontMatter: FrontMatter;
  body: string;
}

export interface MarkdownHeading {
  level: number;
  text: string;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Split an article into validated front matter and body.
 *
 * @returns null when the article has no front matter block
 * @throws {FrontMatterParseError} If the block is malformed YAML
 * @throws {FrontMatterValidationError} If the block fails FrontMatterSchema
 */
export function splitArticle(filename: string, text: string): SplitArticle | null {
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  if (lines[0]?.trimEnd() !== '---') {
    return null;
  }

  const closing = lines.findIndex(
    (line, index) => index > 0 && (line.trimEnd() === '---' || line.trimEnd() === '...')
  );
  if (closing === -1) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(lines.slice(1, closing).join('\n'), { schema: yaml.CORE_SCHEMA });
  } catch (error) {
    throw new FrontMatterParseError(
      filename,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  const result = FrontMatterSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new FrontMatterValidationError(filename, result.error);
  }

  return {
    frontMatter: result.data,
    body: lines.slice(closing + 1).join('\n'),
  };
}

/**
 * List the body's top-level headings (ATX and setext) in document order.
 *
 * Headings inside code blocks, block quotes and lists are not sections
 * and are left out. Empty headings are dropped.
 */
export function extractHeadings(body: string): MarkdownHeading[] {
  const headings: MarkdownHeading[] = [];

  for (const token of marked.lexer(body)) {
    if (token.type === 'heading' && token.text.trim().length > 0) {
      headings.push({ level: token.depth, text: token.text.trim() });
    }
  }

  return headings;
}
