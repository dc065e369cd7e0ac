import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_VALIDATION_FAILED,
  runCli,
  USAGE,
} from './cli.js';
import {
  buildArticle,
  completeCatalogFiles,
  makeTempDir,
  removeDir,
  writeFiles,
} from './testing/articleFixtures.js';

// ============================================================================
// TEST SETUP
// ============================================================================

let cwd: string;
let stdout: string[];

beforeEach(() => {
  cwd = makeTempDir();
  stdout = [];
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  removeDir(cwd);
});

function writeContent(files: Record<string, string>): void {
  writeFiles(path.join(cwd, 'content'), files);
}

// ============================================================================
// TESTS
// ============================================================================

describe('runCli', () => {
  it('prints usage for --help', () => {
    expect(runCli(['--help'], cwd)).toBe(EXIT_OK);
    expect(stdout.join('')).toBe(USAGE);
  });

  it('prints usage for -h', () => {
    expect(runCli(['-h'], cwd)).toBe(EXIT_OK);
    expect(stdout.join('')).toBe(USAGE);
  });

  describe('reports', () => {
    it('prints the markdown report to stdout', () => {
      writeContent(completeCatalogFiles());

      expect(runCli(['--input', 'content', '--quiet'], cwd)).toBe(EXIT_OK);

      const lines = stdout.join('').split('\n');
      expect(lines[0]).toBe('# SOLID Principle Catalog');
      expect(lines[8]).toBe('5 of 5 principles pass.');
    });

    it('prints the text report with --format text', () => {
      writeContent({ '01-srp.md': buildArticle('SRP') });

      expect(runCli(['--input', 'content', '--format', 'text'], cwd)).toBe(EXIT_OK);

      expect(stdout.join('')).toBe(
        'SOLID Principle Catalog\n\nSRP  PASS  Single Responsibility Principle\n\n1 of 1 principles pass.\n'
      );
    });

    it('writes the report to --output instead of stdout', () => {
      writeContent(completeCatalogFiles());

      expect(runCli(['--input', 'content', '--output', 'INDEX.md'], cwd)).toBe(EXIT_OK);

      expect(stdout).toEqual([]);
      const report = fs.readFileSync(path.join(cwd, 'INDEX.md'), 'utf8');
      expect(report.split('\n')[2]).toBe(
        '- **SRP** [Single Responsibility Principle](content/01-srp.md): PASS'
      );
    });

    it('reads options from solid-catalog.yaml', () => {
      writeContent({ '01-srp.md': buildArticle('SRP') });
      fs.writeFileSync(path.join(cwd, 'solid-catalog.yaml'), 'inputDir: content\nformat: text\n');

      expect(runCli([], cwd)).toBe(EXIT_OK);

      expect(stdout.join('').startsWith('SOLID Principle Catalog\n')).toBe(true);
    });
  });

  describe('validation failures', () => {
    beforeEach(() => {
      writeContent({
        ...completeCatalogFiles(),
        '04-isp.md': buildArticle('ISP', ['Definition', 'Rationale', 'Violation Example']),
      });
    });

    it('still succeeds without --strict', () => {
      expect(runCli(['--input', 'content'], cwd)).toBe(EXIT_OK);
      expect(stdout.join('')).toContain(
        '- **ISP** [Interface Segregation Principle](04-isp.md): FAIL (missing: FixedExample)\n'
      );
    });

    it('exits with 2 under --strict', () => {
      expect(runCli(['--input', 'content', '--strict'], cwd)).toBe(EXIT_VALIDATION_FAILED);
      expect(console.error).toHaveBeenCalledWith('❌ 1 article(s) failed validation (--strict)');
    });
  });

  describe('errors', () => {
    it('exits with 1 when the input directory is missing', () => {
      expect(runCli(['--input', 'missing'], cwd)).toBe(EXIT_FAILURE);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringMatching(/^❌ Cannot load principle catalog from /)
      );
    });

    it('exits with 1 on an unknown format', () => {
      expect(runCli(['--format', 'html'], cwd)).toBe(EXIT_FAILURE);
      expect(console.error).toHaveBeenCalledWith(
        '❌ Invalid configuration (command line): --format must be markdown or text, got "html"'
      );
    });

    it('exits with 1 on an unknown flag', () => {
      expect(runCli(['--colour'], cwd)).toBe(EXIT_FAILURE);
      expect(console.error).toHaveBeenCalledWith(
        expect.stringMatching(/^❌ Invalid configuration \(command line\)/)
      );
    });

    it('exits with 1 on positional arguments', () => {
      expect(runCli(['content'], cwd)).toBe(EXIT_FAILURE);
    });

    it('exits with 1 when --config names a missing file', () => {
      expect(runCli(['--config', 'nope.yaml'], cwd)).toBe(EXIT_FAILURE);
    });
  });
});
