// principleValidator.ts - Required section checks for principle articles

import {
  REQUIRED_SECTIONS,
  type PrincipleDocument,
  type RequiredSection,
  type ValidationResult,
  type ValidationWarning,
} from "../core/catalogTypes.js";

/**
 * Normalizes a heading or section name for comparison.
 * "Violation Example", "violation-example" and "ViolationExample"
 * all become "violationexample".
 */
export function normalizeSectionName(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, "");
}

/**
 * Checks one document for the required sections.
 *
 * Never throws: missing sections are reported in the result, in
 * canonical section order.
 */
export function validateDocument(document: PrincipleDocument): ValidationResult {
  const present = new Set(document.headings.map(normalizeSectionName));

  const missing: RequiredSection[] = REQUIRED_SECTIONS.filter(
    (section) => !present.has(normalizeSectionName(section))
  );

  return Object.freeze({
    principle: document.principle,
    missing: Object.freeze(missing),
    passed: missing.length === 0,
  });
}

export function validateCatalog(
  documents: ReadonlyArray<PrincipleDocument>
): ValidationResult[] {
  return documents.map(validateDocument);
}

/**
 * Turns failing results into report warnings. Passing results and
 * results without a matching document produce nothing.
 */
export function collectWarnings(
  documents: ReadonlyArray<PrincipleDocument>,
  results: ReadonlyArray<ValidationResult>
): ValidationWarning[] {
  const warnings: ValidationWarning[] = [];

  for (const result of results) {
    if (result.passed) continue;

    const document = documents.find((doc) => doc.principle === result.principle);
    if (!document) continue;

    warnings.push({
      principle: result.principle,
      filename: document.filename,
      missing: result.missing,
      message: `${result.principle} (${document.filename}) is missing: ${result.missing.join(", ")}`,
    });
  }

  return warnings;
}
