// catalogTypes.ts - Shared catalog types and schemas

import { z } from "zod";

/**
 * The five SOLID principles, in canonical order.
 * Rendering always follows this order, never file or insertion order.
 */
export const PRINCIPLE_CODES = ["SRP", "OCP", "LSP", "ISP", "DIP"] as const;

export const PrincipleCodeSchema = z.enum(PRINCIPLE_CODES);

export type PrincipleCode = z.infer<typeof PrincipleCodeSchema>;

/**
 * Sections every principle article must carry, in canonical order.
 */
export const REQUIRED_SECTIONS = [
  "Definition",
  "Rationale",
  "ViolationExample",
  "FixedExample",
] as const;

export const RequiredSectionSchema = z.enum(REQUIRED_SECTIONS);

export type RequiredSection = z.infer<typeof RequiredSectionSchema>;

/**
 * One loaded principle article. Frozen by the loader.
 */
export interface PrincipleDocument {
  readonly principle: PrincipleCode;
  readonly title: string;
  readonly createdAt: string | null; // YYYY-MM-DD
  readonly body: string;
  readonly headings: ReadonlyArray<string>;
  readonly filename: string;
}

export interface ValidationResult {
  readonly principle: PrincipleCode;
  readonly missing: ReadonlyArray<RequiredSection>;
  readonly passed: boolean;
}

/**
 * Non-fatal report entry for a document missing required sections.
 * Included in the report, never thrown.
 */
export interface ValidationWarning {
  readonly principle: PrincipleCode;
  readonly filename: string;
  readonly missing: ReadonlyArray<RequiredSection>;
  readonly message: string;
}

export interface CatalogIndexEntry {
  readonly principle: PrincipleCode;
  readonly title: string;
  readonly filename: string;
}

export type CatalogIndex = ReadonlyArray<CatalogIndexEntry>;

export type SkipReason =
  | "not-markdown"
  | "no-front-matter"
  | "invalid-front-matter"
  | "unknown-principle"
  | "duplicate-principle"
  | "unreadable";

export interface SkippedFile {
  readonly filename: string;
  readonly reason: SkipReason;
  readonly detail: string;
}

/**
 * Position of a principle in the canonical order (SRP = 0 ... DIP = 4).
 */
export function canonicalRank(principle: PrincipleCode): number {
  return PRINCIPLE_CODES.indexOf(principle);
}
