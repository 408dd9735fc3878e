/**
 * Rendering option loader and validator.
 *
 * Responsible for:
 * - Validating option objects against their schemas with fail-fast behavior
 * - Producing structured error messages
 * - Freezing validated options
 */

import type { ZodIssue } from "zod";
import {
  TagOptionsSchema,
  XmlPrologOptionsSchema,
  type TagOptions,
  type XmlPrologOptions,
} from "./schema.js";

/**
 * Structured validation error for rendering options.
 */
export class MarkupOptionsError extends Error {
  public readonly issues: OptionValidationIssue[];

  constructor(message: string, issues: OptionValidationIssue[]) {
    super(message);
    this.name = "MarkupOptionsError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Markup option validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual validation issue.
 */
export interface OptionValidationIssue {
  /** Path to the invalid field */
  path: (string | number)[];
  /** Human-readable error message */
  message: string;
  /** Zod error code */
  code: string;
}

function formatZodIssues(zodIssues: ZodIssue[]): OptionValidationIssue[] {
  return zodIssues.map((issue) => ({
    path: issue.path.filter(
      (p): p is string | number => typeof p === "string" || typeof p === "number"
    ),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Validate tag options, applying defaults.
 *
 * @throws MarkupOptionsError if validation fails
 */
export function loadTagOptions(input: unknown = {}): Readonly<TagOptions> {
  const result = TagOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MarkupOptionsError(
      `Invalid tag options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}

/**
 * Validate XML prolog options, applying defaults.
 *
 * @throws MarkupOptionsError if validation fails
 */
export function loadXmlPrologOptions(input: unknown = {}): Readonly<XmlPrologOptions> {
  const result = XmlPrologOptionsSchema.safeParse(input);

  if (!result.success) {
    const issues = formatZodIssues(result.error.issues);
    throw new MarkupOptionsError(
      `Invalid XML prolog options: ${issues.length} validation error(s)`,
      issues
    );
  }

  return Object.freeze(result.data);
}
