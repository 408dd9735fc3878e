/**
 * Schema of the predefined tag table (tags.json).
 */

import { z } from "zod";
import { TagOptionsSchema } from "../config/markup/index.js";

export const TagNameSchema = z
  .string()
  .regex(/^[a-z][a-z0-9-]*$/, "Tag names must be lowercase alphanumeric");

export const TagTableSchema = z
  .object({
    /** Every tag name the registry provides */
    elements: z.array(TagNameSchema).min(1),
    /** Per-tag option overrides, keyed by tag name */
    options: z.record(TagOptionsSchema).default({}),
  })
  .strict()
  .superRefine((table, ctx) => {
    const known = new Set(table.elements);
    if (known.size !== table.elements.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["elements"],
        message: "Tag names must be unique",
      });
    }
    for (const name of Object.keys(table.options)) {
      if (!known.has(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["options", name],
          message: `Options given for unlisted tag "${name}"`,
        });
      }
    }
  });

export type TagTable = z.infer<typeof TagTableSchema>;
