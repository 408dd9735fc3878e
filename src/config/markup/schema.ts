/**
 * Rendering option schemas.
 *
 * Tag options are part of a Tag's identity and are frozen once validated.
 * Unknown tag option keys are kept (passthrough) so that callers can attach
 * their own metadata; the renderer only reads the keys declared here.
 */

import { z } from "zod";

/**
 * Options controlling how an element of a given tag is serialized.
 */
export const TagOptionsSchema = z
  .object({
    /** Render childless elements as `<name />` instead of `<name></name>` */
    shortenEmptyTag: z
      .boolean()
      .default(true)
      .describe("Whether a childless element is closed with ' />'"),

    /** Wrap text children in CDATA sections instead of escaping them */
    cdataSection: z
      .boolean()
      .default(false)
      .describe("Whether text children are emitted verbatim inside <![CDATA[...]]>"),
  })
  .passthrough();

export type TagOptions = z.infer<typeof TagOptionsSchema>;
export type TagOptionsInput = z.input<typeof TagOptionsSchema>;

/**
 * Options for the `<?xml ...?>` prolog.
 */
export const XmlPrologOptionsSchema = z
  .object({
    version: z
      .string()
      .regex(/^1\.\d+$/, "XML version must look like 1.<digits>")
      .default("1.0"),

    encoding: z
      .string()
      .regex(/^[A-Za-z][A-Za-z0-9._-]*$/, "Encoding must be an IANA charset name")
      .default("utf-8"),

    /** Emits standalone="yes" or standalone="no" when set */
    standalone: z.boolean().optional(),
  })
  .strict();

export type XmlPrologOptions = z.infer<typeof XmlPrologOptionsSchema>;
export type XmlPrologOptionsInput = z.input<typeof XmlPrologOptionsSchema>;
