import { z } from "zod";

export const templateVersionSchema = z.object({
  major: z.number().int().nonnegative(),
  minor: z.number().int().nonnegative(),
});

/** Validates the `template:` section of a template's YAML frontmatter. */
export const templateMetaSchema = z.object({
  kind: z.string().min(1).optional(),
  version: templateVersionSchema.optional(),
  unknown_sections: z.enum(["error", "warn", "allow"]).default("warn"),
  validation_level: z.enum(["STRICT", "STANDARD"]).optional(),
});

/** Validates template frontmatter. Keys other than `template` are ignored. */
export const templateFrontmatterSchema = z
  .object({
    template: templateMetaSchema.optional(),
  })
  .passthrough();

export const markerFlagsSchema = z.object({
  required: z.enum(["true", "false"]).default("true"),
  repeat: z.enum(["one", "many"]).default("one"),
});
