import { z } from "zod";
import { RULE_IDS } from "../validation/rules.js";

export const DEFAULT_PLACEHOLDERS = [
  "\\bTODO\\b",
  "\\bTBD\\b",
  "\\bFIXME\\b",
  // [unfilled text] that is not a checkbox, footnote or link
  "\\[(?![ xX]\\]|\\^)[^\\]\\n]+\\](?![(\\[:])",
];

const regexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: "Invalid regular expression" },
);

export const categoryWeightsSchema = z.object({
  error: z.number().nonnegative(),
  warning: z.number().nonnegative(),
});

export const scoringConfigSchema = z.object({
  threshold: z.number().min(0).max(100).default(90),
  weights: z
    .object({
      structural: categoryWeightsSchema.default({ error: 15, warning: 3 }),
      idFormat: categoryWeightsSchema.default({ error: 15, warning: 3 }),
      crossReference: categoryWeightsSchema.default({ error: 20, warning: 5 }),
      placeholder: categoryWeightsSchema.default({ error: 10, warning: 2 }),
    })
    .default({}),
  blockingRules: z
    .array(z.enum(RULE_IDS))
    .default(["DUPLICATE_DEFINITION", "INVALID_ID_FORMAT", "UNRESOLVED_REFERENCE"]),
});

export const artifactEntrySchema = z.object({
  /** File, or directory walked for *.md */
  path: z.string().min(1),
  kind: z.string().min(1),
  template: z.string().min(1).optional(),
  validationLevel: z.enum(["STRICT", "STANDARD"]).default("STANDARD"),
});

export const tracemarkConfigSchema = z.object({
  prefix: z
    .string()
    .regex(/^[a-z][a-z0-9]*$/, "prefix must be lowercase alphanumeric")
    .default("spd"),
  systems: z.array(z.string().regex(/^[a-z0-9]+(?:-[a-z0-9]+)*$/)).default([]),
  templatesDir: z.string().default("templates"),
  templates: z.record(z.string(), z.string()).default({}),
  artifacts: z.array(artifactEntrySchema).default([]),
  knownKinds: z.array(z.string()).default([]),
  placeholders: z.array(regexSourceSchema).default(DEFAULT_PLACEHOLDERS),
  scoring: scoringConfigSchema.default({}),
});

export type TracemarkConfigInput = z.input<typeof tracemarkConfigSchema>;
