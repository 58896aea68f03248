import { z } from "zod";

const LinkEntrySchema = z.union([z.string(), z.record(z.string(), z.string().nullable())]);

export type LinkEntry = z.infer<typeof LinkEntrySchema>;

const RiskRatingSchema = z
  .object({
    detectability: z.number().int().nullable().optional(),
    probability: z.number().int().nullable().optional(),
    severity: z.number().int().nullable().optional(),
  })
  .nullable()
  .optional();

export const ItemFileSchema = z.object({
  active: z.boolean().default(true),
  text: z.string().default(""),
  links: z.array(LinkEntrySchema).nullable().default([]),
  stakeholder: z.string().nullable().optional(),
  prio: z.number().nullable().optional(),
  implemented: z.boolean().optional(),
  jira: z.array(z.union([z.string(), z.number()]).transform(String)).nullable().optional(),
  "risk-rating": RiskRatingSchema,
  "residual-risk-rating": RiskRatingSchema,
});

export type ItemFile = z.infer<typeof ItemFileSchema>;

export const DocumentFileSchema = z.object({
  settings: z.object({
    prefix: z.string(),
    parent: z.string().nullable().optional(),
    name: z.string().optional(),
    level: z.union([z.string(), z.number()]).transform(String).optional(),
    digits: z.number().int().min(1).optional(),
    sep: z.string().optional(),
  }),
});

export type DocumentFile = z.infer<typeof DocumentFileSchema>;
