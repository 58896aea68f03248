import YAML from "yaml";
import { z } from "zod";

import type { DocumentKind } from "./types.js";

const PrefixListSchema = z.array(z.string().min(1));

export const TraceSettingsSchema = z.object({
  prefixes: z
    .object({
      useCase: PrefixListSchema.default(["USECASE"]),
      test: PrefixListSchema.default(["TEST"]),
      role: PrefixListSchema.default(["ROLE"]),
      risk: PrefixListSchema.default(["RISK"]),
      heading: PrefixListSchema.default(["HEAD"]),
    })
    .default({}),
  items: z
    .object({
      digits: z.number().int().min(1).max(9).default(3),
      sep: z.enum(["", "-", "_", "."]).default(""),
    })
    .default({}),
  checkSuspectLinks: z.boolean().default(true),
});

export type TraceSettings = z.infer<typeof TraceSettingsSchema>;

export const DEFAULT_SETTINGS: TraceSettings = TraceSettingsSchema.parse({});

export function resolveSettings(input: unknown = {}): TraceSettings {
  return TraceSettingsSchema.parse(input ?? {});
}

export function parseSettings(content: string): TraceSettings {
  try {
    return resolveSettings(YAML.parse(content) ?? {});
  } catch (error) {
    console.warn(`[tracegraph:settings] Unable to parse settings, using defaults: ${(error as Error).message}`);
    return DEFAULT_SETTINGS;
  }
}

/**
 * Checked in order; the first prefix family that matches wins, anything else
 * is a requirement document. Heading documents hold section titles only.
 */
export function classifyPrefix(prefix: string, settings: TraceSettings = DEFAULT_SETTINGS): DocumentKind {
  const upper = prefix.toUpperCase();
  const matches = (candidates: string[]) => candidates.some((candidate) => upper.startsWith(candidate.toUpperCase()));
  if (matches(settings.prefixes.useCase)) return "use-case";
  if (matches(settings.prefixes.test)) return "test";
  if (matches(settings.prefixes.role)) return "role";
  if (matches(settings.prefixes.risk)) return "risk";
  if (matches(settings.prefixes.heading)) return "heading";
  return "requirement";
}
