import type { RiskRating } from "./types.js";

/**
 * Risk Priority Number: detectability × probability × severity, or null when
 * the rating or any of its factors is missing.
 */
export function rpn(rating: RiskRating | null | undefined): number | null {
  if (!rating) return null;
  const { detectability, probability, severity } = rating;
  if (detectability == null || probability == null || severity == null) return null;
  return detectability * probability * severity;
}
