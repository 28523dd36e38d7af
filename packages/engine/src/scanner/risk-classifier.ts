import type { AssignedTier, Label } from "../api/schemas.js";

/**
 * Tier from indicator count: none → excluded (null), one → medium,
 * two or more → high. Never returns `low`.
 */
export function classifyRisk(indicators: readonly Label[]): AssignedTier | null {
  const distinct = new Set(indicators).size;
  if (distinct === 0) return null;
  return distinct > 1 ? "high" : "medium";
}
