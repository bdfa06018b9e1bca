import type { RequirementStats } from "../../../db/store";
import type { Requirement } from "../types";
import { confidenceTier } from "./confidence";

export function emptyStats(): RequirementStats {
  return {
    total: 0,
    byClassification: {},
    byStatus: {},
    byConfidenceTier: { low: 0, medium: 0, high: 0 },
  };
}

export function summarizeRequirements(
  requirements: readonly Requirement[]
): RequirementStats {
  const stats = emptyStats();

  for (const r of requirements) {
    stats.total += 1;
    const cls = r.classification ?? "UNCLASSIFIED";
    stats.byClassification[cls] = (stats.byClassification[cls] ?? 0) + 1;
    stats.byStatus[r.status] = (stats.byStatus[r.status] ?? 0) + 1;
    stats.byConfidenceTier[confidenceTier(r.confidence)] += 1;
  }

  return stats;
}

/**
 * Seconds between upload and the end of processing, or null while the
 * document has not finished.
 */
export function processingSeconds(
  uploadedAt: Date,
  processedAt: Date | null
): number | null {
  if (!processedAt) return null;
  return (processedAt.getTime() - uploadedAt.getTime()) / 1000;
}
