import type { SearchHit } from "../../ai-tools";
import {
  isWithinWindow,
  parseEvidenceDate,
  type CalendarWindow,
} from "../../util/dates";
import type { EvidenceDatePolicyName } from "../domain/types";
import type { EvidenceDatePolicy } from "../infrastructure/contracts";

function hitDate(hit: SearchHit) {
  return parseEvidenceDate(hit.date) ?? parseEvidenceDate(hit.lastUpdated);
}

const policies: Record<EvidenceDatePolicyName, EvidenceDatePolicy> = {
  // Relies on the provider's server-side date filter
  "trust-provider": {
    name: "trust-provider",
    accepts: () => true,
  },
  "drop-out-of-window": {
    name: "drop-out-of-window",
    accepts(hit, window) {
      const date = hitDate(hit);
      return date === undefined || isWithinWindow(date, window);
    },
  },
  "require-date": {
    name: "require-date",
    accepts(hit, window) {
      const date = hitDate(hit);
      return date !== undefined && isWithinWindow(date, window);
    },
  },
};

export function getEvidenceDatePolicy(
  name: EvidenceDatePolicyName
): EvidenceDatePolicy {
  return policies[name];
}

/**
 * Keeps the hits a policy accepts, in their original order.
 */
export function filterHitsByWindow(
  hits: SearchHit[],
  window: CalendarWindow,
  policy: EvidenceDatePolicy
): { kept: SearchHit[]; dropped: number } {
  const kept = hits.filter((h) => policy.accepts(h, window));
  return { kept, dropped: hits.length - kept.length };
}
