import type { IEndpointIndex } from "../../data-structures/EndpointIndex"
import { getPointKey } from "../getPointKey"
import { getToothpickEndpoints } from "../toothpick"
import type { GrowthSite, GrowthState } from "./types"

/**
 * Lists the free endpoints of a state: touched by exactly one toothpick and
 * never used to spawn. Toothpicks are scanned in creation order, each one's
 * negative endpoint before its positive one.
 */
export function findGrowthSites(
  state: GrowthState,
  index: IEndpointIndex,
): GrowthSite[] {
  const sites: GrowthSite[] = []

  for (const toothpick of state.toothpicks) {
    for (const endpoint of getToothpickEndpoints(toothpick)) {
      if (state.usedEndpoints.has(getPointKey(endpoint))) continue

      // Junctions (2+) never spawn
      if (index.getTouchingCount(endpoint) !== 1) continue

      sites.push({ endpoint, parent: toothpick })
    }
  }

  return sites
}
