import type { Manifest } from "./manifest.js";
import type { DriveItem, MergePlan } from "./types.js";

/**
 * Decide what to do with each child of one source folder. Matching is by
 * origin id in the destination's manifest only: names never count, and
 * destination children the manifest does not know about are never touched.
 * Output order follows the source listing.
 */
export function planMerge(sourceChildren: readonly DriveItem[], manifest: Manifest | null): MergePlan {
  const plan: MergePlan = { toCreate: [], toDescend: [], toSkip: [] };
  const seen = new Set<string>();

  for (const child of sourceChildren) {
    // A listing may repeat an item; the first occurrence decides.
    if (seen.has(child.id)) continue;
    seen.add(child.id);

    const destinationId = manifest?.destinationOf(child.id);
    if (destinationId === undefined) {
      plan.toCreate.push(child);
    } else if (child.kind === "container") {
      plan.toDescend.push({ source: child, destinationId });
    } else {
      plan.toSkip.push(child);
    }
  }

  return plan;
}
