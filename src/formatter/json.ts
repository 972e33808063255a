/**
 * JSON formatter — serializes a collection conversion.
 *
 * Each member carries its resolved descriptor next to its label so
 * consumers can reinterpret the axis without the unit table. Failed
 * members stay in the output with their error; a member whose unit was
 * not recognized has no descriptor.
 */

import type { CollectionConversion } from "../types/series.js";
import { canonicalLabel } from "../resolver/resolver.js";

/**
 * Formats a conversion as pretty-printed JSON.
 *
 * Member order follows the input order, so output is deterministic for
 * identical input.
 */
export function formatJson(conversion: CollectionConversion): string {
  const { collection, outcomes } = conversion;
  const enriched = {
    timeUnit: collection.timeUnit ?? null,
    members: collection.members.map((member, i) => {
      const outcome = outcomes[i];
      return {
        id: member.id,
        timeUnit: member.axis.label,
        ...(member.axis.descriptor !== undefined
          ? { canonicalUnit: canonicalLabel(member.axis.descriptor), descriptor: member.axis.descriptor }
          : {}),
        times: member.axis.times,
        ...(member.values !== undefined ? { values: member.values } : {}),
        ...(member.axis.log.length > 0 ? { log: member.axis.log } : {}),
        reordered: outcome !== undefined && outcome.ok ? outcome.reordered : false,
        ...(outcome !== undefined && !outcome.ok ? { error: outcome.error.message } : {}),
      };
    }),
  };
  return JSON.stringify(enriched, null, 2);
}
