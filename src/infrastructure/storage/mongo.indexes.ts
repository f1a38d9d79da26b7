import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

/**
 * Index plan for record collections:
 * - unique compound index over the deduplication keys (upsert target)
 * - { scrapedAt: 1 } for recency queries
 */
export const recordIndexes = (
  primaryKeys: readonly string[]
): Array<{ keys: IndexSpecification; options: CreateIndexesOptions }> => [
  {
    keys: Object.fromEntries(primaryKeys.map((key) => [key, 1])),
    options: { unique: true, name: `uniq_${primaryKeys.join("_")}` }
  },
  { keys: { scrapedAt: 1 }, options: { name: "scrapedAt_1" } }
];
