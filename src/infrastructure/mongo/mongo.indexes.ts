import type { CreateIndexesOptions, IndexSpecification } from "mongodb";

export type IndexPlan = {
  keys: IndexSpecification;
  options: CreateIndexesOptions;
};

/**
 * Index plan applied when the sink first connects: one document per object name.
 */
export const mongoIndexes: { reportObjects: readonly IndexPlan[] } = {
  reportObjects: [{ keys: { name: 1 }, options: { unique: true } }]
};
