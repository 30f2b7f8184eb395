import type { CallOptions } from "./ReportsApi";

export type CatalogItem = Record<string, unknown>;

export type CatalogItemQuery = {
  marketplaceId: string;
  includedData: readonly string[];
};

export interface CatalogApi {
  /** Resolves to `undefined` when the item is unknown in the marketplace. */
  getCatalogItem(asin: string, query: CatalogItemQuery, options?: CallOptions): Promise<CatalogItem | undefined>;
}
