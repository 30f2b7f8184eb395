import type { CallOptions } from "./ReportsApi";

export type InventorySummary = Record<string, unknown> & {
  asin?: string;
};

export interface InventoryApi {
  listInventorySummaries(marketplaceId: string, options?: CallOptions): Promise<InventorySummary[]>;
}
