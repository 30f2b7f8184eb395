import type { CallOptions } from "./ReportsApi";

export type RawOrder = Record<string, unknown>;

export type OrdersQuery = {
  lastUpdatedAfter: string;
  lastUpdatedBefore: string;
};

export interface OrdersApi {
  listOrders(query: OrdersQuery, options?: CallOptions): Promise<RawOrder[]>;
}
