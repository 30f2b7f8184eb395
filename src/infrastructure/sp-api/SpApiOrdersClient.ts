import { MalformedResponseError } from "../../core/errors";
import type { CredentialProvider } from "../../ports/CredentialProvider";
import type { OrdersApi, OrdersQuery, RawOrder } from "../../ports/OrdersApi";
import type { CallOptions } from "../../ports/ReportsApi";
import type { Sleep } from "../../shared/time/sleep";
import { sleep as defaultSleep } from "../../shared/time/sleep";
import type { ResilientTransport } from "../http/ResilientTransport";
import { sanitizeUrl } from "../http/ResilientTransport";
import { isRecord, optionalString, readJsonObject, SP_API_ACCESS_TOKEN_HEADER } from "./spApiJson";

export const ORDERS_PATH = "/orders/v0/orders";
export const ORDERS_DATA_ELEMENTS: readonly string[] = ["buyerInfo", "shippingAddress"];

/**
 * getOrders with a restricted data token so buyer and address fields are included.
 * Follow-up pages send only `NextToken`.
 */
export class SpApiOrdersClient implements OrdersApi {
  constructor(
    private readonly transport: ResilientTransport,
    private readonly credentials: CredentialProvider,
    private readonly baseUrl: string,
    private readonly marketplaceIds: readonly string[],
    private readonly pageDelayMs = 1000,
    private readonly sleep: Sleep = defaultSleep,
    private readonly maxPages = 1000
  ) {}

  async listOrders(query: OrdersQuery, options: CallOptions = {}): Promise<RawOrder[]> {
    const url = `${this.baseUrl}${ORDERS_PATH}`;
    const token = await this.credentials.getScopedToken(ORDERS_PATH, "GET", ORDERS_DATA_ELEMENTS);
    const orders: RawOrder[] = [];
    let nextToken: string | undefined;
    let page = 0;

    while (true) {
      page += 1;
      if (page > this.maxPages) {
        throw new MalformedResponseError({
          message: `Orders pagination exceeded ${this.maxPages} pages`,
          url: sanitizeUrl(new URL(url))
        });
      }

      const res = await this.transport.execute("GET", url, {
        headers: { [SP_API_ACCESS_TOKEN_HEADER]: token, accept: "application/json" },
        query: nextToken
          ? { NextToken: nextToken }
          : {
              MarketplaceIds: this.marketplaceIds,
              LastUpdatedAfter: query.lastUpdatedAfter,
              LastUpdatedBefore: query.lastUpdatedBefore
            },
        signal: options.signal
      });
      const body = await readJsonObject(res, url);
      const payload: Record<string, unknown> = isRecord(body.payload) ? body.payload : {};
      const items = payload.Orders;
      if (Array.isArray(items)) {
        for (const item of items) {
          if (isRecord(item)) orders.push(item);
        }
      }

      nextToken = optionalString(payload, "NextToken");
      if (!nextToken) break;
      await this.sleep(this.pageDelayMs, options.signal);
    }

    return orders;
  }
}
