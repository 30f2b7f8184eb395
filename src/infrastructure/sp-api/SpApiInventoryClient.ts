import { MalformedResponseError } from "../../core/errors";
import type { CredentialProvider } from "../../ports/CredentialProvider";
import type { InventoryApi, InventorySummary } from "../../ports/InventoryApi";
import type { CallOptions } from "../../ports/ReportsApi";
import type { ResilientTransport } from "../http/ResilientTransport";
import { sanitizeUrl } from "../http/ResilientTransport";
import { isRecord, optionalString, readJsonObject, SP_API_ACCESS_TOKEN_HEADER } from "./spApiJson";

const INVENTORY_SUMMARIES_PATH = "/fba/inventory/v1/summaries";

/**
 * FBA inventory summaries for a marketplace, following `pagination.nextToken` until exhausted.
 */
export class SpApiInventoryClient implements InventoryApi {
  constructor(
    private readonly transport: ResilientTransport,
    private readonly credentials: CredentialProvider,
    private readonly baseUrl: string,
    private readonly maxPages = 1000
  ) {}

  async listInventorySummaries(marketplaceId: string, options: CallOptions = {}): Promise<InventorySummary[]> {
    const url = `${this.baseUrl}${INVENTORY_SUMMARIES_PATH}`;
    const summaries: InventorySummary[] = [];
    let nextToken: string | undefined;
    let page = 0;

    do {
      page += 1;
      if (page > this.maxPages) {
        throw new MalformedResponseError({
          message: `Inventory pagination exceeded ${this.maxPages} pages`,
          url: sanitizeUrl(new URL(url))
        });
      }

      const res = await this.transport.execute("GET", url, {
        headers: {
          [SP_API_ACCESS_TOKEN_HEADER]: await this.credentials.getBearerToken(),
          accept: "application/json"
        },
        query: {
          marketplaceIds: marketplaceId,
          granularityType: "Marketplace",
          granularityId: marketplaceId,
          details: "true",
          nextToken
        },
        signal: options.signal
      });
      const body = await readJsonObject(res, url);

      // Some responses carry the list at the top level instead of under `payload`.
      const payload = isRecord(body.payload) ? body.payload : body;
      const items = payload.inventorySummaries;
      if (Array.isArray(items)) {
        for (const item of items) {
          if (isRecord(item)) summaries.push(item);
        }
      }

      nextToken = isRecord(body.pagination) ? optionalString(body.pagination, "nextToken") : undefined;
      console.log(JSON.stringify({ event: "inventory.page_fetched", page, total: summaries.length }));
    } while (nextToken);

    return summaries;
  }
}

/** Sorted, de-duplicated ASINs from an inventory snapshot. */
export const extractAsins = (summaries: readonly InventorySummary[]): string[] => {
  const asins = new Set<string>();
  for (const summary of summaries) {
    if (typeof summary.asin === "string" && summary.asin.trim() !== "") {
      asins.add(summary.asin.trim());
    }
  }
  return [...asins].sort();
};
