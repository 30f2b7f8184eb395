import { HttpError } from "../../core/errors";
import type { CatalogApi, CatalogItem, CatalogItemQuery } from "../../ports/CatalogApi";
import type { CredentialProvider } from "../../ports/CredentialProvider";
import type { CallOptions } from "../../ports/ReportsApi";
import type { ResilientTransport } from "../http/ResilientTransport";
import { readJsonObject, SP_API_ACCESS_TOKEN_HEADER } from "./spApiJson";

const CATALOG_ITEMS_PATH = "/catalog/2022-04-01/items";

/**
 * Catalog Items 2022-04-01, one ASIN per call.
 */
export class SpApiCatalogClient implements CatalogApi {
  constructor(
    private readonly transport: ResilientTransport,
    private readonly credentials: CredentialProvider,
    private readonly baseUrl: string
  ) {}

  async getCatalogItem(asin: string, query: CatalogItemQuery, options: CallOptions = {}): Promise<CatalogItem | undefined> {
    const url = `${this.baseUrl}${CATALOG_ITEMS_PATH}/${encodeURIComponent(asin)}`;

    let res: Response;
    try {
      res = await this.transport.execute("GET", url, {
        headers: {
          [SP_API_ACCESS_TOKEN_HEADER]: await this.credentials.getBearerToken(),
          accept: "application/json"
        },
        query: { marketplaceIds: query.marketplaceId, includedData: query.includedData },
        signal: options.signal
      });
    } catch (err) {
      if (err instanceof HttpError && err.status === 404) {
        console.warn(JSON.stringify({ event: "catalog.item_not_found", asin, marketplaceId: query.marketplaceId }));
        return undefined;
      }
      throw err;
    }

    return readJsonObject(res, url);
  }
}
