import type { HttpMethod } from "../core/http/http.types";

export interface CredentialProvider {
  getBearerToken(): Promise<string>;
  getScopedToken(resourcePath: string, method: HttpMethod, dataElements: readonly string[]): Promise<string>;
}
