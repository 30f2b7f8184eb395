import { MalformedResponseError } from "../../core/errors";
import { sanitizeUrl } from "../http/ResilientTransport";

export const SP_API_ACCESS_TOKEN_HEADER = "x-amz-access-token";

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const readJsonObject = async (res: Response, rawUrl: string): Promise<Record<string, unknown>> => {
  const url = sanitizeUrl(new URL(rawUrl));
  let json: unknown;
  try {
    json = await res.json();
  } catch (err) {
    throw new MalformedResponseError({ message: `Response from ${url} is not valid JSON`, url, cause: err });
  }

  if (!isRecord(json)) {
    throw new MalformedResponseError({ message: `Response from ${url} is not a JSON object`, url });
  }
  return json;
};

export const requireString = (body: Record<string, unknown>, field: string, rawUrl: string): string => {
  const value = body[field];
  if (typeof value !== "string" || value.trim() === "") {
    const url = sanitizeUrl(new URL(rawUrl));
    throw new MalformedResponseError({ message: `Response from ${url} has no ${field}`, url });
  }
  return value;
};

export const optionalString = (body: Record<string, unknown>, field: string): string | undefined => {
  const value = body[field];
  return typeof value === "string" && value !== "" ? value : undefined;
};
