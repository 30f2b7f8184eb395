export type SinkKind = "local" | "s3" | "mongo";

export type Env = {
  SP_API_ENDPOINT: string;
  LWA_TOKEN_URL: string;
  MARKETPLACE_IDS: string[];
  SINK: SinkKind;
  OUTPUT_DIR: string;
  S3_BUCKET?: string;
  S3_PREFIX: string;
  S3_REGION?: string;
  S3_ENDPOINT?: string;
  MONGO_URI: string;
};

const SINK_KINDS: readonly SinkKind[] = ["local", "s3", "mongo"];

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value.replace(/\/+$/, "");
};

const optional = (value: string | undefined): string | undefined => {
  const normalized = value?.trim();
  return normalized ? normalized : undefined;
};

const parseSinkKind = (raw: string): SinkKind => {
  const match = SINK_KINDS.find((kind) => kind === raw);
  if (!match) {
    throw new Error(`SINK must be one of ${SINK_KINDS.join(", ")}. Received: ${raw}`);
  }
  return match;
};

const parseMarketplaceIds = (raw: string): string[] => {
  const ids = raw.split(",").map((id) => id.trim()).filter((id) => id !== "");
  if (ids.length === 0) {
    throw new Error("MARKETPLACE_IDS must list at least one marketplace id");
  }
  return ids;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const SP_API_ENDPOINT = validateHttpUrl(
    "SP_API_ENDPOINT",
    optional(env.SP_API_ENDPOINT) ?? "https://sellingpartnerapi-fe.amazon.com"
  );
  const LWA_TOKEN_URL = validateHttpUrl("LWA_TOKEN_URL", optional(env.LWA_TOKEN_URL) ?? "https://api.amazon.com/auth/o2/token");
  const MARKETPLACE_IDS = parseMarketplaceIds(env.MARKETPLACE_IDS ?? "A1VC38T7YXB528");
  const SINK = parseSinkKind(optional(env.SINK) ?? "local");
  const OUTPUT_DIR = optional(env.OUTPUT_DIR) ?? "./output";
  const S3_BUCKET = optional(env.S3_BUCKET);
  const S3_PREFIX = env.S3_PREFIX?.trim() ?? "";
  const S3_REGION = optional(env.S3_REGION) ?? optional(env.AWS_REGION);
  const s3Endpoint = optional(env.S3_ENDPOINT);
  const S3_ENDPOINT = s3Endpoint ? validateHttpUrl("S3_ENDPOINT", s3Endpoint) : undefined;
  const MONGO_URI = optional(env.MONGO_URI) ?? "mongodb://localhost:27017/seller_reports";

  if (SINK === "s3" && !S3_BUCKET) {
    throw new Error("S3_BUCKET is required when SINK=s3");
  }

  return {
    SP_API_ENDPOINT,
    LWA_TOKEN_URL,
    MARKETPLACE_IDS,
    SINK,
    OUTPUT_DIR,
    S3_BUCKET,
    S3_PREFIX,
    S3_REGION,
    S3_ENDPOINT,
    MONGO_URI
  };
};
