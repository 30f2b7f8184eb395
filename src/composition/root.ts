import { runDrivers, type RunReport } from "../application/orchestrator/runDrivers";
import { driverNames, findDriver, reportJobCatalog, type ReportJobDefinition } from "../application/report-jobs/catalog";
import { runReportJob } from "../application/report-jobs/runReportJob";
import { UnknownDriverError } from "../core/errors";
import type { PollingOptions } from "../core/reports/report.types";
import type { RunMode } from "../core/windows/dateWindows";
import { defaultTransportConfig, ResilientTransport } from "../infrastructure/http/ResilientTransport";
import { MongoReportSink } from "../infrastructure/mongo/MongoReportSink";
import { SpApiCatalogClient } from "../infrastructure/sp-api/SpApiCatalogClient";
import { LwaCredentialProvider, loadLwaCredentials } from "../infrastructure/sp-api/LwaCredentialProvider";
import { extractAsins, SpApiInventoryClient } from "../infrastructure/sp-api/SpApiInventoryClient";
import { SpApiOrdersClient } from "../infrastructure/sp-api/SpApiOrdersClient";
import { SpApiReportsClient } from "../infrastructure/sp-api/SpApiReportsClient";
import { LocalFileSink } from "../infrastructure/storage/LocalFileSink";
import { S3ReportSink } from "../infrastructure/storage/S3ReportSink";
import type { ReportSink } from "../ports/ReportSink";
import { type Env, loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import type { Sleep } from "../shared/time/sleep";

export type RunReportsOptions = {
  mode: RunMode;
  driver?: string;
  signal?: AbortSignal;
};

export type CompositionOverrides = {
  sleep?: Sleep;
  fetchFn?: typeof fetch;
  now?: () => Date;
  sink?: ReportSink;
  catalog?: readonly ReportJobDefinition[];
};

export const createSink = (env: Env): ReportSink => {
  switch (env.SINK) {
    case "local":
      return new LocalFileSink(env.OUTPUT_DIR);
    case "s3":
      if (!env.S3_BUCKET) throw new Error("S3_BUCKET is required when SINK=s3");
      return new S3ReportSink({
        bucket: env.S3_BUCKET,
        prefix: env.S3_PREFIX,
        region: env.S3_REGION,
        endpoint: env.S3_ENDPOINT
      });
    case "mongo":
      return new MongoReportSink(env.MONGO_URI);
  }
};

export const applyPollingOverride = (
  catalog: readonly ReportJobDefinition[],
  override: Partial<PollingOptions>
): ReportJobDefinition[] =>
  catalog.map((definition) =>
    Object.keys(override).length === 0 ? definition : { ...definition, polling: { ...definition.polling, ...override } }
  );

/**
 * Builds every dependency from the environment once, then runs the selected drivers.
 * Config and credential problems throw before any request is made.
 */
export const runReports = async (
  options: RunReportsOptions,
  processEnv: NodeJS.ProcessEnv = process.env,
  overrides: CompositionOverrides = {}
): Promise<RunReport> => {
  const catalog = overrides.catalog ?? reportJobCatalog;
  if (options.driver != null && !findDriver(options.driver, catalog)) {
    throw new UnknownDriverError(options.driver, driverNames(catalog));
  }

  const env = loadEnv(processEnv);
  const runtime = loadRuntimeConfigFromEnv(processEnv);
  const credentials = loadLwaCredentials(processEnv);

  const transport = new ResilientTransport(
    {
      timeoutMs: runtime.timeoutMs,
      statusPolicy: { ...defaultTransportConfig.statusPolicy, maxAttempts: runtime.httpMaxAttempts }
    },
    overrides.sleep,
    overrides.fetchFn
  );
  const provider = new LwaCredentialProvider(transport, credentials, env.SP_API_ENDPOINT, env.LWA_TOKEN_URL);
  // An unusable refresh token fails the whole run before any driver starts.
  await provider.getBearerToken();

  const reports = new SpApiReportsClient(transport, provider, env.SP_API_ENDPOINT);
  const inventory = new SpApiInventoryClient(transport, provider, env.SP_API_ENDPOINT);
  const catalogItems = new SpApiCatalogClient(transport, provider, env.SP_API_ENDPOINT);
  const orders = new SpApiOrdersClient(transport, provider, env.SP_API_ENDPOINT, env.MARKETPLACE_IDS, 1000, overrides.sleep);
  const sink = overrides.sink ?? createSink(env);

  let identifiers: Promise<string[]> | undefined;
  const listIdentifiers = (signal?: AbortSignal): Promise<string[]> => {
    if (!identifiers) {
      identifiers = inventory.listInventorySummaries(env.MARKETPLACE_IDS[0], { signal }).then(extractAsins);
      // A failed lookup is retried by the next driver that needs it.
      void identifiers.catch(() => {
        identifiers = undefined;
      });
    }
    return identifiers;
  };

  const definitions = applyPollingOverride(catalog, runtime.pollingOverride);

  try {
    return await runDrivers(
      definitions,
      (definition) =>
        runReportJob(
          definition,
          {
            reports,
            inventory,
            orders,
            catalog: catalogItems,
            sink,
            listIdentifiers,
            sleep: overrides.sleep,
            now: overrides.now,
            signal: options.signal
          },
          { ...runtime.reportJob, mode: options.mode, marketplaceIds: env.MARKETPLACE_IDS }
        ),
      { mode: options.mode, only: options.driver, concurrency: runtime.concurrency, signal: options.signal }
    );
  } finally {
    await sink.close?.();
  }
};
