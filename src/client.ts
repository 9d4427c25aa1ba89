import {
  adaptData,
  adaptDatasets,
  adaptHealth,
  adaptMetadata,
  adaptMetadataOne,
} from "./adapters";
import type { ClientConfig, ClientOptions, EnvAccessor } from "./config";
import { processEnv, resolveConfig } from "./config";
import type { ResponseMeta } from "./meta";
import type { DatasetMetadata } from "./models/catalog";
import type { HealthStatus } from "./models/health";
import type { DataQuery, Operation } from "./request";
import { buildRequest } from "./request";
import type { Table } from "./table";
import { Transport } from "./transport";
import type { TransportResult } from "./transport";

export interface CallOptions {
  /** Cancels the call, including any pending retry. */
  signal?: AbortSignal;
}

/**
 * Client for the Furnilytics dataset catalog.
 *
 * The API key is optional; public datasets work without it. Calls may run
 * concurrently on one instance, but `lastResponseMeta` is then last-writer-wins
 * and only advisory.
 *
 * @example
 * ```typescript
 * const client = new FurnilyticsClient();
 * const rows = await client.data("macro_economics/prices/eu_hicp_energy", { limit: 5 });
 * console.log(rows.columns, rows.length);
 * ```
 */
export class FurnilyticsClient {
  private readonly _config: ClientConfig;
  private readonly _transport: Transport;
  private _lastMeta: ResponseMeta | null = null;

  constructor(options: ClientOptions = {}, env: EnvAccessor = processEnv) {
    this._config = resolveConfig(options, env);
    this._transport = new Transport(this._config);
  }

  get config(): ClientConfig {
    return this._config;
  }

  /** Metadata of the last response received by any call, or null before the first. */
  get lastResponseMeta(): ResponseMeta | null {
    return this._lastMeta ? { ...this._lastMeta, params: { ...this._lastMeta.params } } : null;
  }

  async health(options?: CallOptions): Promise<HealthStatus> {
    return adaptHealth(await this.call({ op: "health" }, options));
  }

  /** The dataset catalog, one row per dataset. */
  async datasets(options?: CallOptions): Promise<Table> {
    return adaptDatasets(await this.call({ op: "datasets" }, options));
  }

  /** Metadata items for every dataset, one row each. */
  async metadata(options?: CallOptions): Promise<Table> {
    return adaptMetadata(await this.call({ op: "metadata" }, options));
  }

  async metadataOne(id: string, options?: CallOptions): Promise<DatasetMetadata> {
    return adaptMetadataOne(await this.call({ op: "metadataOne", id }, options));
  }

  /**
   * Data rows of one dataset. `from`/`to` are `YYYY-MM-DD` and passed through
   * as-is; the server validates them.
   */
  async data(id: string, query: DataQuery = {}, options?: CallOptions): Promise<Table> {
    return adaptData(await this.call({ op: "data", id, query }, options));
  }

  private async call(operation: Operation, options?: CallOptions): Promise<TransportResult> {
    const request = buildRequest(this._config, operation);
    return this._transport.execute(request, {
      signal: options?.signal,
      onMeta: (meta) => {
        this._lastMeta = meta;
      },
    });
  }
}
