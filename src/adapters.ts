import type { z } from "zod";
import { InvalidResponseError } from "./errors";
import {
  datasetListSchema,
  datasetMetadataSchema,
  metadataListSchema,
} from "./models/catalog";
import type { DatasetMetadata } from "./models/catalog";
import { dataResponseSchema } from "./models/data";
import type { HealthStatus } from "./models/health";
import { Table } from "./table";
import type { TransportResult } from "./transport";

const HEALTHY_STATUSES = new Set(["ok", "healthy", "up", "pass"]);

function validate<S extends z.ZodTypeAny>(
  schema: S,
  result: TransportResult,
  endpoint: string,
): z.output<S> {
  const parsed = schema.safeParse(result.body);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 3)
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidResponseError(
      `Unexpected response shape from ${endpoint} (${details})`,
      result.status,
      result.body,
    );
  }
  return parsed.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Any JSON is accepted; health is only derived from an object body. */
export function adaptHealth(result: TransportResult): HealthStatus {
  const body = result.body;
  if (!isRecord(body)) {
    return { ok: false, status: null, body };
  }
  const status = typeof body.status === "string" ? body.status : null;
  return {
    ok: body.ok === true || (status !== null && HEALTHY_STATUSES.has(status.toLowerCase())),
    status,
    body,
  };
}

export function adaptDatasets(result: TransportResult): Table {
  return Table.fromRecords(validate(datasetListSchema, result, "/datasets").data);
}

export function adaptMetadata(result: TransportResult): Table {
  return Table.fromRecords(validate(metadataListSchema, result, "/metadata").data);
}

export function adaptMetadataOne(result: TransportResult): DatasetMetadata {
  return validate(datasetMetadataSchema, result, "/metadata/{id}");
}

export function adaptData(result: TransportResult): Table {
  const parsed = validate(dataResponseSchema, result, "/data/{id}");
  return Table.fromRecords(Array.isArray(parsed) ? parsed : parsed.data);
}
