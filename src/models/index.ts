export type { HealthBody, HealthStatus } from "./health";
export type {
  Visibility,
  DatasetRecord,
  MetadataRecord,
  DatasetMetadata,
} from "./catalog";
export type { DataRow, DataResponse } from "./data";
