import { z } from "zod";

export const KNOWN_VISIBILITIES = ["public", "paid", "pro"] as const;

export const visibilitySchema = z.enum(KNOWN_VISIBILITIES);

/** Server-declared access tier. Enforced by the server only; new tiers pass through. */
export type Visibility = z.infer<typeof visibilitySchema> | (string & {});

// Known fields are typed but lenient: the server owns their shape.
export const datasetRecordSchema = z
  .object({
    id: z.union([z.string(), z.number()]).nullish(),
    visibility: z.union([visibilitySchema, z.string()]).nullish(),
    topic: z.string().nullish(),
    subtopic: z.string().nullish(),
  })
  .passthrough();

export type DatasetRecord = z.infer<typeof datasetRecordSchema>;

export const metadataRecordSchema = datasetRecordSchema
  .extend({
    title: z.string().nullish(),
    description: z.string().nullish(),
  })
  .passthrough();

export type MetadataRecord = z.infer<typeof metadataRecordSchema>;

/** `{ ..., data: [records] }`; a missing `data` means an empty catalog. */
export function listEnvelopeSchema<T extends z.ZodTypeAny>(record: T) {
  return z
    .object({
      data: z.array(record).default([]),
    })
    .passthrough();
}

export const datasetListSchema = listEnvelopeSchema(datasetRecordSchema);
export const metadataListSchema = listEnvelopeSchema(metadataRecordSchema);

/** Response of `/metadata/{id}`. `meta` and `schema` are exposed verbatim. */
export const datasetMetadataSchema = z
  .object({
    id: z.unknown().optional(),
    meta: z.unknown().optional(),
    schema: z.unknown().optional(),
  })
  .passthrough();

export type DatasetMetadata = z.infer<typeof datasetMetadataSchema>;
