import { z } from "zod";

export const dataRowSchema = z.record(z.unknown());

export type DataRow = z.infer<typeof dataRowSchema>;

/**
 * `/data/{id}` answers with a bare row array; an envelope carrying the rows
 * under `data` is accepted too, and its other fields are dropped.
 */
export const dataResponseSchema = z.union([
  z.array(dataRowSchema),
  z.object({ data: z.array(dataRowSchema) }).passthrough(),
]);

export type DataResponse = z.infer<typeof dataResponseSchema>;
