/** Whatever `/health` answered with; usually `{ status: "ok", ... }`. */
export type HealthBody = unknown;

export interface HealthStatus {
  /** True when the service reports itself healthy. */
  ok: boolean;
  status: string | null;
  body: HealthBody;
}
