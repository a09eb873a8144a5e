import type { PolygonTimeSeries } from "../../modules/alert-engine/types.js";

/** Supplies an already-parsed meteogram; the engine never sees raw bytes. */
export interface MeteogramSource {
  load(): Promise<PolygonTimeSeries>;
}
