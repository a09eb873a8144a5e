import { readFile } from "node:fs/promises";

import type { PolygonTimeSeries } from "../../modules/alert-engine/types.js";
import { parseMeteogramSnapshot } from "./schema.js";
import type { MeteogramSource } from "./types.js";

export class JsonFileMeteogramSource implements MeteogramSource {
  constructor(private readonly path: string) {
    if (!path || path.trim() === "") {
      throw new Error("JsonFileMeteogramSource requires a non-empty path");
    }
  }

  async load(): Promise<PolygonTimeSeries> {
    const text = await readFile(this.path, "utf8");
    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch (error) {
      throw new Error(
        `Failed to parse meteogram snapshot ${this.path}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
    return parseMeteogramSnapshot(payload);
  }
}
