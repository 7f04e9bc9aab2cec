import { describe, expect, it } from "vitest";
import { contextOptionsFromEnv } from "../src/config/db.ts";
import { EnvValidationError, parseEnv } from "../src/config/env.ts";

describe("parseEnv", () => {
  it("applies defaults", () => {
    const env = parseEnv({ EDGES_PARQUET_URL: "data/edges.parquet", IDMAP_PARQUET_URL: "data/idmap.parquet" });
    expect(env).toEqual({
      EDGES_PARQUET_URL: "data/edges.parquet",
      IDMAP_PARQUET_URL: "data/idmap.parquet",
      EDGES_REMOTE_SCAN: false,
      IDMAP_REMOTE_SCAN: false,
      PPI_CACHE_DIR: undefined,
      DOWNLOAD_TIMEOUT_MS: 300_000,
      HOST: "0.0.0.0",
      PORT: 3000,
      LOG_LEVEL: "info",
    });
  });

  it("lists every invalid variable", () => {
    expect(() => parseEnv({ PORT: "http" })).toThrow(
      new EnvValidationError(
        "Invalid environment: EDGES_PARQUET_URL: Required; IDMAP_PARQUET_URL: Required; PORT: Expected number, received nan"
      )
    );
  });

  it("maps flags and loader settings onto context options", () => {
    const env = parseEnv({
      EDGES_PARQUET_URL: "https://example.org/edges.parquet",
      IDMAP_PARQUET_URL: "https://example.org/idmap.parquet",
      EDGES_REMOTE_SCAN: "1",
      PPI_CACHE_DIR: "/var/cache/ppi",
      DOWNLOAD_TIMEOUT_MS: "5000",
    });
    expect(contextOptionsFromEnv(env)).toEqual({
      edges: { location: "https://example.org/edges.parquet", remoteScan: true },
      idmap: { location: "https://example.org/idmap.parquet", remoteScan: false },
      loaderOptions: { cacheDir: "/var/cache/ppi", timeoutMs: 5000 },
    });
  });
});
