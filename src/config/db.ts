import type { PpiContextOptions } from "../../services/ppi.context.ts";
import type { Env } from "./env.ts";

/** Map validated environment to PpiContext options. */
export function contextOptionsFromEnv(env: Env): PpiContextOptions {
  return {
    edges: { location: env.EDGES_PARQUET_URL, remoteScan: env.EDGES_REMOTE_SCAN },
    idmap: { location: env.IDMAP_PARQUET_URL, remoteScan: env.IDMAP_REMOTE_SCAN },
    loaderOptions: {
      cacheDir: env.PPI_CACHE_DIR,
      timeoutMs: env.DOWNLOAD_TIMEOUT_MS,
    },
  };
}
