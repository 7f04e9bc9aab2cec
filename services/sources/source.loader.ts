/**
 * Source loader — resolve a table source (local path or http(s) URL) to
 * something DuckDB can scan.
 *
 * Remote sources are downloaded once into a cache directory and then read
 * locally: static hosts often reject the range requests a remote columnar scan
 * needs. Sources flagged `remoteScan` skip the download and are read in place
 * through httpfs.
 *
 * Cache file: <cacheDir>/<role>-<sha256(url) first 12 hex><ext>. An existing
 * non-empty file is reused; concurrent resolutions of one URL share a download.
 */

import { createHash, randomUUID } from "node:crypto";
import { createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { Logger } from "../types.ts";

// ─── Errors ─────────────────────────────────────────────────────────────────

export const SourceLoadErrorCode = {
  DOWNLOAD_FAILED: "DOWNLOAD_FAILED",
  HTTP_STATUS: "HTTP_STATUS",
  TIMEOUT: "TIMEOUT",
  OPEN_FAILED: "OPEN_FAILED",
} as const;

export type SourceLoadErrorCode =
  (typeof SourceLoadErrorCode)[keyof typeof SourceLoadErrorCode];

export class SourceLoadError extends Error {
  readonly code: SourceLoadErrorCode;
  /** URL or path of the failing source. */
  readonly source: string;
  readonly status?: number;

  constructor(
    code: SourceLoadErrorCode,
    source: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SourceLoadError";
    this.code = code;
    this.source = source;
    this.status = options?.status;
    Object.setPrototypeOf(this, SourceLoadError.prototype);
  }
}

// ─── Types ──────────────────────────────────────────────────────────────────

export type SourceFormat = "parquet" | "csv" | "tsv";

/** A table source as configured: location plus whether to scan it remotely. */
export interface TableSource {
  /** Local file path or http(s) URL. */
  location: string;
  remoteScan?: boolean;
}

/** Where DuckDB should read the table from. */
export interface ResolvedSource {
  /** Local path, or the URL itself for remote scans. */
  location: string;
  format: SourceFormat;
  remote: boolean;
  /** True when this call (not an earlier one) fetched the file. */
  downloaded: boolean;
}

export interface SourceLoaderOptions {
  cacheDir?: string;
  timeoutMs?: number;
  fetch?: typeof fetch;
  log?: Logger;
}

// ─── Constants ──────────────────────────────────────────────────────────────

export const DEFAULT_CACHE_DIR = path.join(tmpdir(), "ppi_explorer");
export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 300_000;

const DOWNLOAD_HEADERS = {
  "User-Agent": "Mozilla/5.0 (ppi-explorer)",
  Accept: "application/octet-stream",
};

// ─── Helpers ────────────────────────────────────────────────────────────────

export function isRemote(location: string): boolean {
  return /^https?:\/\//i.test(location);
}

/** Strip query string and fragment, then return the path component. */
function locationPath(location: string): string {
  if (!isRemote(location)) return location;
  return new URL(location).pathname;
}

export function detectFormat(location: string): SourceFormat {
  const p = locationPath(location).toLowerCase().replace(/\.gz$/, "");
  if (p.endsWith(".csv")) return "csv";
  if (p.endsWith(".tsv")) return "tsv";
  return "parquet";
}

function cacheExtension(url: string): string {
  const p = locationPath(url).toLowerCase();
  const gz = p.endsWith(".gz") ? ".gz" : "";
  return `.${detectFormat(url)}${gz}`;
}

export function cacheFileName(role: string, url: string): string {
  const digest = createHash("sha256").update(url).digest("hex").slice(0, 12);
  return `${role}-${digest}${cacheExtension(url)}`;
}

async function isNonEmptyFile(file: string): Promise<boolean> {
  try {
    const s = await stat(file);
    return s.isFile() && s.size > 0;
  } catch {
    return false;
  }
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

// ─── Loader ─────────────────────────────────────────────────────────────────

export class SourceLoader {
  readonly cacheDir: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private readonly log: Logger;
  private readonly inflight = new Map<string, Promise<boolean>>();

  constructor(options: SourceLoaderOptions = {}) {
    this.cacheDir = options.cacheDir ?? DEFAULT_CACHE_DIR;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_DOWNLOAD_TIMEOUT_MS;
    this.fetchFn = options.fetch ?? fetch;
    this.log = options.log ?? console;
  }

  /**
   * Resolve one source. `role` names the table ("edges", "idmap") and prefixes
   * the cache file.
   */
  async resolve(role: string, source: TableSource): Promise<ResolvedSource> {
    const format = detectFormat(source.location);
    if (!isRemote(source.location)) {
      return { location: path.resolve(source.location), format, remote: false, downloaded: false };
    }
    if (source.remoteScan) {
      return { location: source.location, format, remote: true, downloaded: false };
    }

    const target = path.join(this.cacheDir, cacheFileName(role, source.location));
    let pending = this.inflight.get(target);
    if (pending) {
      await pending;
      return { location: target, format, remote: false, downloaded: false };
    }

    pending = this.reuseOrDownload(role, source.location, target);
    this.inflight.set(target, pending);
    let fetched: boolean;
    try {
      fetched = await pending;
    } catch (err) {
      this.inflight.delete(target);
      throw err;
    }
    return { location: target, format, remote: false, downloaded: fetched };
  }

  /** Resolves true when this call downloaded the file, false when a cached copy was reused. */
  private async reuseOrDownload(role: string, url: string, target: string): Promise<boolean> {
    if (await isNonEmptyFile(target)) {
      this.log.debug({ role, file: target }, "reusing cached source");
      return false;
    }
    await this.download(url, target);
    return true;
  }

  private async download(url: string, target: string): Promise<void> {
    await mkdir(this.cacheDir, { recursive: true });
    const partial = `${target}.${randomUUID()}.part`;
    const t0 = performance.now();
    this.log.info({ url, file: target }, "downloading source");

    try {
      let res: Response;
      try {
        res = await this.fetchFn(url, {
          headers: DOWNLOAD_HEADERS,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (err) {
        throw this.fetchError(url, err);
      }

      if (!res.ok) {
        throw new SourceLoadError(
          SourceLoadErrorCode.HTTP_STATUS,
          url,
          `Download of ${url} failed: ${res.status} ${res.statusText}`.trimEnd(),
          { status: res.status }
        );
      }
      if (!res.body) {
        throw new SourceLoadError(SourceLoadErrorCode.DOWNLOAD_FAILED, url, `Download of ${url} returned no body`, {
          status: res.status,
        });
      }

      try {
        await pipeline(Readable.fromWeb(res.body), createWriteStream(partial));
      } catch (err) {
        throw this.fetchError(url, err);
      }
      await rename(partial, target);
    } catch (err) {
      await rm(partial, { force: true });
      throw err;
    }

    this.log.info({ url, ms: Math.round(performance.now() - t0) }, "downloaded source");
  }

  private fetchError(url: string, err: unknown): SourceLoadError {
    if (isTimeout(err)) {
      return new SourceLoadError(
        SourceLoadErrorCode.TIMEOUT,
        url,
        `Download of ${url} timed out after ${this.timeoutMs}ms`,
        { cause: err }
      );
    }
    const reason = err instanceof Error ? err.message : String(err);
    return new SourceLoadError(SourceLoadErrorCode.DOWNLOAD_FAILED, url, `Download of ${url} failed: ${reason}`, {
      cause: err,
    });
  }
}
