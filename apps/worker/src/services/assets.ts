import { promises as fs } from "node:fs";
import { extname } from "node:path";
import { fileURLToPath } from "node:url";

import { DownloadFailedError } from "@voxreel/shared/errors/render";

import { cleanupTempFileSafe, fileExists } from "../lib/tempCleanup";
import type { AssetSource, LoggerLike, StorageAdapter } from "../pipelines/types";

const STORAGE_SCHEME = "storage://";

export interface StorageReference {
  bucket: string;
  path: string;
}

/** `storage://<bucket>/<path>` → bucket and object path. */
export function parseStorageReference(reference: string): StorageReference | null {
  if (!reference.startsWith(STORAGE_SCHEME)) return null;
  const rest = reference.slice(STORAGE_SCHEME.length);
  const slash = rest.indexOf("/");
  if (slash <= 0 || slash === rest.length - 1) return null;
  return { bucket: rest.slice(0, slash), path: rest.slice(slash + 1) };
}

export function isHttpReference(reference: string): boolean {
  return /^https?:\/\//i.test(reference);
}

export function isLocalReference(reference: string): boolean {
  return !isHttpReference(reference) && !reference.startsWith(STORAGE_SCHEME);
}

function toLocalPath(reference: string): string {
  return reference.startsWith("file://") ? fileURLToPath(reference) : reference;
}

/**
 * File extension of the referenced asset, or `fallback` when the reference has
 * none that looks like a media extension.
 */
export function extensionOf(reference: string, fallback: string): string {
  let pathname = reference;
  if (isHttpReference(reference)) {
    try {
      pathname = new URL(reference).pathname;
    } catch {
      return fallback;
    }
  }
  const ext = extname(pathname).toLowerCase();
  return /^\.[a-z0-9]{1,5}$/.test(ext) ? ext : fallback;
}

export interface AssetSourceOptions {
  storage?: StorageAdapter;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
  logger?: LoggerLike;
}

/**
 * One source for every deployment target: `http(s)://` is downloaded with fetch,
 * `storage://` goes through Supabase storage, anything else is a local path
 * used in place.
 */
export function createAssetSource(options: AssetSourceOptions): AssetSource {
  const fetchImpl = options.fetchImpl ?? fetch;

  async function downloadHttp(url: string, destination: string): Promise<string> {
    const partial = `${destination}.part`;
    try {
      const response = await fetchImpl(url, { signal: AbortSignal.timeout(options.timeoutMs) });
      if (!response.ok) {
        throw new DownloadFailedError(`Download failed with HTTP ${response.status}`, url, response.status);
      }
      const body = Buffer.from(await response.arrayBuffer());
      await fs.writeFile(partial, body);
      await fs.rename(partial, destination);
      options.logger?.debug("asset_downloaded", { url, destination, bytes: body.length });
      return destination;
    } catch (error) {
      await cleanupTempFileSafe(partial, options.logger);
      if (error instanceof DownloadFailedError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new DownloadFailedError(`Download failed: ${message}`, url);
    }
  }

  async function downloadStorage(ref: StorageReference, destination: string): Promise<string> {
    if (!options.storage) {
      throw new DownloadFailedError(`Storage is not configured for ${ref.bucket}/${ref.path}`);
    }
    try {
      return await options.storage.download(ref.bucket, ref.path, destination);
    } catch (error) {
      await cleanupTempFileSafe(destination, options.logger);
      const message = error instanceof Error ? error.message : String(error);
      throw new DownloadFailedError(message);
    }
  }

  return {
    isLocal: isLocalReference,

    async fetch(reference: string, destination: string): Promise<string> {
      if (isHttpReference(reference)) {
        return downloadHttp(reference, destination);
      }

      const storageRef = parseStorageReference(reference);
      if (storageRef) {
        return downloadStorage(storageRef, destination);
      }
      if (reference.startsWith(STORAGE_SCHEME)) {
        throw new DownloadFailedError(`Malformed storage reference: ${reference}`);
      }

      const localPath = toLocalPath(reference);
      if (!(await fileExists(localPath))) {
        throw new DownloadFailedError(`Local file not found: ${localPath}`);
      }
      return localPath;
    },
  };
}
