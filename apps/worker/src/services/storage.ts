import type { SupabaseClient } from "@supabase/supabase-js";
import { promises as fs } from "node:fs";
import { dirname } from "node:path";

import type { StorageAdapter } from "../pipelines/types";

/**
 * Supabase Storage adapter used for `storage://` assets and the storage output sink.
 */
export function createStorageAdapter(supabase: SupabaseClient): StorageAdapter {
  return {
    async download(bucket: string, path: string, destination: string): Promise<string> {
      const { data, error } = await supabase.storage.from(bucket).download(path);

      if (error) {
        throw new Error(`Failed to download ${bucket}/${path}: ${error.message}`);
      }

      if (!data) {
        throw new Error(`No data returned for ${bucket}/${path}`);
      }

      await fs.mkdir(dirname(destination), { recursive: true });
      const arrayBuffer = await data.arrayBuffer();
      await fs.writeFile(destination, Buffer.from(arrayBuffer));

      return destination;
    },

    async upload(bucket: string, path: string, localFile: string, contentType?: string): Promise<void> {
      const fileData = await fs.readFile(localFile);

      const { error } = await supabase.storage.from(bucket).upload(path, fileData, {
        contentType: contentType ?? "application/octet-stream",
        upsert: true,
      });

      if (error) {
        throw new Error(`Failed to upload ${bucket}/${path}: ${error.message}`);
      }
    },
  };
}
