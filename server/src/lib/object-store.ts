import type { SupabaseClient } from '@supabase/supabase-js';
import { ObjectFetchError } from './errors.js';

export interface ObjectStore {
  getObjectBytes(bucket: string, key: string): Promise<Uint8Array>;
}

/** Reads resume uploads from Supabase Storage. */
export class SupabaseObjectStore implements ObjectStore {
  constructor(private readonly client: SupabaseClient) {}

  async getObjectBytes(bucket: string, key: string): Promise<Uint8Array> {
    const { data, error } = await this.client.storage.from(bucket).download(key);
    if (error || !data) {
      throw new ObjectFetchError(
        `Failed to download ${bucket}/${key}: ${error?.message ?? 'no data'}`,
        bucket,
        key,
      );
    }
    return new Uint8Array(await data.arrayBuffer());
  }
}

export class InMemoryObjectStore implements ObjectStore {
  private readonly objects = new Map<string, Uint8Array>();

  put(bucket: string, key: string, bytes: Uint8Array | string): void {
    this.objects.set(`${bucket}/${key}`, typeof bytes === 'string' ? new TextEncoder().encode(bytes) : bytes);
  }

  async getObjectBytes(bucket: string, key: string): Promise<Uint8Array> {
    const bytes = this.objects.get(`${bucket}/${key}`);
    if (!bytes) {
      throw new ObjectFetchError(`Object not found: ${bucket}/${key}`, bucket, key);
    }
    return bytes;
  }
}
