import { SupabaseClient } from '@supabase/supabase-js';
import { logger } from '../utils/logger';
import { StorageError } from '../utils/validation';

/**
 * Object storage as the processors see it. Keys are paths inside a bucket.
 */
export interface ReportStore {
  readText(bucket: string, key: string): Promise<string>;
  writeJson(bucket: string, key: string, value: unknown): Promise<void>;
  exists(bucket: string, key: string): Promise<boolean>;
  createSignedUrl(bucket: string, key: string, expiresInSeconds: number): Promise<string>;
}

function splitKey(key: string): { folder: string; name: string } {
  const slash = key.lastIndexOf('/');
  return slash === -1
    ? { folder: '', name: key }
    : { folder: key.slice(0, slash), name: key.slice(slash + 1) };
}

export class SupabaseReportStore implements ReportStore {
  constructor(private client: SupabaseClient) {}

  async readText(bucket: string, key: string): Promise<string> {
    const { data, error } = await this.client.storage.from(bucket).download(key);
    if (error || !data) {
      logger.error({ bucket, key, error: error?.message }, 'Failed to download object');
      throw new StorageError(`Failed to download ${bucket}/${key}: ${error?.message ?? 'no data'}`, key);
    }

    const text = await data.text();
    logger.debug({ bucket, key, bytes: text.length }, 'Object downloaded');
    return text;
  }

  async writeJson(bucket: string, key: string, value: unknown): Promise<void> {
    const body = JSON.stringify(value, null, 2);
    const { error } = await this.client.storage
      .from(bucket)
      .upload(key, Buffer.from(body, 'utf-8'), { contentType: 'application/json', upsert: true });

    if (error) {
      logger.error({ bucket, key, error: error.message }, 'Failed to upload object');
      throw new StorageError(`Failed to upload ${bucket}/${key}: ${error.message}`, key);
    }
    logger.info({ bucket, key, bytes: body.length }, 'Object uploaded');
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    const { folder, name } = splitKey(key);
    const { data, error } = await this.client.storage.from(bucket).list(folder, { search: name });
    if (error) {
      throw new StorageError(`Failed to list ${bucket}/${folder}: ${error.message}`, key);
    }
    return (data ?? []).some(entry => entry.name === name);
  }

  async createSignedUrl(bucket: string, key: string, expiresInSeconds: number): Promise<string> {
    const { data, error } = await this.client.storage.from(bucket).createSignedUrl(key, expiresInSeconds);
    if (error || !data) {
      throw new StorageError(`Failed to sign ${bucket}/${key}: ${error?.message ?? 'no data'}`, key);
    }
    return data.signedUrl;
  }
}
