import { ReportStore } from '../../storage/report-store';
import { StorageError } from '../../utils/validation';

/**
 * In-process stand-in for object storage
 */
export class MemoryReportStore implements ReportStore {
  readonly objects = new Map<string, string>();

  put(bucket: string, key: string, text: string): void {
    this.objects.set(`${bucket}/${key}`, text);
  }

  async readText(bucket: string, key: string): Promise<string> {
    const text = this.objects.get(`${bucket}/${key}`);
    if (text === undefined) {
      throw new StorageError(`Failed to download ${bucket}/${key}: Object not found`, key);
    }
    return text;
  }

  async writeJson(bucket: string, key: string, value: unknown): Promise<void> {
    this.objects.set(`${bucket}/${key}`, JSON.stringify(value));
  }

  async exists(bucket: string, key: string): Promise<boolean> {
    return this.objects.has(`${bucket}/${key}`);
  }

  async createSignedUrl(bucket: string, key: string, expiresInSeconds: number): Promise<string> {
    return `https://storage.test/${bucket}/${key}?expires=${expiresInSeconds}`;
  }
}
