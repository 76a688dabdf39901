import { BlobServiceClient } from '@azure/storage-blob';
import type { Logger } from 'pino';

/** Anything that can hand over the raw bytes of the survey workbook. */
export interface SurveySource {
  readonly description: string;
  fetchWorkbook(): Promise<Buffer>;
}

export interface AzureBlobLocation {
  connectionString: string;
  container: string;
  blob: string;
}

export class AzureBlobSurveySource implements SurveySource {
  readonly description: string;
  private readonly location: AzureBlobLocation;
  private readonly log?: Logger;

  constructor(location: AzureBlobLocation, log?: Logger) {
    this.location = location;
    this.log = log;
    this.description = `azure-blob:${location.container}/${location.blob}`;
  }

  async fetchWorkbook(): Promise<Buffer> {
    this.log?.info({ container: this.location.container, blob: this.location.blob }, 'Downloading survey workbook');
    const service = BlobServiceClient.fromConnectionString(this.location.connectionString);
    const blob = service
      .getContainerClient(this.location.container)
      .getBlobClient(this.location.blob);
    const bytes = await blob.downloadToBuffer();
    this.log?.info({ bytes: bytes.byteLength }, 'Downloaded survey workbook');
    return bytes;
  }
}

export class InMemorySurveySource implements SurveySource {
  readonly description = 'in-memory';
  private readonly bytes: Buffer;

  constructor(bytes: Buffer) {
    this.bytes = bytes;
  }

  async fetchWorkbook(): Promise<Buffer> {
    return this.bytes;
  }
}
