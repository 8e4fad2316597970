import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import type { RepositoryId } from '../db/types';
import type { StorageConfig } from '../config/configuration';

export function objectKey(
  repository: RepositoryId,
  sampleAccession: string,
  filename: string,
): string {
  // BioStudies-derived sample keys contain a slash (E-MTAB-1/source)
  const sample = sampleAccession.replace(/[^A-Za-z0-9._-]/g, '_');
  const name = filename.replace(/[\\/]/g, '_');
  if (/^\.*$/.test(sample) || /^\.*$/.test(name)) {
    throw new Error(`Cannot build an object key from ${sampleAccession}/${filename}`);
  }
  return `${repository}/${sample}/${name}`;
}

/**
 * S3-compatible object storage for raw IDAT files (AWS S3, DigitalOcean
 * Spaces, MinIO).
 */
@Injectable()
export class ObjectStorageService implements OnModuleDestroy {
  private readonly logger = new Logger(ObjectStorageService.name);
  private readonly config: StorageConfig;
  private readonly client: S3Client | null;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<StorageConfig>('storage');
    const { accessKeyId, secretAccessKey, endpoint, region } = this.config;

    this.client =
      this.config.bucket && accessKeyId && secretAccessKey
        ? new S3Client({
            region,
            credentials: { accessKeyId, secretAccessKey },
            ...(endpoint ? { endpoint, forcePathStyle: true } : {}),
          })
        : null;

    if (this.client) {
      this.logger.log(
        `Object storage ready for bucket ${this.config.bucket}${endpoint ? ` at ${endpoint}` : ''}`,
      );
    }
  }

  get downloadDir(): string {
    return this.config.downloadDir;
  }

  isConfigured(): boolean {
    return this.client !== null;
  }

  async uploadFile(localPath: string, key: string): Promise<string> {
    const client = this.requireClient();
    const { size } = await stat(localPath);

    await client.send(
      new PutObjectCommand({
        Bucket: this.config.bucket,
        Key: key,
        Body: createReadStream(localPath),
        ContentLength: size,
        ContentType: 'application/octet-stream',
      }),
    );
    this.logger.log(`Uploaded ${key} (${size} bytes)`);
    return key;
  }

  onModuleDestroy() {
    this.client?.destroy();
  }

  private requireClient(): S3Client {
    if (!this.client) {
      throw new Error(
        'Object storage is not configured: set S3_BUCKET, AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY',
      );
    }
    return this.client;
  }
}
