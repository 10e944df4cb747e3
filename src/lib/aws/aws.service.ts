import {
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
} from '@aws-sdk/client-s3';
import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 } from 'uuid';
import { GradewiseLogger } from '../logger';
import { FileStore, StoredFileNotFound } from './file-store';

@Injectable()
export class AwsService extends FileStore {
  private readonly s3Client: S3Client;
  private readonly bucket: string;

  constructor(
    private readonly config: ConfigService,
    private readonly logger: GradewiseLogger,
  ) {
    super();
    this.logger.setContext(AwsService.name);
    const region = this.config.getOrThrow<string>('AWS_REGION');
    const accessKeyId = this.config.getOrThrow<string>('AWS_ACCESS_KEY');
    const secretAccessKey = this.config.getOrThrow<string>(
      'AWS_SECRET_ACCESS_KEY',
    );
    this.bucket = this.config.getOrThrow<string>('AWS_BUCKET_NAME');

    this.s3Client = new S3Client({
      region,
      credentials: {
        accessKeyId,
        secretAccessKey,
      },
    });
  }

  async upload(
    filename: string,
    body: Buffer,
    contentType: string,
  ): Promise<{ key: string }> {
    const key = `submissions/${v4()}-${filename.replace(/[^\w.-]+/g, '_')}`;
    this.logger.debug(`Uploading file to S3: ${key}`);
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        ContentType: contentType,
        Body: body,
      }),
    );
    this.logger.debug(`File uploaded successfully: ${key}`);
    return { key };
  }

  async download(key: string): Promise<Buffer> {
    try {
      const res = await this.s3Client.send(
        new GetObjectCommand({ Bucket: this.bucket, Key: key }),
      );
      if (!res.Body) throw new StoredFileNotFound(key);
      return Buffer.from(await res.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof StoredFileNotFound) throw error;
      if (error instanceof NoSuchKey) throw new StoredFileNotFound(key);
      if (error instanceof Error) {
        this.logger.error(`Failed to download ${key}: ${error.message}`);
      }
      throw error;
    }
  }
}
