import http from "http";
import https from "https";
import { Client } from "minio";
import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  S3Client,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import { NodeHttpHandler } from "@smithy/node-http-handler";
import logger from "../utils/logger";
import { toError } from "../utils/errors";

export type ByteStream = AsyncIterable<Buffer | Uint8Array | string>;

/** Object-store operations the downloaders need. */
export interface ObjectStore {
  readonly bucket: string;
  keyExists(key: string): Promise<boolean>;
  uploadStream(stream: ByteStream, key: string): Promise<void>;
}

export interface CompletedPart {
  PartNumber: number;
  ETag: string;
}

export interface MultipartClient {
  create(key: string): Promise<string>;
  uploadPart(key: string, uploadId: string, partNumber: number, body: Buffer): Promise<string>;
  complete(key: string, uploadId: string, parts: CompletedPart[]): Promise<void>;
  abort(key: string, uploadId: string): Promise<void>;
}

/**
 * Streams `stream` into a multipart upload, cutting parts of `partSize`
 * bytes. Any failure aborts the upload before the error propagates.
 */
export async function multipartUpload(
  client: MultipartClient,
  stream: ByteStream,
  key: string,
  partSize: number,
): Promise<CompletedPart[]> {
  const uploadId = await client.create(key);
  const parts: CompletedPart[] = [];
  let pending: Buffer[] = [];
  let pendingBytes = 0;

  const flush = async (): Promise<void> => {
    const body = Buffer.concat(pending, pendingBytes);
    pending = [];
    pendingBytes = 0;
    const partNumber = parts.length + 1;
    const etag = await client.uploadPart(key, uploadId, partNumber, body);
    parts.push({ PartNumber: partNumber, ETag: etag });
  };

  try {
    for await (const chunk of stream) {
      const buf =
        typeof chunk === "string"
          ? Buffer.from(chunk)
          : Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength);
      if (!buf.length) continue;
      pending.push(buf);
      pendingBytes += buf.length;
      if (pendingBytes >= partSize) {
        await flush();
      }
    }
    if (pendingBytes > 0 || parts.length === 0) {
      await flush();
    }
    await client.complete(key, uploadId, parts);
    return parts;
  } catch (error) {
    logger.warn(`Aborting multipart upload for ${key}`);
    try {
      await client.abort(key, uploadId);
    } catch (abortError) {
      logger.error(`Failed to abort multipart upload ${uploadId} for ${key}:`, abortError);
    }
    throw toError(error);
  }
}

export interface StorageServiceOptions {
  bucket: string;
  region: string;
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  maxPoolConnections: number;
  partSize: number;
}

/** S3 multipart operations over a shared client. */
class S3MultipartClient implements MultipartClient {
  constructor(
    private client: S3Client,
    private bucket: string,
  ) {}

  async create(key: string): Promise<string> {
    const result = await this.client.send(
      new CreateMultipartUploadCommand({ Bucket: this.bucket, Key: key }),
    );
    if (!result.UploadId) {
      throw new Error(`No upload id returned for ${key}`);
    }
    return result.UploadId;
  }

  async uploadPart(
    key: string,
    uploadId: string,
    partNumber: number,
    body: Buffer,
  ): Promise<string> {
    const result = await this.client.send(
      new UploadPartCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        PartNumber: partNumber,
        Body: body,
      }),
    );
    if (!result.ETag) {
      throw new Error(`No ETag returned for part ${partNumber} of ${key}`);
    }
    return result.ETag;
  }

  async complete(key: string, uploadId: string, parts: CompletedPart[]): Promise<void> {
    await this.client.send(
      new CompleteMultipartUploadCommand({
        Bucket: this.bucket,
        Key: key,
        UploadId: uploadId,
        MultipartUpload: { Parts: parts },
      }),
    );
  }

  async abort(key: string, uploadId: string): Promise<void> {
    await this.client.send(
      new AbortMultipartUploadCommand({ Bucket: this.bucket, Key: key, UploadId: uploadId }),
    );
  }
}

class StorageService implements ObjectStore {
  readonly bucket: string;
  private client: Client;
  private multipart: MultipartClient;
  private region: string;
  private partSize: number;

  constructor(options: StorageServiceOptions) {
    this.bucket = options.bucket;
    this.region = options.region;
    this.partSize = options.partSize;

    const endpoint = new URL(options.endpoint || `https://s3.${options.region}.amazonaws.com`);
    const useSSL = endpoint.protocol === "https:";

    // Metadata client: bucket bootstrap and existence checks
    this.client = new Client({
      endPoint: endpoint.hostname,
      port: endpoint.port ? parseInt(endpoint.port, 10) : useSSL ? 443 : 80,
      useSSL,
      region: options.region,
      accessKey: options.accessKeyId,
      secretKey: options.secretAccessKey,
    });

    // Transfer client: one connection pool shared by every concurrent upload
    const agentOptions = { keepAlive: true, maxSockets: options.maxPoolConnections };
    const s3 = new S3Client({
      region: options.region,
      ...(options.endpoint ? { endpoint: options.endpoint, forcePathStyle: true } : {}),
      ...(options.accessKeyId && options.secretAccessKey
        ? {
            credentials: {
              accessKeyId: options.accessKeyId,
              secretAccessKey: options.secretAccessKey,
            },
          }
        : {}),
      requestHandler: new NodeHttpHandler({
        httpAgent: new http.Agent(agentOptions),
        httpsAgent: new https.Agent(agentOptions),
      }),
    });
    this.multipart = new S3MultipartClient(s3, this.bucket);

    logger.info(
      `StorageService initialized with endpoint: ${endpoint.host}, bucket: ${this.bucket}, pool: ${options.maxPoolConnections}`,
    );
  }

  async ensureBucket(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, this.region);
        logger.info(`Bucket created: ${this.bucket}`);
      } else {
        logger.info(`Bucket already exists: ${this.bucket}`);
      }
    } catch (error) {
      logger.error(`Error ensuring bucket ${this.bucket}:`, error);
      throw error;
    }
  }

  async keyExists(key: string): Promise<boolean> {
    try {
      await this.client.statObject(this.bucket, key);
      return true;
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "NotFound") {
        return false;
      }
      logger.error(`Error checking object ${key}:`, error);
      throw error;
    }
  }

  async uploadStream(stream: ByteStream, key: string): Promise<void> {
    const parts = await multipartUpload(this.multipart, stream, key, this.partSize);
    logger.debug(`Uploaded ${key} in ${parts.length} parts`);
  }
}

export default StorageService;
