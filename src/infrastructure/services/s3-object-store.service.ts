import {
  AbortMultipartUploadCommand,
  CompleteMultipartUploadCommand,
  CreateMultipartUploadCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  ListObjectsV2Command,
  PutObjectCommand,
  S3Client,
  UploadPartCommand,
} from "@aws-sdk/client-s3";
import type { AliasConfig } from "../../core/domain/entities/config.entity.js";
import {
  describeScope,
  type ObjectEntry,
  type RemoteScope,
} from "../../core/domain/entities/object-entry.entity.js";
import type {
  CallOptions,
  IObjectStore,
  MultipartSession,
  ObjectPage,
  UploadedPart,
} from "../../core/domain/services/object-store.service.js";
import { joinKey, relativeKey } from "../utils/target.utils.js";

/**
 * SDK retries are off: every call is retried by the engine's own policy so
 * that part uploads and listing pages are counted and logged the same way.
 */
export function createS3Client(alias: AliasConfig): S3Client {
  return new S3Client({
    region: alias.region,
    endpoint: alias.endpoint,
    forcePathStyle: alias.pathStyle,
    credentials: {
      accessKeyId: alias.accessKey,
      secretAccessKey: alias.secretKey,
    },
    maxAttempts: 1,
  });
}

/** Multipart ETags (`<md5>-<parts>`) are not a hash of the content. */
export function contentHashFromEtag(etag: string | undefined): string | undefined {
  const clean = etag?.replace(/"/g, "") ?? "";
  if (!clean || clean.includes("-")) return undefined;
  return clean.toLowerCase();
}

function isNotFound(e: unknown): boolean {
  if (typeof e !== "object" || e === null) return false;
  if ("name" in e && (e.name === "NotFound" || e.name === "NoSuchKey")) {
    return true;
  }
  return (
    "$metadata" in e &&
    typeof e.$metadata === "object" &&
    e.$metadata !== null &&
    "httpStatusCode" in e.$metadata &&
    e.$metadata.httpStatusCode === 404
  );
}

export class S3ObjectStore implements IObjectStore {
  readonly origin = "remote" as const;
  readonly label: string;

  constructor(
    private client: S3Client,
    private scope: RemoteScope,
  ) {
    this.label = describeScope(scope);
  }

  describe(key: string): string {
    return `${this.scope.alias}/${this.scope.bucket}/${this.objectKey(key)}`;
  }

  private objectKey(key: string): string {
    return joinKey(this.scope.prefix, key);
  }

  async listPage(token?: string, options?: CallOptions): Promise<ObjectPage> {
    const { bucket, prefix } = this.scope;
    const out = await this.client.send(
      new ListObjectsV2Command({
        Bucket: bucket,
        Prefix: prefix ? `${prefix}/` : undefined,
        ContinuationToken: token,
      }),
      { abortSignal: options?.signal },
    );
    const entries: ObjectEntry[] = [];
    for (const obj of out.Contents ?? []) {
      if (!obj.Key) continue;
      const key = relativeKey(prefix, obj.Key);
      // Directory markers and the prefix object itself
      if (key === null || key.endsWith("/")) continue;
      entries.push({
        key,
        size: obj.Size ?? 0,
        lastModified: obj.LastModified ?? new Date(0),
        contentHash: contentHashFromEtag(obj.ETag),
        origin: "remote",
      });
    }
    return {
      entries,
      nextToken: out.IsTruncated ? out.NextContinuationToken : undefined,
    };
  }

  async stat(key: string, options?: CallOptions): Promise<ObjectEntry | null> {
    try {
      const out = await this.client.send(
        new HeadObjectCommand({
          Bucket: this.scope.bucket,
          Key: this.objectKey(key),
        }),
        { abortSignal: options?.signal },
      );
      return {
        key,
        size: out.ContentLength ?? 0,
        lastModified: out.LastModified ?? new Date(0),
        contentHash: contentHashFromEtag(out.ETag),
        origin: "remote",
      };
    } catch (e) {
      if (isNotFound(e)) return null;
      throw e;
    }
  }

  async put(
    key: string,
    body: Buffer,
    size: number,
    options?: CallOptions,
  ): Promise<void> {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(key),
        Body: body,
        ContentLength: size,
      }),
      { abortSignal: options?.signal },
    );
  }

  async get(key: string, options?: CallOptions): Promise<Buffer> {
    return this.fetch(key, undefined, options);
  }

  async readRange(
    key: string,
    start: number,
    length: number,
    options?: CallOptions,
  ): Promise<Buffer> {
    const body = await this.fetch(
      key,
      `bytes=${start}-${start + length - 1}`,
      options,
    );
    if (body.length !== length) {
      throw new Error(
        `Range read of ${this.describe(key)} returned ${body.length} bytes, expected ${length}`,
      );
    }
    return body;
  }

  private async fetch(
    key: string,
    range: string | undefined,
    options?: CallOptions,
  ): Promise<Buffer> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(key),
        Range: range,
      }),
      { abortSignal: options?.signal },
    );
    if (!response.Body) throw new Error(`No body for ${this.describe(key)}`);
    return Buffer.from(await response.Body.transformToByteArray());
  }

  async initiateMultipart(
    key: string,
    options?: CallOptions,
  ): Promise<MultipartSession> {
    const out = await this.client.send(
      new CreateMultipartUploadCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(key),
      }),
      { abortSignal: options?.signal },
    );
    if (!out.UploadId) {
      throw new Error(`No UploadId returned for ${this.describe(key)}`);
    }
    return { key, uploadId: out.UploadId };
  }

  async uploadPart(
    session: MultipartSession,
    index: number,
    body: Buffer,
    options?: CallOptions,
  ): Promise<string> {
    const out = await this.client.send(
      new UploadPartCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(session.key),
        UploadId: session.uploadId,
        PartNumber: index,
        Body: body,
        ContentLength: body.length,
      }),
      { abortSignal: options?.signal },
    );
    if (!out.ETag) {
      throw new Error(`No ETag for part ${index} of ${this.describe(session.key)}`);
    }
    return out.ETag;
  }

  async completeMultipart(
    session: MultipartSession,
    parts: UploadedPart[],
    options?: CallOptions,
  ): Promise<void> {
    await this.client.send(
      new CompleteMultipartUploadCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(session.key),
        UploadId: session.uploadId,
        MultipartUpload: {
          Parts: parts.map((p) => ({ PartNumber: p.index, ETag: p.etag })),
        },
      }),
      { abortSignal: options?.signal },
    );
  }

  async abortMultipart(
    session: MultipartSession,
    options?: CallOptions,
  ): Promise<void> {
    await this.client.send(
      new AbortMultipartUploadCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(session.key),
        UploadId: session.uploadId,
      }),
      { abortSignal: options?.signal },
    );
  }

  async delete(key: string, options?: CallOptions): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: this.scope.bucket,
        Key: this.objectKey(key),
      }),
      { abortSignal: options?.signal },
    );
  }
}
