import { createReadStream } from "node:fs";
import { Readable } from "node:stream";
import {
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { v4 as uuidv4 } from "uuid";
import { RepositoryResult, repositoryData, repositoryFailure } from "../common-types";
import { SystemMetadata, SystemMetadataSchema } from "../dpl-descriptor";
import { encodeIdentifier, ObjectSource, RepositoryClient } from "../dpl-repository";
import { getLogger } from "../logging";

const logger = getLogger("s3");

const EXPIRED_CREDENTIAL_ERRORS = new Set([
  "ExpiredToken",
  "ExpiredTokenException",
  "TokenRefreshRequired",
  "InvalidToken",
]);

function failureFromError<T>(e: unknown): RepositoryResult<T> {
  if (e instanceof S3ServiceException) {
    if (EXPIRED_CREDENTIAL_ERRORS.has(e.name))
      return repositoryFailure("auth-expired", e.message);

    switch (e.$metadata.httpStatusCode) {
      case 404:
        return repositoryFailure("not-found", e.message);
      // a conditional write (If-None-Match) found the key already present
      case 409:
      case 412:
        return repositoryFailure("conflict", e.message);
    }

    return repositoryFailure("transient", `${e.name}: ${e.message}`);
  }

  return repositoryFailure("transient", e instanceof Error ? e.message : String(e));
}

function isNotFound(e: unknown): boolean {
  return (
    e instanceof S3ServiceException &&
    (e.name === "NotFound" || e.$metadata.httpStatusCode === 404)
  );
}

/**
 * A repository kept under a key prefix in an S3 bucket, with the same layout
 * as the POSIX repository (objects/, sysmeta/ and reserved/).
 *
 * All creates are conditional writes (If-None-Match: *) so S3 itself refuses
 * a second object under the same identifier.
 */
export class S3Repository extends RepositoryClient {
  private readonly _bucket: string;
  private readonly _key: string;

  constructor(
    private s3RootUri: string,
    private s3Client: S3Client = new S3Client({}),
  ) {
    super();

    const url = new URL(s3RootUri);

    if (url.protocol !== "s3:")
      throw new Error(
        `S3Repository constructor() must be passed a valid S3 URI - instead it got ${url.protocol} as a protocol`,
      );

    // not a proper check but might stop some invalid bucket name mixups
    if (!url.hostname || url.hostname.length < 3)
      throw new Error(
        `S3Repository constructor() must be passed a valid S3 URI - instead it got ${url.host} as a possible bucket name`,
      );

    this._bucket = url.hostname;
    // S3 keys do not start with a leading / - that we will get from the url.pathname - so we remove it
    this._key = url.pathname.substring(1);

    // we always refer to S3 folders as keys with trailing slashes (unless we are at the
    // very top of the bucket)
    if (this._key.length > 0 && !this._key.endsWith("/")) this._key = this._key + "/";
  }

  public get location(): string {
    return this.s3RootUri;
  }

  public get bucket(): string {
    return this._bucket;
  }

  public get key(): string {
    return this._key;
  }

  public objectKey(pid: string): string {
    return `${this._key}objects/${encodeIdentifier(pid)}`;
  }

  public sysmetaKey(pid: string): string {
    return `${this._key}sysmeta/${encodeIdentifier(pid)}.json`;
  }

  private reservedKey(pid: string): string {
    return `${this._key}reserved/${encodeIdentifier(pid)}`;
  }

  public async isSessionExpired(): Promise<boolean> {
    try {
      const credentials = await this.s3Client.config.credentials();

      return (
        credentials.expiration !== undefined &&
        credentials.expiration.getTime() <= Date.now()
      );
    } catch (e) {
      // no credentials at all is as good as expired for our purposes
      logger.error(
        `Could not resolve AWS credentials: ${e instanceof Error ? e.message : String(e)}`,
      );
      return true;
    }
  }

  public async objectExists(pid: string): Promise<RepositoryResult<boolean>> {
    try {
      await this.s3Client.send(
        new HeadObjectCommand({
          Bucket: this._bucket,
          Key: this.sysmetaKey(pid),
        }),
      );
      return repositoryData(true);
    } catch (e) {
      if (isNotFound(e)) return repositoryData(false);
      return failureFromError(e);
    }
  }

  public async getSysmeta(pid: string): Promise<RepositoryResult<SystemMetadata>> {
    try {
      const getOutput = await this.s3Client.send(
        new GetObjectCommand({
          Bucket: this._bucket,
          Key: this.sysmetaKey(pid),
        }),
      );

      if (!getOutput.Body)
        return repositoryFailure("transient", `Could not get S3 content of ${pid}`);

      return repositoryData(
        SystemMetadataSchema.parse(JSON.parse(await getOutput.Body.transformToString())),
      );
    } catch (e) {
      return failureFromError(e);
    }
  }

  public async createObject(
    pid: string,
    sysmeta: SystemMetadata,
    source: ObjectSource,
  ): Promise<RepositoryResult<string>> {
    if (sysmeta.identifier !== pid)
      return repositoryFailure(
        "conflict",
        `System metadata identifier ${sysmeta.identifier} does not match pid ${pid}`,
      );

    const body = source.kind === "file" ? createReadStream(source.path) : source.bytes;

    try {
      // the object goes first - it is the sysmeta that marks the object as existing
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this._bucket,
          Key: this.objectKey(pid),
          Body: body,
          ContentLength: source.kind === "file" ? source.size : source.bytes.length,
          IfNoneMatch: "*",
        }),
      );
    } catch (e) {
      if (body instanceof Readable) body.destroy();
      return failureFromError(e);
    }

    try {
      await this.putSysmeta(sysmeta, true);
    } catch (sysmetaError) {
      // without system metadata the object does not exist - so we remove the
      // bytes to allow a later attempt (which would otherwise hit If-None-Match)
      await this.removeObject(pid);
      return failureFromError(sysmetaError);
    }

    return repositoryData(pid);
  }

  public async replaceSysmeta(sysmeta: SystemMetadata): Promise<RepositoryResult<string>> {
    const exists = await this.objectExists(sysmeta.identifier);

    if (exists.state === "error") return exists;

    if (!exists.data)
      return repositoryFailure("not-found", `Object ${sysmeta.identifier} does not exist`);

    try {
      await this.putSysmeta(sysmeta, false);
      return repositoryData(sysmeta.identifier);
    } catch (e) {
      return failureFromError(e);
    }
  }

  public async mintIdentifier(scheme: string): Promise<RepositoryResult<string>> {
    const pid = `${scheme}:${uuidv4()}`;

    try {
      await this.s3Client.send(
        new PutObjectCommand({
          Bucket: this._bucket,
          Key: this.reservedKey(pid),
          Body: "",
          IfNoneMatch: "*",
        }),
      );

      return repositoryData(pid);
    } catch (e) {
      return failureFromError(e);
    }
  }

  private async removeObject(pid: string) {
    try {
      await this.s3Client.send(
        new DeleteObjectCommand({
          Bucket: this._bucket,
          Key: this.objectKey(pid),
        }),
      );
    } catch (e) {
      logger.error(
        `Could not remove object ${pid} left without system metadata: ${e instanceof Error ? e.message : String(e)}`,
      );
    }
  }

  private async putSysmeta(sysmeta: SystemMetadata, exclusive: boolean) {
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this._bucket,
        Key: this.sysmetaKey(sysmeta.identifier),
        Body: JSON.stringify(sysmeta, null, 2),
        ContentType: "application/json",
        IfNoneMatch: exclusive ? "*" : undefined,
      }),
    );
  }
}
