import { resolve } from "node:path";
import { S3Repository } from "../s3/s3-repository";
import { PosixRepository } from "../posix/posix-repository";
import { RepositoryClient } from "../dpl-repository";

export class RepositoryFactory {
  /**
   * Make the repository client for a location - "s3://bucket/key" or
   * a folder (relative folders are resolved against the current directory).
   */
  public static CreateRepository = (location: string): RepositoryClient => {
    if (location.startsWith("s3://")) return new S3Repository(location);
    else return new PosixRepository(resolve(location));
  };
}
