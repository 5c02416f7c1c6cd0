import { constants } from "node:fs";
import { copyFile, mkdir, readFile, stat, unlink, writeFile } from "node:fs/promises";
import { isAbsolute, join } from "node:path";
import { v4 as uuidv4 } from "uuid";
import { RepositoryResult, repositoryData, repositoryFailure } from "../common-types";
import { SystemMetadata, SystemMetadataSchema } from "../dpl-descriptor";
import { encodeIdentifier, ObjectSource, RepositoryClient } from "../dpl-repository";

function errnoCode(e: unknown): string | undefined {
  if (e instanceof Error && "code" in e && typeof e.code === "string") return e.code;
  return undefined;
}

function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function failureFromError<T>(e: unknown): RepositoryResult<T> {
  switch (errnoCode(e)) {
    case "EEXIST":
      return repositoryFailure("conflict", errorMessage(e));
    case "ENOENT":
      return repositoryFailure("not-found", errorMessage(e));
    default:
      return repositoryFailure("transient", errorMessage(e));
  }
}

/**
 * A repository kept in a folder of a POSIX file system:
 *
 *   <root>/objects/<encoded pid>        the object bytes
 *   <root>/sysmeta/<encoded pid>.json   its system metadata
 *   <root>/reserved/<encoded pid>       identifiers minted but not yet used
 *
 * Files are only ever created with exclusive flags - so an identifier can
 * only be stored once.
 */
export class PosixRepository extends RepositoryClient {
  constructor(private absoluteRootFolder: string) {
    super();

    if (!isAbsolute(absoluteRootFolder))
      throw new Error("Repository folder must be absolute");
  }

  public get location(): string {
    return this.absoluteRootFolder;
  }

  public objectPath(pid: string): string {
    return join(this.absoluteRootFolder, "objects", encodeIdentifier(pid));
  }

  public sysmetaPath(pid: string): string {
    return join(this.absoluteRootFolder, "sysmeta", encodeIdentifier(pid) + ".json");
  }

  private reservedPath(pid: string): string {
    return join(this.absoluteRootFolder, "reserved", encodeIdentifier(pid));
  }

  private async ensureFolders() {
    for (const f of ["objects", "sysmeta", "reserved"])
      await mkdir(join(this.absoluteRootFolder, f), { recursive: true });
  }

  // local file systems have no sessions to expire
  public async isSessionExpired(): Promise<boolean> {
    return false;
  }

  public async objectExists(pid: string): Promise<RepositoryResult<boolean>> {
    try {
      await stat(this.sysmetaPath(pid));
      return repositoryData(true);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return repositoryData(false);
      return failureFromError(e);
    }
  }

  /**
   * Read back the system metadata of a stored object.
   */
  public async getSysmeta(pid: string): Promise<RepositoryResult<SystemMetadata>> {
    try {
      const content = await readFile(this.sysmetaPath(pid), { encoding: "utf8" });
      return repositoryData(SystemMetadataSchema.parse(JSON.parse(content)));
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

    try {
      await this.ensureFolders();

      const objectPath = this.objectPath(pid);

      if (source.kind === "file")
        await copyFile(source.path, objectPath, constants.COPYFILE_EXCL);
      else await writeFile(objectPath, source.bytes, { flag: "wx" });

      try {
        await writeFile(this.sysmetaPath(pid), JSON.stringify(sysmeta, null, 2), {
          flag: "wx",
          encoding: "utf8",
        });
      } catch (sysmetaError) {
        // without system metadata the object does not exist - so we remove the
        // bytes to allow a later attempt
        await unlink(objectPath);
        throw sysmetaError;
      }

      return repositoryData(pid);
    } catch (e) {
      return failureFromError(e);
    }
  }

  public async replaceSysmeta(sysmeta: SystemMetadata): Promise<RepositoryResult<string>> {
    try {
      // a plain (non exclusive) write - but only over sysmeta that exists
      await stat(this.sysmetaPath(sysmeta.identifier));
      await writeFile(this.sysmetaPath(sysmeta.identifier), JSON.stringify(sysmeta, null, 2), {
        encoding: "utf8",
      });

      return repositoryData(sysmeta.identifier);
    } catch (e) {
      return failureFromError(e);
    }
  }

  public async mintIdentifier(scheme: string): Promise<RepositoryResult<string>> {
    const pid = `${scheme}:${uuidv4()}`;

    try {
      await this.ensureFolders();
      await writeFile(this.reservedPath(pid), "", { flag: "wx" });

      return repositoryData(pid);
    } catch (e) {
      return failureFromError(e);
    }
  }
}
