import { RepositoryResult, repositoryData, repositoryFailure } from "./common-types";
import { SystemMetadata } from "./dpl-descriptor";

/**
 * The bytes of an object to be stored - either a file on disk (which
 * repositories may stream) or content we built in memory (e.g. resource maps).
 */
export type ObjectSource =
  | {
      kind: "file";
      path: string;
      size: number;
    }
  | {
      kind: "bytes";
      bytes: Buffer;
    };

/**
 * The remote object repository that packages are loaded into.
 *
 * Every call reports failure as a value rather than throwing. Implementations
 * must refuse to store two objects under the same identifier - that refusal
 * (a "conflict") is what makes concurrent loaders safe.
 */
export abstract class RepositoryClient {
  /**
   * A description of where this repository is, e.g. "s3://bucket/key" or
   * "/Users/person/repo".
   */
  public abstract get location(): string;

  /**
   * True if the credentials this client would use are known to have expired.
   * This is checked once before any work in a call is started.
   */
  public abstract isSessionExpired(): Promise<boolean>;

  public abstract objectExists(pid: string): Promise<RepositoryResult<boolean>>;

  public abstract createObject(
    pid: string,
    sysmeta: SystemMetadata,
    source: ObjectSource,
  ): Promise<RepositoryResult<string>>;

  public abstract getSysmeta(pid: string): Promise<RepositoryResult<SystemMetadata>>;

  /**
   * Overwrite the system metadata of an object that is already stored.
   */
  public abstract replaceSysmeta(sysmeta: SystemMetadata): Promise<RepositoryResult<string>>;

  /**
   * Store a new object that obsoletes an existing one - recording the
   * version chain in both system metadata records.
   *
   * The new object is stored first. If marking the old object then fails the
   * chain is left half done - completeUpdate() finishes it.
   */
  public async updateObject(
    oldPid: string,
    newPid: string,
    sysmeta: SystemMetadata,
    source: ObjectSource,
  ): Promise<RepositoryResult<string>> {
    const old = await this.getSysmeta(oldPid);

    if (old.state === "error") return old;

    if (old.data.obsoletedBy)
      return repositoryFailure(
        "conflict",
        `Object ${oldPid} is already obsoleted by ${old.data.obsoletedBy}`,
      );

    const created = await this.createObject(newPid, { ...sysmeta, obsoletes: oldPid }, source);

    if (created.state === "error") return created;

    const marked = await this.replaceSysmeta({ ...old.data, obsoletedBy: newPid });

    if (marked.state === "error") return marked;

    return repositoryData(newPid);
  }

  /**
   * Finish an update whose new object was stored but whose old object was
   * never marked as obsoleted by it.
   *
   * @returns true if the old object needed marking (and now is), false if
   *          there was nothing to finish
   */
  public async completeUpdate(
    oldPid: string,
    newPid: string,
  ): Promise<RepositoryResult<boolean>> {
    const next = await this.getSysmeta(newPid);

    if (next.state === "error") return next;

    // created as a first publication - there is no chain
    if (next.data.obsoletes !== oldPid) return repositoryData(false);

    const old = await this.getSysmeta(oldPid);

    if (old.state === "error") return old;

    if (old.data.obsoletedBy === newPid) return repositoryData(false);

    if (old.data.obsoletedBy)
      return repositoryFailure(
        "conflict",
        `Object ${oldPid} is already obsoleted by ${old.data.obsoletedBy}`,
      );

    const marked = await this.replaceSysmeta({ ...old.data, obsoletedBy: newPid });

    if (marked.state === "error") return marked;

    return repositoryData(true);
  }

  /**
   * Ask the repository for a fresh identifier under the given scheme.
   */
  public abstract mintIdentifier(scheme: string): Promise<RepositoryResult<string>>;
}

/**
 * Encode an identifier so that it is safe as a single path segment (and
 * as part of a URI). Everything other than the RFC 3986 unreserved
 * characters is percent-encoded.
 */
export function encodeIdentifier(pid: string): string {
  return encodeURIComponent(pid).replace(
    /[!'()*]/g,
    (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase(),
  );
}
