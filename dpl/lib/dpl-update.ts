import { access } from "node:fs/promises";
import { join } from "node:path";
import { ErrorSpecific } from "./common-types";
import { DplCollaborators } from "./dpl-collaborators";
import { buildSysmeta, SystemMetadata } from "./dpl-descriptor";
import { DplEnvironment } from "./dpl-environment";
import { DplError } from "./dpl-errors";
import { generateResourceMapPid } from "./dpl-identifiers";
import {
  determineChildPids,
  hasPid,
  Inventory,
  InventoryRecord,
  packageRecords,
  validateInventory,
} from "./dpl-inventory";
import { ObjectSource } from "./dpl-repository";
import { getLogger } from "./logging";
import { OtherStatement } from "./resource-map/resource-map";
import { prepareResourceMapObject } from "./resource-map/resource-map-object";

const logger = getLogger("update");

export type UpdateOptions = {
  // statements to carry into the rebuilt resource map (e.g. provenance
  // recovered from the old map through filterPackagingStatements)
  otherStatements?: OtherStatement[];
};

/**
 * What happened to one artifact (metadata or resource map) of an update.
 */
type PublishOutcome = "skipped" | "created" | "updated" | "failed";

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Publishes new versions of the metadata and resource map of packages
 * whose metadata has changed. Data objects are never touched.
 *
 * The modified metadata lives under the alternate path with the same relative
 * path as the original under the base path - e.g. with
 *
 *   basePath = "/home/you/originals"        a.xml at dir/a.xml
 *   alternatePath = "/home/someone/modified"
 *
 * the new version is read from /home/someone/modified/dir/a.xml.
 */
export class PackageUpdater {
  constructor(
    private env: DplEnvironment,
    private collaborators: DplCollaborators,
  ) {}

  /**
   * Decide between create and update for one artifact and do it:
   * - the new pid already exists - nothing to do, other than finishing a
   *   version chain an earlier run left half done
   * - the old pid does not exist - create (a first publication)
   * - otherwise - update, with the new object obsoleting the old
   */
  private async publish(
    label: string,
    oldPid: string,
    newPid: string,
    prepare: () => Promise<{ sysmeta: SystemMetadata; source: ObjectSource } | undefined>,
  ): Promise<PublishOutcome> {
    const { repository } = this.collaborators;

    logger.info(`Checking if ${label} with pid ${newPid} already exists`);

    const newExists = await repository.objectExists(newPid);

    if (newExists.state === "error") {
      logger.error(`Could not check for ${label} ${newPid} (${newExists.kind}): ${newExists.error}`);
      return "failed";
    }

    if (newExists.data) {
      // an earlier run may have stored the new version but failed to mark the old
      const completed = await repository.completeUpdate(oldPid, newPid);

      if (completed.state === "error") {
        logger.error(
          `Could not complete the version chain of ${label} ${oldPid} to ${newPid} (${completed.kind}): ${completed.error}`,
        );
        return "failed";
      }

      if (completed.data) {
        logger.info(`Marked ${label} ${oldPid} as obsoleted by the existing ${newPid}`);
        return "updated";
      }

      logger.info(`The ${label} with pid ${newPid} already exists - skipping`);
      return "skipped";
    }

    const oldExists = await repository.objectExists(oldPid);

    if (oldExists.state === "error") {
      logger.error(`Could not check for ${label} ${oldPid} (${oldExists.kind}): ${oldExists.error}`);
      return "failed";
    }

    const prepared = await prepare();

    if (!prepared) return "failed";

    if (!oldExists.data) {
      logger.info(`Old ${label} with pid ${oldPid} doesn't exist - creating ${newPid} instead of updating`);

      const created = await repository.createObject(newPid, prepared.sysmeta, prepared.source);

      if (created.state === "error") {
        logger.error(`Error creating ${label} ${newPid} (${created.kind}): ${created.error}`);
        return "failed";
      }

      return "created";
    }

    logger.info(`Updating ${label} with old pid ${oldPid} to new pid ${newPid}`);

    const updated = await repository.updateObject(
      oldPid,
      newPid,
      prepared.sysmeta,
      prepared.source,
    );

    if (updated.state === "error") {
      logger.error(`Error updating ${label} ${oldPid} to ${newPid} (${updated.kind}): ${updated.error}`);
      return "failed";
    }

    return "updated";
  }

  private checkPackage(rows: Inventory, packageId: string): InventoryRecord[] {
    if (!packageId)
      throw new DplError("Package not specified", [{ message: "A package must be given" }]);

    const files = packageRecords(rows, packageId);

    if (files.length === 0)
      throw new DplError("Package not found", [
        { message: "No files in the inventory belong to the package", package: packageId },
      ]);

    const metadataCount = files.filter((f) => f.isMetadata).length;

    if (metadataCount !== 1)
      throw new DplError("Package metadata ambiguous", [
        {
          message: `A package must have exactly one metadata file but has ${metadataCount}`,
          package: packageId,
        },
      ]);

    const missing: ErrorSpecific[] = files
      .filter((f) => !hasPid(f) || !f.pidOld)
      .map((f) => ({
        message: "Files being updated must have both a pid and a pidOld",
        package: packageId,
        file: f.file,
      }));

    if (missing.length > 0) throw new DplError("Package cannot be updated", missing);

    return files;
  }

  /**
   * Update a package with modified metadata - publishing the metadata and
   * a rebuilt resource map under their new pids.
   *
   * @param inventory the inventory
   * @param packageId the package to update
   * @param options extra statements for the rebuilt resource map
   * @returns the rows of the package, with flags set for whatever was published
   */
  public async updatePackage(
    inventory: Inventory,
    packageId: string,
    options: UpdateOptions = {},
  ): Promise<InventoryRecord[]> {
    const rows = validateInventory(inventory);
    const files = this.checkPackage(rows, packageId);

    if (await this.collaborators.repository.isSessionExpired()) {
      logger.warn("Repository session is expired - returning un-modified inventory");
      return files;
    }

    const metadata = files.find((f) => f.isMetadata);

    // checkPackage has guaranteed both of these
    if (!metadata || !metadata.pid || !metadata.pidOld) return files;

    const newPid = metadata.pid;
    const oldPid = metadata.pidOld;

    logger.info(`Updating package ${packageId}`);

    if (!(await pathExists(this.env.alternatePath))) {
      logger.error(`Alternate path location of ${this.env.alternatePath} does not exist`);
      return files;
    }

    const metadataPath = join(this.env.alternatePath, metadata.file);

    if (!(await pathExists(metadataPath))) {
      logger.error(`Modified metadata not found at path ${metadataPath}`);
      return files;
    }

    logger.info(`Modified metadata is at ${metadataPath}`);

    const { hasher, patcher, accessPolicy } = this.collaborators;

    const metadataOutcome = await this.publish("metadata object", oldPid, newPid, async () => {
      try {
        const bytes = await patcher.patchIdentifier(metadataPath, newPid);

        return {
          sysmeta: buildSysmeta(
            {
              identifier: newPid,
              formatId: metadata.formatId,
              size: bytes.length,
              checksum: hasher.checksumBytes(bytes),
              submitter: this.env.submitter,
              rightsHolder: this.env.rightsHolder,
              fileName: metadata.filename,
            },
            accessPolicy,
          ),
          source: { kind: "bytes", bytes: bytes },
        };
      } catch (e) {
        logger.error(
          `Error preparing modified metadata ${metadataPath}: ${e instanceof Error ? e.message : String(e)}`,
        );
        return undefined;
      }
    });

    if (metadataOutcome === "failed") return files;

    if (metadataOutcome !== "skipped") {
      metadata.created = true;
      logger.info(`Inserted updated metadata object for package ${packageId}`);
    }

    const resourceMapPid = generateResourceMapPid(newPid);
    const oldResourceMapPid = generateResourceMapPid(oldPid);

    const resourceMapOutcome = await this.publish(
      "resource map",
      oldResourceMapPid,
      resourceMapPid,
      async () =>
        prepareResourceMapObject(
          {
            metadataPid: newPid,
            dataPids: files.filter((f) => !f.isMetadata).map((f) => f.pid ?? ""),
            childPids: determineChildPids(rows, packageId),
            otherStatements: options.otherStatements,
            resourceMapPid: resourceMapPid,
          },
          this.env,
          this.collaborators,
        ),
    );

    if (resourceMapOutcome === "failed") return files;

    if (resourceMapOutcome !== "skipped") {
      for (const f of files) f.resmapCreated = true;
      logger.info(`Published resource map ${resourceMapPid} for package ${packageId}`);
    }

    return files;
  }
}
