import { ErrorSpecific } from "./common-types";
import { DplCollaborators } from "./dpl-collaborators";
import { createSysmeta } from "./dpl-descriptor";
import { DplEnvironment } from "./dpl-environment";
import { DplError } from "./dpl-errors";
import { getOrCreatePid } from "./dpl-identifiers";
import {
  childPackages,
  determineChildPids,
  hasPid,
  Inventory,
  InventoryRecord,
  isPackageComplete,
  isPackageDone,
  packageRecords,
  validateInventory,
} from "./dpl-inventory";
import { createObject } from "./dpl-upload";
import { getLogger } from "./logging";
import { prepareResourceMapObject } from "./resource-map/resource-map-object";

const logger = getLogger("package");

/**
 * How far a package has got through loading. Any state other than
 * "ResourceMapUploaded" is a place a later run resumes from.
 */
export type PackageState =
  | "NoMetadataId"
  | "MetadataDescribed"
  | "MetadataUploaded"
  | "DataUploading"
  | "DataComplete"
  | "ResourceMapBuilt"
  | "ResourceMapUploaded";

/**
 * Work out the (persisted) state of a package from its rows. The
 * "MetadataDescribed" and "ResourceMapBuilt" states only exist during a run
 * so are never returned here.
 */
export function packageState(rows: Inventory): PackageState {
  const metadata = rows.find((r) => r.isMetadata);

  if (!metadata || !metadata.created || !hasPid(metadata)) return "NoMetadataId";

  const data = rows.filter((r) => !r.isMetadata);
  const createdData = data.filter((r) => r.created && hasPid(r)).length;

  if (createdData < data.length) return createdData === 0 ? "MetadataUploaded" : "DataUploading";

  if (rows.every((r) => r.resmapCreated)) return "ResourceMapUploaded";

  return "DataComplete";
}

/**
 * Loads packages (and single files) from the inventory into the repository.
 */
export class PackageLoader {
  constructor(
    private env: DplEnvironment,
    private collaborators: DplCollaborators,
  ) {}

  private schemeFor(record: InventoryRecord): string {
    return record.isMetadata
      ? this.env.metadataIdentifierScheme
      : this.env.dataIdentifierScheme;
  }

  /**
   * Resolve, describe and upload a single record - updating the record in place
   * as each step succeeds.
   *
   * @returns true if the object was created
   */
  private async processRecord(
    record: InventoryRecord,
    onDescribed?: () => void,
  ): Promise<boolean> {
    const { repository, accessPolicy } = this.collaborators;

    record.pid = await getOrCreatePid(record, repository, this.schemeFor(record));

    if (!record.pid) {
      logger.error(`Pid could not be resolved for file ${record.file}`);
      return false;
    }

    const sysmeta = await createSysmeta(
      record,
      this.env.basePath,
      this.env.submitter,
      this.env.rightsHolder,
      accessPolicy,
    );

    if (!sysmeta) {
      logger.error(`System metadata creation failed for file ${record.file}`);
      return false;
    }

    if (onDescribed) onDescribed();

    record.created = await createObject(record, sysmeta, this.env.basePath, repository);

    if (!record.created) logger.error(`Object creation failed for file ${record.file}`);

    return record.created;
  }

  private async sessionExpired(): Promise<boolean> {
    if (await this.collaborators.repository.isSessionExpired()) {
      logger.warn("Repository session is expired - returning un-modified inventory");
      return true;
    }
    return false;
  }

  /**
   * Insert a single file from the inventory.
   *
   * @param inventory the inventory
   * @param file the file (primary key) of the record to insert
   * @returns the record as it now stands (as a single element array)
   */
  public async insertFile(inventory: Inventory, file: string): Promise<InventoryRecord[]> {
    const rows = validateInventory(inventory);

    if (!file)
      throw new DplError("File not specified", [{ message: "A file must be given" }]);

    const matches = rows.filter((r) => r.file === file);

    if (matches.length !== 1)
      throw new DplError("File not found", [
        { message: "File is not present in the inventory", file: file },
      ]);

    const record = matches[0];

    if (record.created && hasPid(record)) {
      logger.info(`File ${file} already created with pid ${record.pid}`);
      return [record];
    }

    if (await this.sessionExpired()) return [record];

    logger.info(`Using identifier scheme ${this.schemeFor(record)} for ${file}`);

    await this.processRecord(record);

    return [record];
  }

  /**
   * Check everything about the package that must hold before we touch the
   * repository - throwing if anything does not.
   */
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

    const incompleteChildren: ErrorSpecific[] = [];

    for (const child of childPackages(rows, packageId)) {
      if (!child.package || !isPackageComplete(rows, child.package))
        incompleteChildren.push({
          message: "Child package has not been created - add that package first",
          package: child.package ?? undefined,
          file: child.file,
        });
    }

    if (incompleteChildren.length > 0)
      throw new DplError("Not all child packages have been created", incompleteChildren);

    return files;
  }

  /**
   * Create a single data package from files in the inventory - the metadata,
   * then each data file, then the resource map. Processing stops at the first
   * failure and the rows are returned showing exactly what was achieved - so
   * calling this again later picks up from there.
   *
   * @param inventory the inventory
   * @param packageId the package to insert
   * @returns the rows of the package as they now stand
   */
  public async insertPackage(
    inventory: Inventory,
    packageId: string,
  ): Promise<InventoryRecord[]> {
    const rows = validateInventory(inventory);
    const files = this.checkPackage(rows, packageId);

    if (isPackageDone(files)) {
      logger.info(`Package ${packageId} has already been completely inserted`);
      return files;
    }

    if (await this.sessionExpired()) return files;

    let state = packageState(files);

    const enter = (next: PackageState, detail: string = "") => {
      state = next;
      logger.info(`Package ${packageId} is now ${next}${detail}`);
    };

    const halt = () => {
      logger.warn(`Stopping early - package ${packageId} halted in state ${state}`);
      return files;
    };

    const metadata = files.find((f) => f.isMetadata);
    const data = files.filter((f) => !f.isMetadata);

    // checkPackage has guaranteed exactly one
    if (!metadata) return files;

    if (!metadata.created) {
      const created = await this.processRecord(metadata, () =>
        enter("MetadataDescribed"),
      );

      if (!created) return halt();

      enter("MetadataUploaded");
    } else {
      logger.info("Skipped creating metadata because it was already created");
    }

    for (let i = 0; i < data.length; i++) {
      const d = data[i];

      if (d.created) {
        logger.info(
          `File ${d.filename} in package ${packageId} already created - moving on to the next data object`,
        );
        continue;
      }

      logger.info(`Processing data file ${d.file} in package ${packageId}`);

      if (!(await this.processRecord(d))) return halt();

      enter("DataUploading", ` (${i + 1} of ${data.length})`);
    }

    if (!files.every((f) => hasPid(f) && f.created)) {
      logger.warn(
        `Not all files in package ${packageId} have pids and are created - skipping resource map creation`,
      );
      return halt();
    }

    enter("DataComplete");

    const resourceMap = prepareResourceMapObject(
      {
        metadataPid: metadata.pid ?? "",
        dataPids: data.map((d) => d.pid ?? ""),
        childPids: determineChildPids(rows, packageId),
      },
      this.env,
      this.collaborators,
    );

    if (!resourceMap) {
      for (const f of files) f.resmapCreated = false;
      return halt();
    }

    enter("ResourceMapBuilt");

    const response = await this.collaborators.repository.createObject(
      resourceMap.pid,
      resourceMap.sysmeta,
      resourceMap.source,
    );

    if (response.state === "error") {
      logger.error(
        `Error creating resource map ${resourceMap.pid} for package ${packageId} (${response.kind}): ${response.error}`,
      );
      for (const f of files) f.resmapCreated = false;
      return halt();
    }

    for (const f of files) f.resmapCreated = true;

    enter("ResourceMapUploaded", ` with resource map ${response.data}`);

    return files;
  }
}
