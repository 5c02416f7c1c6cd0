import { join } from "node:path";
import { InventoryRecord } from "./dpl-inventory";
import { SystemMetadata } from "./dpl-descriptor";
import { RepositoryClient } from "./dpl-repository";
import { getLogger } from "./logging";

const logger = getLogger("upload");

const MEBIBYTE = 1024 * 1024;

function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

/**
 * Upload the file of an inventory record to the repository under the
 * record's pid.
 *
 * This never throws - any failure is logged and reported as false.
 *
 * @param record the record to upload (must have a pid)
 * @param sysmeta the system metadata for the object
 * @param basePath the path prefix used to find record.file on disk
 * @param repository where to upload to
 * @returns true if the object was created
 */
export async function createObject(
  record: InventoryRecord,
  sysmeta: SystemMetadata,
  basePath: string,
  repository: RepositoryClient,
): Promise<boolean> {
  if (!record.pid) {
    logger.error(`Refusing to create an object for ${record.file} which has no pid`);
    return false;
  }

  const pathOnDisk = join(basePath, record.file);
  const startTime = performance.now();

  try {
    const response = await repository.createObject(record.pid, sysmeta, {
      kind: "file",
      path: pathOnDisk,
      size: record.size,
    });

    if (response.state === "error") {
      logger.error(
        `Failed to create object with pid ${record.pid} for file ${record.file} (${response.kind}): ${response.error}`,
      );
      return false;
    }

    logThroughput(record.size, startTime);

    logger.info(
      `Successfully created object with pid ${response.data} for file ${record.file}`,
    );

    return true;
  } catch (e) {
    // the repository contract is to return failures - but we are the last
    // line before the orchestrator so we make sure nothing escapes
    logger.error(
      `Error during creation of object for file ${record.file}: ${e instanceof Error ? e.message : String(e)}`,
    );
    return false;
  }
}

function logThroughput(sizeBytes: number, startTime: number) {
  const seconds = round2((performance.now() - startTime) / 1000);
  const megabytes = round2(sizeBytes / MEBIBYTE);

  // very small uploads can complete in under our 10ms rounding
  const rate = seconds > 0 ? `${round2(megabytes / seconds)} MB/s` : "n/a";

  logger.info(`Inserted ${megabytes} MB in ${seconds} s (${rate})`);
}
