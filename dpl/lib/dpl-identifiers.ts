import { v4 as uuidv4 } from "uuid";
import { InventoryRecord } from "./dpl-inventory";
import { RepositoryClient } from "./dpl-repository";
import { DplError } from "./dpl-errors";
import { getLogger } from "./logging";

const logger = getLogger("identifiers");

// the one scheme we can mint locally without asking the repository
export const LOCAL_UUID_SCHEME = "UUID";

const RESOURCE_MAP_PREFIX = "resource_map_";

/**
 * Get the already-minted pid of the record or mint a new one.
 *
 * An empty string is returned if the repository could not mint
 * an identifier - the caller must treat that as "not resolved".
 *
 * @param record a single inventory record
 * @param repository the repository that will mint the identifier (if needed)
 * @param scheme the identifier scheme to use
 */
export async function getOrCreatePid(
  record: InventoryRecord,
  repository: RepositoryClient,
  scheme: string = LOCAL_UUID_SCHEME,
): Promise<string> {
  if (record.pid) {
    logger.info(`Using existing pid of ${record.pid}`);
    return record.pid;
  }

  logger.info(`Minting new pid with scheme ${scheme} for ${record.file}`);

  if (scheme === LOCAL_UUID_SCHEME) return `urn:uuid:${uuidv4()}`;

  const minted = await repository.mintIdentifier(scheme);

  if (minted.state === "error") {
    logger.error(
      `Error generating identifier for file ${record.file} (${minted.kind}): ${minted.error}`,
    );
    return "";
  }

  return minted.data;
}

/**
 * The pid of the resource map of a package, derived from the pid of its
 * metadata.
 */
export function generateResourceMapPid(metadataPid: string): string {
  if (!metadataPid)
    throw new DplError("Resource map pid cannot be generated", [
      { message: "A metadata pid is needed to derive a resource map pid" },
    ]);

  if (metadataPid.startsWith(RESOURCE_MAP_PREFIX)) return metadataPid;

  return RESOURCE_MAP_PREFIX + metadataPid;
}
