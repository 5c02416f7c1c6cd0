import { buildSysmeta, SystemMetadata } from "../dpl-descriptor";
import { DplCollaborators } from "../dpl-collaborators";
import { DplEnvironment } from "../dpl-environment";
import { ObjectSource } from "../dpl-repository";
import { getLogger } from "../logging";
import { generateResourceMap, ResourceMapInput } from "./resource-map";

const logger = getLogger("resource-map");

/**
 * A resource map ready to hand to the repository.
 */
export type ResourceMapObject = {
  pid: string;
  sysmeta: SystemMetadata;
  source: ObjectSource;
};

/**
 * Build, serialize and describe the resource map of a package.
 *
 * @returns the object to upload - or undefined if any step failed (logged)
 */
export function prepareResourceMapObject(
  input: Omit<ResourceMapInput, "resolveBase">,
  env: DplEnvironment,
  collaborators: DplCollaborators,
): ResourceMapObject | undefined {
  try {
    const map = generateResourceMap({ ...input, resolveBase: env.resolveBase });
    const bytes = collaborators.serializer.serialize(map, env.resolveBase);

    const sysmeta = buildSysmeta(
      {
        identifier: map.resourceMapPid,
        formatId: collaborators.serializer.formatId,
        size: bytes.length,
        checksum: collaborators.hasher.checksumBytes(bytes),
        submitter: env.submitter,
        rightsHolder: env.rightsHolder,
        fileName: map.resourceMapPid.replace(/:/g, "_") + ".xml",
      },
      collaborators.accessPolicy,
    );

    logger.info(
      `Resource map ${map.resourceMapPid} built with ${map.statements.length} statement(s) over ${map.identifiers.length} identifier(s)`,
    );

    return {
      pid: map.resourceMapPid,
      sysmeta: sysmeta,
      source: { kind: "bytes", bytes: bytes },
    };
  } catch (e) {
    logger.error(
      `Error building resource map for metadata ${input.metadataPid}: ${e instanceof Error ? e.message : String(e)}`,
    );
    return undefined;
  }
}
