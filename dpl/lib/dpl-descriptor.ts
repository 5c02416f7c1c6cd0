import { stat } from "node:fs/promises";
import { join } from "node:path";
import { isEqual, uniqWith } from "lodash";
import { z } from "zod";
import { InventoryRecord } from "./dpl-inventory";
import { getLogger } from "./logging";

const logger = getLogger("descriptor");

export const AccessRuleSchema = z.object({
  subject: z.string().min(1),
  permission: z.enum(["read", "write", "changePermission"]),
});

export type AccessRule = z.infer<typeof AccessRuleSchema>;

export const ReplicationPolicySchema = z.object({
  replicationAllowed: z.boolean(),
  numberReplicas: z.number().int().nonnegative(),
  preferredMemberNodes: z.array(z.string()),
  blockedMemberNodes: z.array(z.string()),
});

export type ReplicationPolicy = z.infer<typeof ReplicationPolicySchema>;

/**
 * The repository-side description of a stored object ("system metadata").
 * Repositories store it as JSON and read it back through this schema.
 */
export const SystemMetadataSchema = z.object({
  identifier: z.string().min(1),
  formatId: z.string(),
  size: z.number().int().nonnegative(),
  checksum: z.string(),
  checksumAlgorithm: z.literal("SHA256"),
  submitter: z.string(),
  rightsHolder: z.string(),
  fileName: z.string(),
  replicationPolicy: ReplicationPolicySchema,
  accessPolicy: z.array(AccessRuleSchema),
  obsoletes: z.string().optional(),
  obsoletedBy: z.string().optional(),
});

export type SystemMetadata = z.infer<typeof SystemMetadataSchema>;

export const DEFAULT_REPLICATION_POLICY: ReplicationPolicy = {
  replicationAllowed: true,
  numberReplicas: 3,
  preferredMemberNodes: [],
  blockedMemberNodes: [],
};

export const DEFAULT_ACCESS_RULES: AccessRule[] = [
  { subject: "public", permission: "read" },
];

/**
 * The two adjustments made to every descriptor before it is used.
 */
export interface AccessPolicyDecorator {
  applyAccessRules(sysmeta: SystemMetadata): SystemMetadata;

  clearReplicationPolicy(sysmeta: SystemMetadata): SystemMetadata;
}

export class StandardAccessPolicy implements AccessPolicyDecorator {
  /**
   * @param rules the access rules attached to every object
   * @param clearReplication whether to switch replication off - needed for repository
   *        nodes that cannot take part in replication
   */
  constructor(
    private rules: AccessRule[] = DEFAULT_ACCESS_RULES,
    private clearReplication: boolean = true,
  ) {}

  public applyAccessRules(sysmeta: SystemMetadata): SystemMetadata {
    return {
      ...sysmeta,
      accessPolicy: uniqWith([...sysmeta.accessPolicy, ...this.rules], isEqual),
    };
  }

  public clearReplicationPolicy(sysmeta: SystemMetadata): SystemMetadata {
    if (!this.clearReplication) return sysmeta;

    return {
      ...sysmeta,
      replicationPolicy: {
        replicationAllowed: false,
        numberReplicas: 0,
        preferredMemberNodes: [],
        blockedMemberNodes: [],
      },
    };
  }
}

export type SysmetaFields = Pick<
  SystemMetadata,
  | "identifier"
  | "formatId"
  | "size"
  | "checksum"
  | "submitter"
  | "rightsHolder"
  | "fileName"
>;

/**
 * Build a descriptor from its basic fields and apply the standard
 * replication and access adjustments.
 */
export function buildSysmeta(
  fields: SysmetaFields,
  policy: AccessPolicyDecorator,
): SystemMetadata {
  const sysmeta: SystemMetadata = {
    ...fields,
    checksumAlgorithm: "SHA256",
    replicationPolicy: { ...DEFAULT_REPLICATION_POLICY },
    accessPolicy: [],
  };

  return policy.applyAccessRules(policy.clearReplicationPolicy(sysmeta));
}

/**
 * Create the system metadata for a single inventory record that is about to
 * be uploaded.
 *
 * @param record the record (which must already have a pid)
 * @param basePath the path prefix that locates record.file on disk
 * @param submitter the submitter subject for the object
 * @param rightsHolder the rights holder subject for the object
 * @param policy the replication/access adjustments to apply
 * @returns the system metadata - or undefined if it could not be built (which
 *          is a "try again later" situation for the caller)
 */
export async function createSysmeta(
  record: InventoryRecord,
  basePath: string,
  submitter: string,
  rightsHolder: string,
  policy: AccessPolicyDecorator,
): Promise<SystemMetadata | undefined> {
  if (!record.pid) {
    logger.error(`Cannot create system metadata for ${record.file} as it has no pid`);
    return undefined;
  }

  const pathOnDisk = join(basePath, record.file);

  try {
    const stats = await stat(pathOnDisk);

    if (!stats.isFile()) {
      logger.error(`System metadata not created as ${pathOnDisk} is not a plain file`);
      return undefined;
    }

    return buildSysmeta(
      {
        identifier: record.pid,
        formatId: record.formatId,
        size: record.size,
        checksum: record.checksum,
        submitter: submitter,
        rightsHolder: rightsHolder,
        fileName: record.filename,
      },
      policy,
    );
  } catch (e) {
    logger.error(
      `Error creating system metadata for file ${record.file}: ${e instanceof Error ? e.message : String(e)}`,
    );
    return undefined;
  }
}
