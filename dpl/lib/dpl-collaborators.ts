import { AccessPolicyDecorator, StandardAccessPolicy } from "./dpl-descriptor";
import { DplEnvironment } from "./dpl-environment";
import { Hasher, Sha256Hasher } from "./dpl-hasher";
import { RepositoryClient } from "./dpl-repository";
import {
  MetadataIdentifierPatcher,
  PackageIdPatcher,
} from "./metadata/package-id-patcher";
import { RepositoryFactory } from "./repository/repository-factory";
import {
  RdfXmlSerializer,
  ResourceMapSerializer,
} from "./resource-map/rdfxml-serializer";

/**
 * Everything the orchestrators talk to. They are always handed these
 * already constructed - they never make their own.
 */
export type DplCollaborators = {
  repository: RepositoryClient;
  serializer: ResourceMapSerializer;
  hasher: Hasher;
  accessPolicy: AccessPolicyDecorator;
  patcher: MetadataIdentifierPatcher;
};

/**
 * The standard set of collaborators for an environment - with any of them
 * replaceable (tests mostly swap in their own repository).
 */
export function createCollaborators(
  env: DplEnvironment,
  overrides: Partial<DplCollaborators> = {},
): DplCollaborators {
  return {
    repository: overrides.repository ?? RepositoryFactory.CreateRepository(env.repository),
    serializer: overrides.serializer ?? new RdfXmlSerializer(),
    hasher: overrides.hasher ?? new Sha256Hasher(),
    accessPolicy:
      overrides.accessPolicy ??
      new StandardAccessPolicy(env.accessRules, env.clearReplicationPolicy),
    patcher: overrides.patcher ?? new PackageIdPatcher(),
  };
}
