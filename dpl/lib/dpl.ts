export {
  ErrorReport,
  ErrorSpecific,
  FailureKind,
  RepositoryFailure,
  RepositoryResult,
} from "./common-types";
export { DplError } from "./dpl-errors";
export {
  Inventory,
  InventoryRecord,
  InventoryRecordSchema,
  childPackages,
  determineChildPids,
  isPackageComplete,
  isPackageDone,
  packageRecords,
  readyPackages,
  validateInventory,
} from "./dpl-inventory";
export { InventoryStore, mergeInventoryRows } from "./inventory/inventory-store";
export { MemoryInventoryStore } from "./inventory/memory-inventory-store";
export { JsonInventoryStore } from "./inventory/json-inventory-store";
export { DplEnvironment, loadEnvironment, parseEnvironment } from "./dpl-environment";
export { DplCollaborators, createCollaborators } from "./dpl-collaborators";
export {
  AccessPolicyDecorator,
  AccessRule,
  StandardAccessPolicy,
  SystemMetadata,
  buildSysmeta,
  createSysmeta,
} from "./dpl-descriptor";
export { Hasher, Sha256Hasher } from "./dpl-hasher";
export { ObjectSource, RepositoryClient, encodeIdentifier } from "./dpl-repository";
export { PosixRepository } from "./posix/posix-repository";
export { S3Repository } from "./s3/s3-repository";
export { RepositoryFactory } from "./repository/repository-factory";
export {
  LOCAL_UUID_SCHEME,
  generateResourceMapPid,
  getOrCreatePid,
} from "./dpl-identifiers";
export { createObject } from "./dpl-upload";
export {
  OtherStatement,
  ResourceMap,
  ResourceMapInput,
  Statement,
  filterPackagingStatements,
  generateResourceMap,
} from "./resource-map/resource-map";
export {
  RdfXmlSerializer,
  ResourceMapSerializer,
  parseResourceMap,
} from "./resource-map/rdfxml-serializer";
export {
  MetadataIdentifierPatcher,
  PackageIdPatcher,
} from "./metadata/package-id-patcher";
export { PackageLoader, PackageState, packageState } from "./dpl-package";
export { PackageUpdater, UpdateOptions } from "./dpl-update";
