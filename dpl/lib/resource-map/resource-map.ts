import { isEqual, uniq, uniqWith } from "lodash";
import { encodeIdentifier } from "../dpl-repository";
import { generateResourceMapPid } from "../dpl-identifiers";
import { DplError } from "../dpl-errors";
import { getLogger } from "../logging";

const logger = getLogger("resource-map");

export const CITO_DOCUMENTS = "http://purl.org/spar/cito/documents";
export const CITO_IS_DOCUMENTED_BY = "http://purl.org/spar/cito/isDocumentedBy";
export const ORE_AGGREGATES = "http://www.openarchives.org/ore/terms/aggregates";
export const ORE_IS_AGGREGATED_BY =
  "http://www.openarchives.org/ore/terms/isAggregatedBy";
export const ORE_DESCRIBES = "http://www.openarchives.org/ore/terms/describes";
export const ORE_IS_DESCRIBED_BY =
  "http://www.openarchives.org/ore/terms/isDescribedBy";
export const DCTERMS_IDENTIFIER = "http://purl.org/dc/terms/identifier";
export const FOAF_NAME = "http://xmlns.com/foaf/0.1/name";
export const DCTERMS_CREATOR = "http://purl.org/dc/terms/creator";
export const RDF_TYPE = "http://www.w3.org/1999/02/22-rdf-syntax-ns#type";
export const ORE_RESOURCE_MAP = "http://www.openarchives.org/ore/terms/ResourceMap";
export const ORE_AGGREGATION = "http://www.openarchives.org/ore/terms/Aggregation";

export const DEFAULT_RESOLVE_BASE = "https://cn.dataone.org/cn/v2/resolve";

// the name we give ourselves as the creator agent of resource maps
export const CLIENT_NAME = "dpl";

// the blank node standing for that agent
export const CREATOR_NODE = "creator";

export type SubjectType = "uri" | "blank";

export type ObjectType = "uri" | "literal" | "blank";

/**
 * A single RDF statement (triple).
 */
export type Statement = {
  subject: string;
  predicate: string;
  object: string;
  subjectType: SubjectType;
  objectType: ObjectType;
  dataTypeURI?: string;
};

/**
 * A statement supplied by a caller - where the term types default to "uri".
 */
export type OtherStatement = Omit<Statement, "subjectType" | "objectType"> & {
  subjectType?: SubjectType;
  objectType?: ObjectType;
};

export type ResourceMapInput = {
  metadataPid: string;
  dataPids?: string[];
  childPids?: string[];
  otherStatements?: OtherStatement[];
  resolveBase?: string;
  resourceMapPid?: string;
};

export type ResourceMap = {
  resourceMapPid: string;

  // the deduplicated statements of the package relationships
  statements: Statement[];

  // every identifier aggregated by the resource map (metadata, data and children)
  identifiers: string[];
};

const STATEMENT_FIELDS = new Set([
  "subject",
  "predicate",
  "object",
  "subjectType",
  "objectType",
  "dataTypeURI",
]);

export function resolveUri(resolveBase: string, pid: string): string {
  return `${resolveBase}/${encodeIdentifier(pid)}`;
}

function uriStatement(subject: string, predicate: string, object: string): Statement {
  return {
    subject: subject,
    predicate: predicate,
    object: object,
    subjectType: "uri",
    objectType: "uri",
  };
}

/**
 * Build the relationship statements of a package - metadata documenting each
 * data object, the aggregation of child resource maps - plus any extra
 * statements the caller wants carried along.
 *
 * The result depends only on the *sets* of pids given - repeating a pid
 * or changing the order of the lists does not change the statement set.
 */
export function generateResourceMap(input: ResourceMapInput): ResourceMap {
  const { metadataPid, otherStatements } = input;
  const resolveBase = input.resolveBase ?? DEFAULT_RESOLVE_BASE;

  if (!metadataPid)
    throw new DplError("Resource map cannot be generated", [
      { message: "A resource map needs exactly one metadata pid" },
    ]);

  let resourceMapPid = input.resourceMapPid;

  if (resourceMapPid === undefined) {
    logger.debug("Automatically generating the resource map pid based on the metadata pid");
    resourceMapPid = generateResourceMapPid(metadataPid);
  }

  if (!resourceMapPid)
    throw new DplError("Resource map cannot be generated", [
      { message: "The resource map pid must not be empty" },
    ]);

  const dataPids = uniq(input.dataPids ?? []);
  const childPids = uniq(input.childPids ?? []);

  const metadataUri = resolveUri(resolveBase, metadataPid);
  const aggregationUri = resolveUri(resolveBase, resourceMapPid) + "#aggregation";

  const statements: Statement[] = [];

  // the metadata documents itself - which is what lets a metadata-only
  // package be picked up by indexers
  statements.push(uriStatement(metadataUri, CITO_DOCUMENTS, metadataUri));
  statements.push(uriStatement(metadataUri, CITO_IS_DOCUMENTED_BY, metadataUri));

  for (const dataPid of dataPids) {
    const dataUri = resolveUri(resolveBase, dataPid);

    statements.push(uriStatement(metadataUri, CITO_DOCUMENTS, dataUri));
    statements.push(uriStatement(dataUri, CITO_IS_DOCUMENTED_BY, metadataUri));
  }

  for (const childPid of childPids) {
    const childUri = resolveUri(resolveBase, childPid);

    statements.push(uriStatement(aggregationUri, ORE_AGGREGATES, childUri));
    statements.push(uriStatement(childUri, ORE_IS_AGGREGATED_BY, aggregationUri));
    statements.push(uriStatement(metadataUri, CITO_DOCUMENTS, childUri));
    statements.push(uriStatement(childUri, CITO_IS_DOCUMENTED_BY, metadataUri));
  }

  if (otherStatements && otherStatements.length > 0) {
    logger.info(
      `Adding ${otherStatements.length} custom statement(s) to the resource map`,
    );

    for (const other of otherStatements) {
      const unexpected = Object.keys(other).filter((k) => !STATEMENT_FIELDS.has(k));

      if (unexpected.length > 0)
        logger.warn(
          `Custom statement fields do not match the resource map statement fields - found extra ${unexpected.join(", ")}`,
        );

      const merged: Statement = {
        ...other,
        subjectType: other.subjectType ?? "uri",
        objectType: other.objectType ?? "uri",
      };

      // an explicitly undefined datatype would otherwise defeat the dedup below
      if (merged.dataTypeURI === undefined) delete merged.dataTypeURI;

      statements.push(merged);
    }
  }

  return {
    resourceMapPid: resourceMapPid,
    statements: uniqWith(statements, isEqual),
    identifiers: uniq([metadataPid, ...dataPids, ...childPids]),
  };
}

const PACKAGING_PREDICATES = new Set([
  CITO_DOCUMENTS,
  CITO_IS_DOCUMENTED_BY,
  DCTERMS_IDENTIFIER,
  ORE_AGGREGATES,
  ORE_IS_AGGREGATED_BY,
  ORE_DESCRIBES,
  ORE_IS_DESCRIBED_BY,
]);

/**
 * Remove the statements that are regenerated whenever a resource map is
 * built - leaving only statements added by others (such as provenance).
 * Filtering an already filtered set changes nothing.
 *
 * @param statements statements read from an existing resource map
 */
export function filterPackagingStatements<T extends Statement>(
  statements: readonly T[],
): T[] {
  return statements.filter((s) => {
    if (PACKAGING_PREDICATES.has(s.predicate)) return false;

    if (
      s.predicate === FOAF_NAME &&
      (s.object === CLIENT_NAME || s.subject === CLIENT_NAME)
    )
      return false;

    if (
      s.predicate === RDF_TYPE &&
      (s.object === ORE_RESOURCE_MAP || s.object === ORE_AGGREGATION)
    )
      return false;

    if (
      s.predicate === DCTERMS_CREATOR &&
      s.objectType === "blank" &&
      s.object === CREATOR_NODE
    )
      return false;

    return true;
  });
}
