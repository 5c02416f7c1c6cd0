import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { isEqual, uniqWith } from "lodash";
import { DplError } from "../dpl-errors";
import {
  CLIENT_NAME,
  CREATOR_NODE,
  DCTERMS_CREATOR,
  DCTERMS_IDENTIFIER,
  FOAF_NAME,
  ORE_AGGREGATES,
  ORE_AGGREGATION,
  ORE_DESCRIBES,
  ORE_IS_AGGREGATED_BY,
  ORE_IS_DESCRIBED_BY,
  ORE_RESOURCE_MAP,
  RDF_TYPE,
  ResourceMap,
  resolveUri,
  Statement,
} from "./resource-map";

const RDF_NS = "http://www.w3.org/1999/02/22-rdf-syntax-ns#";
const ORE_NS = "http://www.openarchives.org/ore/terms/";
const XSD_STRING = "http://www.w3.org/2001/XMLSchema#string";

const WELL_KNOWN_PREFIXES: Record<string, string> = {
  [RDF_NS]: "rdf",
  [ORE_NS]: "ore",
  "http://purl.org/spar/cito/": "cito",
  "http://purl.org/dc/terms/": "dcterms",
  "http://xmlns.com/foaf/0.1/": "foaf",
};

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>\n';

/**
 * Turns the statements of a resource map into the bytes we store.
 */
export interface ResourceMapSerializer {
  readonly formatId: string;

  serialize(resourceMap: ResourceMap, resolveBase: string): Buffer;
}

/**
 * Add the OAI-ORE structure every resource map carries - the map describing
 * an aggregation, and the aggregation aggregating each identifier.
 */
export function oreStatements(
  resourceMap: ResourceMap,
  resolveBase: string,
): Statement[] {
  const mapUri = resolveUri(resolveBase, resourceMap.resourceMapPid);
  const aggregationUri = mapUri + "#aggregation";

  const uri = (subject: string, predicate: string, object: string): Statement => ({
    subject,
    predicate,
    object,
    subjectType: "uri",
    objectType: "uri",
  });
  const identifier = (subject: string, pid: string): Statement => ({
    subject,
    predicate: DCTERMS_IDENTIFIER,
    object: pid,
    subjectType: "uri",
    objectType: "literal",
    dataTypeURI: XSD_STRING,
  });

  const result: Statement[] = [
    uri(mapUri, RDF_TYPE, ORE_RESOURCE_MAP),
    uri(mapUri, ORE_DESCRIBES, aggregationUri),
    identifier(mapUri, resourceMap.resourceMapPid),
    {
      subject: mapUri,
      predicate: DCTERMS_CREATOR,
      object: CREATOR_NODE,
      subjectType: "uri",
      objectType: "blank",
    },
    {
      subject: CREATOR_NODE,
      predicate: FOAF_NAME,
      object: CLIENT_NAME,
      subjectType: "blank",
      objectType: "literal",
    },
    uri(aggregationUri, RDF_TYPE, ORE_AGGREGATION),
    uri(aggregationUri, ORE_IS_DESCRIBED_BY, mapUri),
  ];

  for (const pid of resourceMap.identifiers) {
    const pidUri = resolveUri(resolveBase, pid);

    result.push(uri(aggregationUri, ORE_AGGREGATES, pidUri));
    result.push(uri(pidUri, ORE_IS_AGGREGATED_BY, aggregationUri));
    result.push(identifier(pidUri, pid));
  }

  return result;
}

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareStatements(a: Statement, b: Statement): number {
  return (
    compareStrings(a.subjectType, b.subjectType) ||
    compareStrings(a.subject, b.subject) ||
    compareStrings(a.predicate, b.predicate) ||
    compareStrings(a.objectType, b.objectType) ||
    compareStrings(a.object, b.object) ||
    compareStrings(a.dataTypeURI ?? "", b.dataTypeURI ?? "")
  );
}

/**
 * Split a predicate URI into namespace and local name at the last '#' or '/'.
 */
export function splitPredicate(predicate: string): [string, string] {
  const cut = Math.max(predicate.lastIndexOf("#"), predicate.lastIndexOf("/")) + 1;
  const local = predicate.slice(cut);

  if (cut === 0 || !/^[A-Za-z_][A-Za-z0-9_.-]*$/.test(local))
    throw new DplError("Statement cannot be written as RDF/XML", [
      { message: `Predicate ${predicate} does not end in a valid XML name` },
    ]);

  return [predicate.slice(0, cut), local];
}

/**
 * Writes resource maps as RDF/XML. Statements are deduplicated and sorted so
 * that the same map always serializes to the same bytes (and checksum).
 */
export class RdfXmlSerializer implements ResourceMapSerializer {
  public readonly formatId = "http://www.openarchives.org/ore/terms";

  private builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    format: true,
    suppressEmptyNode: true,
  });

  public serialize(resourceMap: ResourceMap, resolveBase: string): Buffer {
    const statements = uniqWith(
      [...oreStatements(resourceMap, resolveBase), ...resourceMap.statements],
      isEqual,
    ).sort(compareStatements);

    // allocate prefixes for any namespaces beyond the ones we know
    const prefixes = new Map<string, string>(Object.entries(WELL_KNOWN_PREFIXES));
    const extraNamespaces = Array.from(
      new Set(statements.map((s) => splitPredicate(s.predicate)[0])),
    )
      .filter((ns) => !prefixes.has(ns))
      .sort(compareStrings);

    extraNamespaces.forEach((ns, i) => prefixes.set(ns, `ns${i + 1}`));

    const descriptions: Record<string, unknown>[] = [];
    let current: Record<string, unknown> | undefined = undefined;
    let currentKey = "";

    for (const s of statements) {
      const key = `${s.subjectType} ${s.subject}`;

      if (!current || key !== currentKey) {
        current =
          s.subjectType === "blank"
            ? { "@_rdf:nodeID": s.subject }
            : { "@_rdf:about": s.subject };
        currentKey = key;
        descriptions.push(current);
      }

      const [ns, local] = splitPredicate(s.predicate);
      const elementName = `${prefixes.get(ns)}:${local}`;

      const values = current[elementName];
      const value = this.objectValue(s);

      if (Array.isArray(values)) values.push(value);
      else current[elementName] = [value];
    }

    const root: Record<string, unknown> = {};

    for (const [ns, prefix] of prefixes) root[`@_xmlns:${prefix}`] = ns;

    root["rdf:Description"] = descriptions;

    return Buffer.from(
      XML_DECLARATION + this.builder.build({ "rdf:RDF": root }),
      "utf8",
    );
  }

  private objectValue(s: Statement): Record<string, string> {
    switch (s.objectType) {
      case "uri":
        return { "@_rdf:resource": s.object };
      case "blank":
        return { "@_rdf:nodeID": s.object };
      case "literal":
        if (s.dataTypeURI)
          return { "#text": s.object, "@_rdf:datatype": s.dataTypeURI };
        return { "#text": s.object };
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value === undefined) return [];
  return [value];
}

/**
 * Read the statements out of an RDF/XML resource map - as written by
 * RdfXmlSerializer (one level of rdf:Description elements).
 *
 * @param xml the content of the resource map
 */
export function parseResourceMap(xml: string | Buffer): Statement[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (_name, jpath, _isLeaf, isAttribute) =>
      !isAttribute && jpath.startsWith("rdf:RDF."),
  });

  const parsed: unknown = parser.parse(xml);
  const rdf = isRecord(parsed) ? parsed["rdf:RDF"] : undefined;

  if (!isRecord(rdf))
    throw new DplError("Resource map could not be parsed", [
      { message: "Document has no rdf:RDF root element" },
    ]);

  const namespaces = new Map<string, string>();

  for (const [k, v] of Object.entries(rdf)) {
    if (k.startsWith("@_xmlns:") && typeof v === "string")
      namespaces.set(k.slice("@_xmlns:".length), v);
  }

  const statements: Statement[] = [];

  for (const description of asArray(rdf["rdf:Description"])) {
    if (!isRecord(description)) continue;

    const about = description["@_rdf:about"];
    const nodeId = description["@_rdf:nodeID"];

    let subject: string;
    let subjectType: Statement["subjectType"];

    if (typeof about === "string") {
      subject = about;
      subjectType = "uri";
    } else if (typeof nodeId === "string") {
      subject = nodeId;
      subjectType = "blank";
    } else continue;

    for (const [elementName, values] of Object.entries(description)) {
      if (elementName.startsWith("@_")) continue;

      const colon = elementName.indexOf(":");
      const ns = colon > 0 ? namespaces.get(elementName.slice(0, colon)) : undefined;

      if (!ns)
        throw new DplError("Resource map could not be parsed", [
          { message: `Element ${elementName} is not in a declared namespace` },
        ]);

      const predicate = ns + elementName.slice(colon + 1);

      for (const v of asArray(values)) {
        statements.push(toStatement(subject, subjectType, predicate, v));
      }
    }
  }

  return statements;
}

function toStatement(
  subject: string,
  subjectType: Statement["subjectType"],
  predicate: string,
  value: unknown,
): Statement {
  const base = { subject, subjectType, predicate };

  if (!isRecord(value)) return { ...base, object: String(value), objectType: "literal" };

  const resource = value["@_rdf:resource"];
  const nodeId = value["@_rdf:nodeID"];
  const dataType = value["@_rdf:datatype"];
  const text = value["#text"];

  if (typeof resource === "string")
    return { ...base, object: resource, objectType: "uri" };

  if (typeof nodeId === "string") return { ...base, object: nodeId, objectType: "blank" };

  const literal: Statement = {
    ...base,
    object: text === undefined ? "" : String(text),
    objectType: "literal",
  };

  if (typeof dataType === "string") literal.dataTypeURI = dataType;

  return literal;
}
