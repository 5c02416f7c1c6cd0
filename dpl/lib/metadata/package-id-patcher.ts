import { readFile } from "node:fs/promises";
import { XMLBuilder, XMLParser } from "fast-xml-parser";
import { DplError } from "../dpl-errors";

/**
 * Writes a new identifier into the content of a metadata document, so that
 * the document stored under a new pid also names itself by that pid.
 */
export interface MetadataIdentifierPatcher {
  /**
   * @param sourcePath the metadata document (which is left untouched)
   * @param newPid the identifier to write into the document
   * @returns the content of the patched document
   */
  patchIdentifier(sourcePath: string, newPid: string): Promise<Buffer>;
}

const XML_OPTIONS = {
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  commentPropName: "#comment",
};

/**
 * Sets the packageId attribute of the root element (the EML convention).
 */
export class PackageIdPatcher implements MetadataIdentifierPatcher {
  constructor(private attributeName: string = "packageId") {}

  public async patchIdentifier(sourcePath: string, newPid: string): Promise<Buffer> {
    const parsed: unknown = new XMLParser(XML_OPTIONS).parse(
      await readFile(sourcePath),
    );

    if (!Array.isArray(parsed))
      throw new DplError("Metadata could not be patched", [
        { message: `Could not parse ${sourcePath} as XML`, file: sourcePath },
      ]);

    // in preserveOrder form each node is an object with the tag name as its one
    // key (plus ":@" for attributes) - the root is the first real element
    const root = parsed.find(
      (node): node is Record<string, unknown> =>
        typeof node === "object" &&
        node !== null &&
        Object.keys(node).some((k) => !k.startsWith("?") && !k.startsWith("#") && k !== ":@"),
    );

    if (!root)
      throw new DplError("Metadata could not be patched", [
        { message: `No root element found in ${sourcePath}`, file: sourcePath },
      ]);

    const attributes = root[":@"];

    root[":@"] = {
      ...(typeof attributes === "object" && attributes !== null ? attributes : {}),
      [`@_${this.attributeName}`]: newPid,
    };

    return Buffer.from(new XMLBuilder(XML_OPTIONS).build(parsed), "utf8");
  }
}
