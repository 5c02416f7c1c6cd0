import { createHash } from "node:crypto";

/**
 * Computes the checksums of content we build in memory (resource maps,
 * patched metadata). Data files carry theirs in the inventory.
 */
export interface Hasher {
  checksumBytes(bytes: Buffer): string;
}

export class Sha256Hasher implements Hasher {
  /**
   * Return the hex sha256 of the bytes.
   */
  public checksumBytes(bytes: Buffer): string {
    return createHash("sha256").update(bytes).digest("hex");
  }
}
