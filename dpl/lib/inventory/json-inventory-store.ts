import { readFile, rename, writeFile } from "node:fs/promises";
import { isAbsolute } from "node:path";
import {
  Inventory,
  InventoryRecord,
  validateInventory,
} from "../dpl-inventory";
import { InventoryStore } from "./inventory-store";

/**
 * An inventory kept as a JSON array of records in a single file.
 */
export class JsonInventoryStore extends InventoryStore {
  constructor(private absoluteInventoryPath: string) {
    super();

    if (!isAbsolute(absoluteInventoryPath))
      throw new Error("Inventory path must be absolute");
  }

  public get path(): string {
    return this.absoluteInventoryPath;
  }

  public async load(): Promise<InventoryRecord[]> {
    const content = await readFile(this.absoluteInventoryPath, {
      encoding: "utf8",
    });

    return validateInventory(JSON.parse(content));
  }

  public async save(rows: Inventory): Promise<void> {
    // write alongside and then rename so a crash part way through a save
    // never leaves a truncated inventory behind
    const temporaryPath = `${this.absoluteInventoryPath}.${process.pid}.tmp`;

    await writeFile(temporaryPath, JSON.stringify(rows, null, 2) + "\n", {
      encoding: "utf8",
    });
    await rename(temporaryPath, this.absoluteInventoryPath);
  }
}
