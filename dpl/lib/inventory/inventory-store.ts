import { Inventory, InventoryRecord } from "../dpl-inventory";

/**
 * Somewhere that an inventory is persisted between runs. The orchestrators
 * never touch a store themselves - they are handed rows and hand back the rows
 * they changed, and it is up to the caller to merge those back in before the
 * next invocation.
 */
export abstract class InventoryStore {
  public abstract load(): Promise<InventoryRecord[]>;

  public abstract save(rows: Inventory): Promise<void>;

  /**
   * Merge updated rows into the stored inventory, row by row (keyed by file).
   * The "created" flags only ever move from false to true - so a stale
   * writer cannot undo the work of another.
   *
   * @param updates rows returned from an orchestrator call
   * @returns the full merged inventory as now stored
   */
  public async merge(updates: Inventory): Promise<InventoryRecord[]> {
    const merged = mergeInventoryRows(await this.load(), updates);

    await this.save(merged);

    return merged;
  }
}

export function mergeInventoryRows(
  current: Inventory,
  updates: Inventory,
): InventoryRecord[] {
  const byFile = new Map<string, InventoryRecord>();

  for (const u of updates) byFile.set(u.file, u);

  const result = current.map((row) => {
    const update = byFile.get(row.file);

    if (!update) return { ...row };

    byFile.delete(row.file);

    return {
      ...update,
      created: row.created || update.created,
      resmapCreated: row.resmapCreated || update.resmapCreated,
    };
  });

  // rows we have never seen before are appended in the order given
  for (const u of byFile.values()) result.push({ ...u });

  return result;
}
