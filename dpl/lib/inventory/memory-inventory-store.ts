import { Inventory, InventoryRecord } from "../dpl-inventory";
import { InventoryStore } from "./inventory-store";

export class MemoryInventoryStore extends InventoryStore {
  private _rows: InventoryRecord[];

  constructor(rows: Inventory = []) {
    super();
    this._rows = rows.map((r) => ({ ...r }));
  }

  public async load(): Promise<InventoryRecord[]> {
    return this._rows.map((r) => ({ ...r }));
  }

  public async save(rows: Inventory): Promise<void> {
    this._rows = rows.map((r) => ({ ...r }));
  }
}
