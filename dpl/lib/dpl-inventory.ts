import { z } from "zod";
import { ErrorSpecific } from "./common-types";
import { DplError } from "./dpl-errors";
import { generateResourceMapPid } from "./dpl-identifiers";

export const InventoryRecordSchema = z.object({
  // the fully-qualified relative path of the file - which is also our key
  file: z.string().min(1),
  filename: z.string(),
  checksum: z.string().regex(/^[0-9a-fA-F]+$/, "checksum must be hex"),
  size: z.number().int().nonnegative(),
  formatId: z.string().min(1),
  package: z.string().nullable().default(null),
  parentPackage: z.string().nullable().default(null),
  isMetadata: z.boolean(),
  pid: z.string().nullable().default(null),
  pidOld: z.string().nullable().default(null),
  created: z.boolean().default(false),
  resmapCreated: z.boolean().default(false),
  ready: z.boolean().default(true),
});

/**
 * One row of the inventory - a single file on disk and everything we know
 * about its life in the repository.
 */
export type InventoryRecord = z.infer<typeof InventoryRecordSchema>;

export type Inventory = readonly InventoryRecord[];

/**
 * Check the shape of an inventory as it crosses into the library and
 * return it as typed records (with defaults filled in). Every problem found is
 * reported - not just the first.
 *
 * @param rows anything - usually the parsed content of an inventory file
 */
export function validateInventory(rows: unknown): InventoryRecord[] {
  if (!Array.isArray(rows))
    throw new DplError("Inventory invalid", [
      { message: "Inventory must be an array of records" },
    ]);

  if (rows.length === 0)
    throw new DplError("Inventory invalid", [
      { message: "Inventory must contain at least one record" },
    ]);

  const errors: ErrorSpecific[] = [];
  const records: InventoryRecord[] = [];
  const seenFiles = new Set<string>();

  rows.forEach((row, index) => {
    const parsed = InventoryRecordSchema.safeParse(row);

    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        errors.push({
          message: `Row ${index}: ${issue.path.join(".") || "record"} ${issue.message}`,
        });
      }
      return;
    }

    if (seenFiles.has(parsed.data.file)) {
      errors.push({
        message: `Row ${index}: file is listed more than once in the inventory`,
        file: parsed.data.file,
      });
      return;
    }

    seenFiles.add(parsed.data.file);
    records.push(parsed.data);
  });

  if (errors.length > 0) throw new DplError("Inventory invalid", errors);

  return records;
}

/**
 * The rows of a package as copies (so that the caller's inventory is never
 * changed underneath them), in inventory order.
 */
export function packageRecords(
  inventory: Inventory,
  packageId: string,
): InventoryRecord[] {
  return inventory.filter((r) => r.package === packageId).map((r) => ({ ...r }));
}

/**
 * The metadata rows of all packages nested directly under the given package.
 */
export function childPackages(
  inventory: Inventory,
  packageId: string,
): InventoryRecord[] {
  return inventory.filter(
    (r) => r.parentPackage === packageId && r.isMetadata,
  );
}

/**
 * The resource map identifiers of the packages nested under the given package.
 */
export function determineChildPids(
  inventory: Inventory,
  packageId: string,
): string[] {
  const result: string[] = [];

  for (const child of childPackages(inventory, packageId)) {
    if (child.pid) result.push(generateResourceMapPid(child.pid));
  }

  return result;
}

export function hasPid(record: InventoryRecord): boolean {
  return typeof record.pid === "string" && record.pid.length > 0;
}

/**
 * True if every object in the package has an identifier and exists in the
 * repository (the resource map is not considered).
 */
export function isPackageComplete(
  inventory: Inventory,
  packageId: string,
): boolean {
  const rows = inventory.filter((r) => r.package === packageId);

  return rows.length > 0 && rows.every((r) => hasPid(r) && r.created);
}

/**
 * True if the package objects and its resource map are all in the repository.
 */
export function isPackageDone(rows: Inventory): boolean {
  return rows.length > 0 && rows.every((r) => hasPid(r) && r.created && r.resmapCreated);
}

/**
 * Return the packages that could be processed right now - that is, packages
 * with ready rows that are not yet done and whose children are done (objects
 * and resource map) so that the parent resource map can point at them.
 * Packages are listed in the order they first appear in the inventory.
 */
export function readyPackages(inventory: Inventory): string[] {
  const names: string[] = [];

  for (const r of inventory) {
    if (r.package && r.ready && !names.includes(r.package)) names.push(r.package);
  }

  return names.filter((name) => {
    if (isPackageDone(inventory.filter((r) => r.package === name))) return false;

    return childPackages(inventory, name).every(
      (child) =>
        child.package !== null &&
        isPackageDone(inventory.filter((r) => r.package === child.package)),
    );
  });
}
