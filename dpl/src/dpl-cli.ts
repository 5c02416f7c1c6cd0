#!/usr/bin/env tsx

import { Command } from "commander";
import { resolve } from "node:path";
import {
  createCollaborators,
  DplEnvironment,
  DplError,
  generateResourceMap,
  JsonInventoryStore,
  loadEnvironment,
  PackageLoader,
  packageRecords,
  packageState,
  PackageUpdater,
  RdfXmlSerializer,
  readyPackages,
} from "../lib/dpl";
import { DEFAULT_RESOLVE_BASE } from "../lib/resource-map/resource-map";

type GlobalOptions = {
  env?: string;
  inventory?: string;
};

const program = new Command();

program
  .name("dpl")
  .description("Load file inventories into an object repository as data packages")
  .option("--env <path>", "the environment settings (YAML), by convention etc/environment.yml")
  .option("--inventory <path>", "the inventory (JSON array of records)");

async function setup() {
  const options = program.opts<GlobalOptions>();

  if (!options.env)
    throw new DplError("Environment not specified", [{ message: "--env must be given" }]);

  if (!options.inventory)
    throw new DplError("Inventory not specified", [{ message: "--inventory must be given" }]);

  // if the paths were specified relatively we want to make them
  // absolute before passing on
  const env = await loadEnvironment(resolve(options.env));
  const store = new JsonInventoryStore(resolve(options.inventory));
  const collaborators = createCollaborators(env);

  return { env, store, collaborators };
}

program
  .command("insert-file")
  .description("insert a single file of the inventory")
  .argument("<file>", "the file (relative path) as listed in the inventory")
  .action(async (file: string) => {
    const { env, store, collaborators } = await setup();

    const rows = await new PackageLoader(env, collaborators).insertFile(await store.load(), file);

    await store.merge(rows);

    console.log(JSON.stringify(rows, null, 2));
  });

program
  .command("insert-package")
  .description("insert the metadata, data and resource map of a package")
  .argument("<package>", "the package name")
  .action(async (packageId: string) => {
    const { env, store, collaborators } = await setup();

    const rows = await new PackageLoader(env, collaborators).insertPackage(
      await store.load(),
      packageId,
    );

    const merged = await store.merge(rows);

    console.log(`${packageId}: ${packageState(packageRecords(merged, packageId))}`);
  });

program
  .command("insert-ready")
  .description("insert every ready package - children before their parents")
  .action(async () => {
    const { env, store, collaborators } = await setup();
    const loader = new PackageLoader(env, collaborators);

    // each pass can complete children which then makes their parents ready -
    // we stop once a pass changes nothing
    let progressed = true;

    while (progressed) {
      progressed = false;

      for (const packageId of readyPackages(await store.load())) {
        const inventory = await store.load();
        const before = packageState(packageRecords(inventory, packageId));

        const merged = await store.merge(await loader.insertPackage(inventory, packageId));
        const after = packageState(packageRecords(merged, packageId));

        console.log(`${packageId}: ${after}`);

        if (after !== before) progressed = true;
      }
    }
  });

program
  .command("update-package")
  .description("publish new versions of the metadata and resource map of a package")
  .argument("<package>", "the package name")
  .action(async (packageId: string) => {
    const { env, store, collaborators } = await setup();

    const rows = await new PackageUpdater(env, collaborators).updatePackage(
      await store.load(),
      packageId,
    );

    const merged = await store.merge(rows);

    console.log(`${packageId}: ${packageState(packageRecords(merged, packageId))}`);
  });

program
  .command("resource-map")
  .description("print the resource map that would be built for a package")
  .argument("<metadataPid>", "the pid of the package metadata")
  .option("--data <pids...>", "pids of the data objects")
  .option("--child <pids...>", "resource map pids of child packages")
  .action(
    async (metadataPid: string, options: { data?: string[]; child?: string[] }) => {
      const envPath = program.opts<GlobalOptions>().env;

      // the resolve base is the only setting used here - so the environment
      // is optional
      const env: DplEnvironment | undefined = envPath
        ? await loadEnvironment(resolve(envPath))
        : undefined;

      const resolveBase = env?.resolveBase ?? DEFAULT_RESOLVE_BASE;

      const map = generateResourceMap({
        metadataPid: metadataPid,
        dataPids: options.data ?? [],
        childPids: options.child ?? [],
        resolveBase: resolveBase,
      });

      process.stdout.write(new RdfXmlSerializer().serialize(map, resolveBase));
    },
  );

program.parseAsync().catch((e: unknown) => {
  if (e instanceof DplError) console.error(JSON.stringify(e.toReport(), null, 2));
  else console.error(e);

  process.exitCode = 1;
});
