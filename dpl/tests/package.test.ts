import "jest-extended";
import { readFile } from "node:fs/promises";
import { repositoryFailure } from "../lib/common-types";
import { generateResourceMapPid } from "../lib/dpl-identifiers";
import { InventoryRecord } from "../lib/dpl-inventory";
import { PackageLoader, packageState } from "../lib/dpl-package";
import { parseResourceMap } from "../lib/resource-map/rdfxml-serializer";
import {
  CITO_DOCUMENTS,
  ORE_AGGREGATES,
  resolveUri,
} from "../lib/resource-map/resource-map";
import { makeRecord, makeTestSetup, TEST_RESOLVE_BASE } from "./test-helpers";

const FILES = {
  "pkg1/meta.xml": '<eml packageId="draft"><dataset/></eml>',
  "pkg1/a.csv": "x,y\n1,2\n",
  "pkg1/b.csv": "x,y\n3,4\n",
};

const EML_FORMAT = "https://eml.ecoinformatics.org/eml-2.2.0";

function inventory(): InventoryRecord[] {
  return [
    makeRecord("pkg1/meta.xml", { package: "pkg1", isMetadata: true, formatId: EML_FORMAT }),
    makeRecord("pkg1/a.csv", { package: "pkg1", formatId: "text/csv", size: 8 }),
    makeRecord("pkg1/b.csv", { package: "pkg1", formatId: "text/csv", size: 8 }),
  ];
}

test("package is inserted - metadata, data and then resource map", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  const given = inventory();
  const result = await new PackageLoader(env, collaborators).insertPackage(given, "pkg1");

  expect(result).toBeArrayOfSize(3);

  for (const r of result) {
    expect(r.pid).toStartWith("urn:uuid:");
    expect(r.created).toBeTrue();
    expect(r.resmapCreated).toBeTrue();
  }

  expect(packageState(result)).toBe("ResourceMapUploaded");

  // the rows given to us are left alone
  expect(given[0].created).toBeFalse();
  expect(given[0].pid).toBeNull();

  const metadataPid = result[0].pid ?? "";
  const resourceMapPid = generateResourceMapPid(metadataPid);

  expect(await repository.objectExists(resourceMapPid)).toEqual({ state: "data", data: true });

  const resourceMapSysmeta = await repository.getSysmeta(resourceMapPid);

  expect(resourceMapSysmeta.state).toBe("data");

  if (resourceMapSysmeta.state === "data") {
    expect(resourceMapSysmeta.data.formatId).toBe("http://www.openarchives.org/ore/terms");
    expect(resourceMapSysmeta.data.fileName).toBe(resourceMapPid.replace(/:/g, "_") + ".xml");
  }

  const statements = parseResourceMap(await readFile(repository.objectPath(resourceMapPid)));

  for (const data of result.slice(1)) {
    expect(statements).toContainEqual({
      subject: resolveUri(TEST_RESOLVE_BASE, metadataPid),
      predicate: CITO_DOCUMENTS,
      object: resolveUri(TEST_RESOLVE_BASE, data.pid ?? ""),
      subjectType: "uri",
      objectType: "uri",
    });
  }

  const metadataSysmeta = await repository.getSysmeta(metadataPid);

  expect(metadataSysmeta.state).toBe("data");

  if (metadataSysmeta.state === "data") {
    expect(metadataSysmeta.data.formatId).toBe(EML_FORMAT);
    expect(metadataSysmeta.data.fileName).toBe("meta.xml");
    expect(metadataSysmeta.data.accessPolicy).toEqual([{ subject: "public", permission: "read" }]);
    expect(metadataSysmeta.data.replicationPolicy.replicationAllowed).toBeFalse();
  }
});

test("completely inserted package makes no repository calls", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  const done = inventory().map((r, i) => ({
    ...r,
    pid: `pid-${i}`,
    created: true,
    resmapCreated: true,
  }));

  const spies = [
    jest.spyOn(repository, "isSessionExpired"),
    jest.spyOn(repository, "objectExists"),
    jest.spyOn(repository, "createObject"),
    jest.spyOn(repository, "updateObject"),
    jest.spyOn(repository, "mintIdentifier"),
  ];

  const result = await new PackageLoader(env, collaborators).insertPackage(done, "pkg1");

  expect(result).toEqual(done);

  for (const spy of spies) expect(spy).not.toHaveBeenCalled();
});

test("failed metadata upload stops before any data is uploaded", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  const create = jest
    .spyOn(repository, "createObject")
    .mockResolvedValue(repositoryFailure("transient", "connection reset"));

  const result = await new PackageLoader(env, collaborators).insertPackage(inventory(), "pkg1");

  expect(create).toHaveBeenCalledTimes(1);

  expect(result[0].pid).toStartWith("urn:uuid:");
  expect(result[0].created).toBeFalse();

  expect(result[1].pid).toBeNull();
  expect(result[2].pid).toBeNull();

  expect(result.map((r) => r.resmapCreated)).toEqual([false, false, false]);
  expect(packageState(result)).toBe("NoMetadataId");
});

test("failed data upload halts and a later call resumes", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);
  const loader = new PackageLoader(env, collaborators);

  const original = repository.createObject.bind(repository);
  let calls = 0;

  const create = jest
    .spyOn(repository, "createObject")
    .mockImplementation(async (pid, sysmeta, source) => {
      calls++;
      if (calls === 3) return repositoryFailure("transient", "connection reset");
      return original(pid, sysmeta, source);
    });

  const first = await loader.insertPackage(inventory(), "pkg1");

  expect(create).toHaveBeenCalledTimes(3);
  expect(first.map((r) => r.created)).toEqual([true, true, false]);
  expect(first.map((r) => r.resmapCreated)).toEqual([false, false, false]);
  expect(first[2].pid).toStartWith("urn:uuid:");
  expect(packageState(first)).toBe("DataUploading");

  const second = await loader.insertPackage(first, "pkg1");

  // just the remaining data file and the resource map
  expect(create).toHaveBeenCalledTimes(5);
  expect(second.map((r) => r.pid)).toEqual(first.map((r) => r.pid));
  expect(second.map((r) => r.created)).toEqual([true, true, true]);
  expect(second.map((r) => r.resmapCreated)).toEqual([true, true, true]);
});

test("data file missing from disk halts before the resource map", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);
  const create = jest.spyOn(repository, "createObject");

  const result = await new PackageLoader(env, collaborators).insertPackage(
    [
      makeRecord("pkg1/meta.xml", { package: "pkg1", isMetadata: true }),
      makeRecord("pkg1/missing.csv", { package: "pkg1" }),
    ],
    "pkg1",
  );

  expect(create).toHaveBeenCalledTimes(1);
  expect(result.map((r) => r.created)).toEqual([true, false]);
  expect(result.map((r) => r.resmapCreated)).toEqual([false, false]);
});

test("failed resource map upload leaves resmapCreated false", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  const original = repository.createObject.bind(repository);

  jest.spyOn(repository, "createObject").mockImplementation(async (pid, sysmeta, source) => {
    if (pid.startsWith("resource_map_")) return repositoryFailure("conflict", "already exists");
    return original(pid, sysmeta, source);
  });

  const result = await new PackageLoader(env, collaborators).insertPackage(inventory(), "pkg1");

  expect(result.map((r) => r.created)).toEqual([true, true, true]);
  expect(result.map((r) => r.resmapCreated)).toEqual([false, false, false]);
  expect(packageState(result)).toBe("DataComplete");
});

test("expired session returns the rows unchanged", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  jest.spyOn(repository, "isSessionExpired").mockResolvedValue(true);
  const create = jest.spyOn(repository, "createObject");

  const result = await new PackageLoader(env, collaborators).insertPackage(inventory(), "pkg1");

  expect(result).toEqual(inventory());
  expect(create).not.toHaveBeenCalled();
});

test("incomplete child package is rejected before any repository call", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);
  const create = jest.spyOn(repository, "createObject");
  const mint = jest.spyOn(repository, "mintIdentifier");

  const rows = [
    ...inventory(),
    makeRecord("child/meta.xml", { package: "child", parentPackage: "pkg1", isMetadata: true }),
  ];

  await expect(
    new PackageLoader(env, collaborators).insertPackage(rows, "pkg1"),
  ).rejects.toThrow("Not all child packages have been created");

  expect(create).not.toHaveBeenCalled();
  expect(mint).not.toHaveBeenCalled();
});

test("complete child package is aggregated by the parent resource map", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);

  const rows = [
    ...inventory(),
    makeRecord("child/meta.xml", {
      package: "child",
      parentPackage: "pkg1",
      isMetadata: true,
      pid: "child-meta",
      created: true,
      resmapCreated: true,
    }),
  ];

  const result = await new PackageLoader(env, collaborators).insertPackage(rows, "pkg1");

  // only the rows of the package itself come back
  expect(result).toBeArrayOfSize(3);

  const resourceMapPid = generateResourceMapPid(result[0].pid ?? "");
  const statements = parseResourceMap(await readFile(repository.objectPath(resourceMapPid)));

  expect(statements).toContainEqual({
    subject: resolveUri(TEST_RESOLVE_BASE, resourceMapPid) + "#aggregation",
    predicate: ORE_AGGREGATES,
    object: resolveUri(TEST_RESOLVE_BASE, "resource_map_child-meta"),
    subjectType: "uri",
    objectType: "uri",
  });
});

test("package preconditions are checked", async () => {
  const { env, collaborators } = await makeTestSetup(FILES);
  const loader = new PackageLoader(env, collaborators);

  await expect(loader.insertPackage(inventory(), "")).rejects.toThrow("Package not specified");
  await expect(loader.insertPackage(inventory(), "pkg2")).rejects.toThrow("Package not found");
  await expect(loader.insertPackage([], "pkg1")).rejects.toThrow("Inventory invalid");

  const twoMetadata = inventory().map((r) => ({ ...r, isMetadata: true }));

  await expect(loader.insertPackage(twoMetadata, "pkg1")).rejects.toThrow(
    "Package metadata ambiguous",
  );
});

test("single file is inserted once", async () => {
  const { env, repository, collaborators } = await makeTestSetup(FILES);
  const loader = new PackageLoader(env, collaborators);
  const create = jest.spyOn(repository, "createObject");

  const [inserted] = await loader.insertFile(inventory(), "pkg1/a.csv");

  expect(inserted.file).toBe("pkg1/a.csv");
  expect(inserted.pid).toStartWith("urn:uuid:");
  expect(inserted.created).toBeTrue();
  expect(create).toHaveBeenCalledTimes(1);

  const again = await loader.insertFile([inserted], "pkg1/a.csv");

  expect(again).toEqual([inserted]);
  expect(create).toHaveBeenCalledTimes(1);

  await expect(loader.insertFile(inventory(), "pkg1/c.csv")).rejects.toThrow("File not found");
});
