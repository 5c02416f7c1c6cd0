import "jest-extended";
import { ReadStream } from "node:fs";
import { buildSysmeta, StandardAccessPolicy } from "../lib/dpl-descriptor";
import { encodeIdentifier } from "../lib/dpl-repository";
import { S3Repository } from "../lib/s3/s3-repository";
import { failOnce, s3Error, S3StandIn } from "./s3-stand-in";
import { makeTestSetup } from "./test-helpers";

const sysmetaFor = (pid: string) =>
  buildSysmeta(
    {
      identifier: pid,
      formatId: "text/plain",
      size: 5,
      checksum: "00",
      submitter: "CN=test-submitter",
      rightsHolder: "CN=test-rights-holder",
      fileName: "a.txt",
    },
    new StandardAccessPolicy(),
  );

const hello = () => ({ kind: "bytes" as const, bytes: Buffer.from("hello", "utf8") });

function s3Setup() {
  const standIn = new S3StandIn();

  return {
    standIn: standIn,
    repository: new S3Repository("s3://test-bucket/packages", standIn.client),
  };
}

test("s3 repository stores the object and then its system metadata", async () => {
  const { standIn, repository } = s3Setup();

  expect(await repository.objectExists("pid-1")).toEqual({ state: "data", data: false });
  expect(await repository.createObject("pid-1", sysmetaFor("pid-1"), hello())).toEqual({
    state: "data",
    data: "pid-1",
  });
  expect(await repository.objectExists("pid-1")).toEqual({ state: "data", data: true });

  expect(standIn.objects.get("packages/objects/pid-1")).toBe("hello");
  expect(await repository.getSysmeta("pid-1")).toEqual({
    state: "data",
    data: sysmetaFor("pid-1"),
  });

  const second = await repository.createObject("pid-1", sysmetaFor("pid-1"), hello());

  expect(second.state === "error" && second.kind).toBe("conflict");
});

test("s3 repository removes the object when its system metadata cannot be written", async () => {
  const { standIn, repository } = s3Setup();

  standIn.failure = failOnce(
    "PutObjectCommand",
    "packages/sysmeta/pid-1.json",
    s3Error("InternalError", 500),
  );

  const first = await repository.createObject("pid-1", sysmetaFor("pid-1"), hello());

  expect(first.state === "error" && first.kind).toBe("transient");
  expect(standIn.objects.has("packages/objects/pid-1")).toBeFalse();
  expect(await repository.objectExists("pid-1")).toEqual({ state: "data", data: false });

  // a retry is not refused by the earlier attempt
  expect(await repository.createObject("pid-1", sysmetaFor("pid-1"), hello())).toEqual({
    state: "data",
    data: "pid-1",
  });
});

test("s3 repository closes file bodies that were never sent", async () => {
  const { env } = await makeTestSetup({ "a.txt": "hello" });
  const { standIn, repository } = s3Setup();
  const destroy = jest.spyOn(ReadStream.prototype, "destroy");

  const source = { kind: "file" as const, path: `${env.basePath}/a.txt`, size: 5 };

  standIn.failure = failOnce(
    "PutObjectCommand",
    "packages/objects/pid-1",
    s3Error("SlowDown", 503),
  );

  const failed = await repository.createObject("pid-1", sysmetaFor("pid-1"), source);

  expect(failed.state === "error" && failed.kind).toBe("transient");
  expect(destroy).toHaveBeenCalled();

  destroy.mockRestore();

  expect(await repository.createObject("pid-1", sysmetaFor("pid-1"), source)).toEqual({
    state: "data",
    data: "pid-1",
  });
  expect(standIn.objects.get("packages/objects/pid-1")).toBe("hello");
});

test("s3 repository updates form a single version chain", async () => {
  const { repository } = s3Setup();

  const missing = await repository.updateObject("v1", "v2", sysmetaFor("v2"), hello());

  expect(missing.state === "error" && missing.kind).toBe("not-found");

  await repository.createObject("v1", sysmetaFor("v1"), hello());

  expect(await repository.updateObject("v1", "v2", sysmetaFor("v2"), hello())).toEqual({
    state: "data",
    data: "v2",
  });

  const v1 = await repository.getSysmeta("v1");
  const v2 = await repository.getSysmeta("v2");

  expect(v1.state === "data" && v1.data.obsoletedBy).toBe("v2");
  expect(v2.state === "data" && v2.data.obsoletes).toBe("v1");

  const again = await repository.updateObject("v1", "v3", sysmetaFor("v3"), hello());

  expect(again.state === "error" && again.kind).toBe("conflict");
  expect(await repository.objectExists("v3")).toEqual({ state: "data", data: false });
});

test("s3 repository completes an update whose old object was never marked", async () => {
  const { standIn, repository } = s3Setup();

  await repository.createObject("v1", sysmetaFor("v1"), hello());

  standIn.failure = failOnce(
    "PutObjectCommand",
    "packages/sysmeta/v1.json",
    s3Error("InternalError", 500),
  );

  const interrupted = await repository.updateObject("v1", "v2", sysmetaFor("v2"), hello());

  expect(interrupted.state === "error" && interrupted.kind).toBe("transient");
  expect(await repository.objectExists("v2")).toEqual({ state: "data", data: true });

  const unmarked = await repository.getSysmeta("v1");

  expect(unmarked.state === "data" && unmarked.data.obsoletedBy).toBeUndefined();

  expect(await repository.completeUpdate("v1", "v2")).toEqual({ state: "data", data: true });

  const marked = await repository.getSysmeta("v1");

  expect(marked.state === "data" && marked.data.obsoletedBy).toBe("v2");

  // nothing left to do
  expect(await repository.completeUpdate("v1", "v2")).toEqual({ state: "data", data: false });
});

test("s3 repository mints identifiers by reserving them", async () => {
  const { standIn, repository } = s3Setup();

  const minted = await repository.mintIdentifier("ARK");

  expect(minted.state).toBe("data");

  if (minted.state === "data") {
    expect(minted.data).toStartWith("ARK:");
    expect(standIn.objects.has(`packages/reserved/${encodeIdentifier(minted.data)}`)).toBeTrue();

    // reserved is not stored
    expect(await repository.objectExists(minted.data)).toEqual({ state: "data", data: false });
  }
});

test.each([
  ["ExpiredToken", 400, "auth-expired"],
  ["InvalidToken", 400, "auth-expired"],
  ["NoSuchBucket", 404, "not-found"],
  ["OperationAborted", 409, "conflict"],
  ["PreconditionFailed", 412, "conflict"],
  ["SlowDown", 503, "transient"],
])("s3 error %s (%d) is reported as %s", async (name, status, kind) => {
  const { standIn, repository } = s3Setup();

  standIn.failure = () => s3Error(name, status);

  const minted = await repository.mintIdentifier("ARK");

  expect(minted.state === "error" && minted.kind).toBe(kind);
});

test("s3 errors other than not found are reported by existence checks", async () => {
  const { standIn, repository } = s3Setup();

  standIn.failure = () => s3Error("ExpiredToken", 400);

  const exists = await repository.objectExists("pid-1");

  expect(exists.state === "error" && exists.kind).toBe("auth-expired");

  standIn.failure = () => new Error("socket hang up");

  expect(await repository.objectExists("pid-1")).toEqual({
    state: "error",
    kind: "transient",
    error: "socket hang up",
  });
});
