import "jest-extended";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DplError } from "../lib/dpl-errors";
import { loadEnvironment, parseEnvironment } from "../lib/dpl-environment";

const REQUIRED = `
base_path: /data/originals
alternate_path: /data/modified
metadata_identifier_scheme: DOI
data_identifier_scheme: UUID
repository: s3://test-bucket/packages
submitter: CN=test-submitter
rights_holder: CN=test-rights-holder
`;

async function writeEnvironment(content: string): Promise<string> {
  const path = join(await mkdtemp(join(tmpdir(), "dpl-env-")), "environment.yml");
  await writeFile(path, content, { encoding: "utf8" });
  return path;
}

test("environment is loaded with defaults for the optional settings", async () => {
  const env = await loadEnvironment(await writeEnvironment(REQUIRED));

  expect(env).toEqual({
    basePath: "/data/originals",
    alternatePath: "/data/modified",
    metadataIdentifierScheme: "DOI",
    dataIdentifierScheme: "UUID",
    repository: "s3://test-bucket/packages",
    submitter: "CN=test-submitter",
    rightsHolder: "CN=test-rights-holder",
    resolveBase: "https://cn.dataone.org/cn/v2/resolve",
    clearReplicationPolicy: true,
    accessRules: [{ subject: "public", permission: "read" }],
  });
});

test("optional settings can be given", async () => {
  const env = await loadEnvironment(
    await writeEnvironment(
      REQUIRED +
        `
resolve_base: https://example.org/resolve
clear_replication_policy: false
access_rules:
  - subject: CN=curators
    permission: write
`,
    ),
  );

  expect(env.resolveBase).toBe("https://example.org/resolve");
  expect(env.clearReplicationPolicy).toBeFalse();
  expect(env.accessRules).toEqual([{ subject: "CN=curators", permission: "write" }]);
});

test("every missing required setting is reported", () => {
  let error: unknown;

  try {
    parseEnvironment({ base_path: "/data/originals", alternate_path: "/data/modified" });
  } catch (e) {
    error = e;
  }

  expect(error).toBeInstanceOf(DplError);

  if (error instanceof DplError) {
    expect(error.message).toBe("Environment invalid");
    expect(error.specifics.map((s) => s.message)).toEqual([
      "metadata_identifier_scheme Required",
      "data_identifier_scheme Required",
      "repository Required",
      "submitter Required",
      "rights_holder Required",
    ]);
  }
});

test("unreadable environment is reported", async () => {
  await expect(loadEnvironment(join(tmpdir(), "dpl-no-such-environment.yml"))).rejects.toThrow(
    "Environment could not be loaded",
  );
  await expect(loadEnvironment(await writeEnvironment("base_path: [unclosed"))).rejects.toThrow(
    "Environment could not be loaded",
  );
});
