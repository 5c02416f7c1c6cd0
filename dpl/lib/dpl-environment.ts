import { readFile } from "node:fs/promises";
import * as yaml from "js-yaml";
import { z } from "zod";
import { AccessRuleSchema, DEFAULT_ACCESS_RULES } from "./dpl-descriptor";
import { DplError } from "./dpl-errors";
import { DEFAULT_RESOLVE_BASE } from "./resource-map/resource-map";

// the environment file uses the snake_case keys that have always been used
// for these settings - we convert to our own names once validated
const EnvironmentFileSchema = z.object({
  base_path: z.string().min(1),
  alternate_path: z.string().min(1),
  metadata_identifier_scheme: z.string().min(1),
  data_identifier_scheme: z.string().min(1),
  repository: z.string().min(1),
  submitter: z.string().min(1),
  rights_holder: z.string().min(1),
  resolve_base: z.string().url().default(DEFAULT_RESOLVE_BASE),
  clear_replication_policy: z.boolean().default(true),
  access_rules: z.array(AccessRuleSchema).default(DEFAULT_ACCESS_RULES),
});

export type DplEnvironment = {
  // the folder that inventory file paths are relative to
  basePath: string;

  // the folder holding modified metadata documents (for updates)
  alternatePath: string;

  metadataIdentifierScheme: string;
  dataIdentifierScheme: string;

  // "s3://bucket/key" or a folder
  repository: string;

  submitter: string;
  rightsHolder: string;
  resolveBase: string;
  clearReplicationPolicy: boolean;
  accessRules: z.infer<typeof AccessRuleSchema>[];
};

/**
 * Validate (already parsed) environment settings.
 */
export function parseEnvironment(content: unknown): DplEnvironment {
  const parsed = EnvironmentFileSchema.safeParse(content);

  if (!parsed.success)
    throw new DplError(
      "Environment invalid",
      parsed.error.issues.map((issue) => ({
        message: `${issue.path.join(".") || "environment"} ${issue.message}`,
      })),
    );

  const e = parsed.data;

  return {
    basePath: e.base_path,
    alternatePath: e.alternate_path,
    metadataIdentifierScheme: e.metadata_identifier_scheme,
    dataIdentifierScheme: e.data_identifier_scheme,
    repository: e.repository,
    submitter: e.submitter,
    rightsHolder: e.rights_holder,
    resolveBase: e.resolve_base,
    clearReplicationPolicy: e.clear_replication_policy,
    accessRules: e.access_rules,
  };
}

/**
 * Load the environment settings from a YAML file (by convention
 * etc/environment.yml).
 */
export async function loadEnvironment(path: string): Promise<DplEnvironment> {
  let content: unknown;

  try {
    content = yaml.load(await readFile(path, { encoding: "utf8" }));
  } catch (e) {
    throw new DplError("Environment could not be loaded", [
      { message: e instanceof Error ? e.message : String(e), file: path },
    ]);
  }

  return parseEnvironment(content);
}
