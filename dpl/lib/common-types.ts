export type ErrorReport = {
  state: "error";
  error: string;
  specific: ErrorSpecific[];
};

export type ErrorSpecific = {
  message: string;
  package?: string;
  file?: string;
};

/**
 * The ways a call to the repository can fail. Anything that is not
 * clearly one of the first three is reported as "transient" - i.e. worth
 * trying again on a later run.
 */
export type FailureKind = "not-found" | "conflict" | "auth-expired" | "transient";

export type RepositoryFailure = {
  state: "error";
  kind: FailureKind;
  error: string;
};

export type RepositoryResult<T> =
  | {
      state: "data";
      data: T;
    }
  | RepositoryFailure;

export function repositoryData<T>(data: T): RepositoryResult<T> {
  return { state: "data", data: data };
}

export function repositoryFailure(
  kind: FailureKind,
  error: string,
): RepositoryFailure {
  return { state: "error", kind: kind, error: error };
}
