import { ErrorReport, ErrorSpecific } from "./common-types";

/**
 * Thrown for precondition violations (a malformed inventory, an ambiguous
 * metadata count, child packages not yet created, bad configuration). These
 * abort the call before anything in the inventory is changed.
 */
export class DplError extends Error {
  constructor(
    message: string,
    public specifics: ErrorSpecific[],
  ) {
    super(message);
    this.name = "DplError";
  }

  public toReport(): ErrorReport {
    return {
      state: "error",
      error: this.message,
      specific: this.specifics,
    };
  }
}
