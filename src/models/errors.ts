export class AnalysisError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A relation record or member broke a construction invariant */
export class RelationValidationError extends AnalysisError {}

/** Two matrices that must share a member universe do not */
export class MatrixConsistencyError extends AnalysisError {}

export class SnapshotHeaderError extends AnalysisError {
  constructor(
    readonly snapshot: string,
    readonly missingHeaders: string[]
  ) {
    super(`Required headers not found in ${snapshot} snapshot: ${missingHeaders.join(', ')}`);
  }
}

export class SheetParseError extends AnalysisError {
  constructor(
    readonly source: string,
    message: string
  ) {
    super(`${source}: ${message}`);
  }
}

/** Request-level problems detected before any processing starts */
export class InputValidationError extends AnalysisError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
