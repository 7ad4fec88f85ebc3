export interface ParameterIssue {
  path: string;
  message: string;
}

/** Thrown before generation when the parameter object cannot be used. */
export class MapParameterError extends Error {
  readonly issues: ParameterIssue[];

  constructor(message: string, issues: ParameterIssue[] = []) {
    super(message);
    this.name = "MapParameterError";
    this.issues = issues;
  }
}
