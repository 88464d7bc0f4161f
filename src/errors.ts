export interface ValidationIssue {
  field: string;
  message: string;
}

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(issues.map((i) => `${i.field}: ${i.message}`).join("; "));
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotFoundError extends Error {
  readonly id: number;

  constructor(id: number) {
    super(`Task with id ${id} not found`);
    this.name = "NotFoundError";
    this.id = id;
  }
}
