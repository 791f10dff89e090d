// Rule table / dataset shape problems. Fatal to the run: no partial validation.
export class SchemaError extends Error {
  readonly row?: number;

  constructor(message: string, row?: number) {
    super(message);
    this.name = 'SchemaError';
    this.row = row;
  }
}

// A requested fix that could not be applied at all; the column is left untouched.
export class CoercionError extends Error {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Cannot coerce '${field}': ${reason}`);
    this.name = 'CoercionError';
    this.field = field;
    this.reason = reason;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
