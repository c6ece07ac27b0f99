/**
 * shellgen error types
 *
 * Every error is raised while a script is being constructed, never while
 * it is rendered or run.
 */

export type ErrorCode =
  | "INVALID_VARIABLE"
  | "INVALID_NAME"
  | "INVALID_NUMBER"
  | "INVALID_OPTIONS"
  | "INVALID_FD";

export interface ErrorDetails {
  variable?: string;
  name?: string;
  value?: string;
  issues?: string[];
}

export class ShellGenError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    public readonly suggestion?: string,
  ) {
    super(message);
    this.name = "ShellGenError";
  }

  toJSON() {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
    };
  }
}

// Factory functions

export function derivedVariable(variable: string, operation: string): ShellGenError {
  return new ShellGenError(
    "INVALID_VARIABLE",
    `Cannot ${operation} a derived variable (based on '${variable}')`,
    { variable },
    "Apply the operation to the base variable, or copy the derived value into a new variable with setVar first",
  );
}

export function specialVariable(variable: string, operation: string): ShellGenError {
  return new ShellGenError(
    "INVALID_VARIABLE",
    `Cannot ${operation} the special parameter '$${variable}'`,
    { variable },
    "Copy the value into a variable with newVar and setVar first",
  );
}

export function invalidName(name: string): ShellGenError {
  return new ShellGenError(
    "INVALID_NAME",
    `'${name}' is not a valid shell variable name`,
    { name },
    "Names must start with a letter or '_' and contain only letters, digits and '_'",
  );
}

export function invalidNumber(value: number): ShellGenError {
  return new ShellGenError(
    "INVALID_NUMBER",
    `Arithmetic literal ${value} is not a safe integer`,
    { value: String(value) },
    "Shell arithmetic only handles integers; use a bigint for large values",
  );
}

export function invalidFd(fd: number): ShellGenError {
  return new ShellGenError(
    "INVALID_FD",
    `File descriptor ${fd} is not a non-negative integer`,
    { value: String(fd) },
  );
}

export function invalidOptions(issues: string[]): ShellGenError {
  return new ShellGenError(
    "INVALID_OPTIONS",
    `Invalid script options: ${issues.join("; ")}`,
    { issues },
  );
}
