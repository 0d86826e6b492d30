/**
 * Error taxonomy.
 *
 * InputError and ConfigError are fatal and surface to the caller.
 * EvaluationError (and its subclasses) is raised per rule and captured
 * as a RuleViolation by the rule runner; it never aborts a batch.
 */

export class DriftgateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing header, no usable numeric column, unreadable target. */
export class InputError extends DriftgateError {}

/** Malformed weights, modes or flag values. */
export class ConfigError extends DriftgateError {}

export class EvaluationError extends DriftgateError {}

export class RuleSyntaxError extends EvaluationError {
  readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.position = position;
  }
}

/** The expression uses a construct outside the rule grammar. */
export class DisallowedConstructError extends RuleSyntaxError {
  readonly construct: string;

  constructor(construct: string, position: number) {
    super(`disallowed construct: ${construct} (at ${position})`, position);
    this.construct = construct;
  }
}

export class UnknownVariableError extends EvaluationError {
  readonly variable: string;

  constructor(variable: string) {
    super(`unknown variable: ${variable}`);
    this.variable = variable;
  }
}

export class RuleRuntimeError extends EvaluationError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
