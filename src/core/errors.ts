/**
 * Engine error types
 *
 * - ConfigurationError: a parameter is outside its valid domain (fatal, raised at load time)
 * - StateInvariantError: an operation was invoked in a state that does not allow it
 *
 * "Indicator not warmed up" is not an error: callers get undefined and skip the bar.
 */

export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class StateInvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateInvariantError";
  }
}
