/**
 * Fatal errors for the auto-close run. Per-mentor problems are not errors;
 * they are returned as issues and the run continues.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ResponseSourceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ResponseSourceError";
  }
}

export class RosterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RosterError";
  }
}
