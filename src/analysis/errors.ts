/**
 * Fatal analysis errors
 *
 * - SchemaError: required column(s) absent from the input entirely
 * - ConfigError: invalid analysis configuration, raised before processing
 *
 * Unparseable rows are not errors; see RowParseWarning in types/telemetry.
 */

export class SchemaError extends Error {
  readonly missingFields: string[];

  constructor(missingFields: string[]) {
    super(`Missing required columns: ${missingFields.join(', ')}`);
    this.name = 'SchemaError';
    this.missingFields = missingFields;
  }
}

export class ConfigError extends Error {
  readonly field: string;
  readonly reason: string;

  constructor(field: string, reason: string) {
    super(`Invalid ${field}: ${reason}`);
    this.name = 'ConfigError';
    this.field = field;
    this.reason = reason;
  }
}
