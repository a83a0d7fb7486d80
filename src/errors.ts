export class MigrationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends MigrationError {}

export class InvalidMigrationModeError extends MigrationError {
  constructor(readonly mode: string, readonly allowed: readonly string[]) {
    super(`Unknown migration mode "${mode}". Expected one of: ${allowed.join(', ')}`);
  }
}

export class NotFoundError extends MigrationError {
  constructor(readonly resource: string, readonly id: string, readonly instance: string) {
    super(`${resource} ${id} was not found in the ${instance} instance`);
  }
}

/**
 * More than one destination entity carries the name used for de-duplication.
 * Requires manual cleanup of the destination before the migration can continue.
 */
export class AmbiguousNameError extends MigrationError {
  constructor(readonly resource: string, readonly entityName: string, readonly count: number) {
    super(`Found ${count} ${resource}s with name "${entityName}" in the destination instance`);
  }
}

export interface RejectionDetails {
  status: number;
  method: string;
  path: string;
  detail: string;
}

export class RemoteRejectionError extends MigrationError {
  readonly status: number;
  readonly method: string;
  readonly path: string;
  readonly detail: string;

  constructor(action: string, details: RejectionDetails, options?: ErrorOptions) {
    super(`Failed to ${action}: ${details.status} ${details.detail}`, options);
    this.status = details.status;
    this.method = details.method;
    this.path = details.path;
    this.detail = details.detail;
  }
}

export class BulkCreateMismatchError extends MigrationError {
  constructor(readonly resource: string, readonly requested: number, readonly received: number) {
    super(`Bulk create of ${resource}s returned ${received} records for ${requested} submitted; IDs cannot be mapped`);
  }
}
