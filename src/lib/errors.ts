// src/lib/errors.ts

export class ConfigError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

export class StoreError extends Error {
  constructor(message: string, public readonly status?: number) {
    super(message);
    this.name = 'StoreError';
  }
}

/** Drop, create or policy step failed; the table must not be written to. */
export class PublishSchemaError extends Error {
  constructor(public readonly tableName: string, cause: unknown) {
    super(`Failed to prepare table '${tableName}': ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PublishSchemaError';
  }
}
