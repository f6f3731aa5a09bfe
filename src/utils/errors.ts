export class ScriptoriumError extends Error {
  constructor(message: string, public code?: string) {
    super(message);
    this.name = 'ScriptoriumError';
  }
}

export class ConfigurationError extends ScriptoriumError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigurationError';
  }
}

export class DatabaseError extends ScriptoriumError {
  /** SQLite result code of the underlying failure, e.g. SQLITE_CONSTRAINT_UNIQUE */
  public sqliteCode: string | undefined;

  constructor(message: string, cause?: unknown) {
    super(message, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
    this.sqliteCode = getSqliteCode(cause);
  }
}

export class ApiError extends ScriptoriumError {
  constructor(message: string, public provider?: string) {
    super(message, 'API_ERROR');
    this.name = 'ApiError';
  }
}

export class ValidationError extends ScriptoriumError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class FileError extends ScriptoriumError {
  constructor(message: string) {
    super(message, 'FILE_ERROR');
    this.name = 'FileError';
  }
}

function getSqliteCode(error: unknown): string | undefined {
  if (error instanceof DatabaseError) {
    return error.sqliteCode;
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * True when a failure came from a UNIQUE or PRIMARY KEY constraint
 */
export function isUniqueViolation(error: unknown): boolean {
  const code = getSqliteCode(error);
  return code === 'SQLITE_CONSTRAINT_UNIQUE' || code === 'SQLITE_CONSTRAINT_PRIMARYKEY';
}
