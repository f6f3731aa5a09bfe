import { InvalidArgumentError } from 'commander';
import {
  ApiError,
  ConfigurationError,
  DatabaseError,
  FileError,
  ValidationError,
} from '../../utils/errors.js';

export const MAX_QUERY_LENGTH = 1000;

export function validateApiKey(apiKey: string, provider: string): void {
  if (apiKey.trim().length === 0) {
    throw new ValidationError(`${provider} API key cannot be empty`);
  }
  if (apiKey.trim().length < 8) {
    throw new ValidationError(`${provider} API key appears to be too short`);
  }
}

export function validatePathArgument(target: string): void {
  if (target.trim().length === 0) {
    throw new ValidationError('Path cannot be empty');
  }

  if (target.startsWith('/proc/') || target.startsWith('/sys/')) {
    throw new ValidationError('Cannot read system directories');
  }
}

export function validateQueryString(query: string): void {
  if (query.trim().length === 0) {
    throw new ValidationError('Query cannot be empty');
  }

  if (query.trim().length > MAX_QUERY_LENGTH) {
    throw new ValidationError(`Query is too long (max: ${MAX_QUERY_LENGTH} characters)`);
  }
}

/**
 * Parse a commander option as a positive integer no larger than `max`
 */
export function parsePositiveInt(value: string, max: number = 100): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  if (parsed > max) {
    throw new InvalidArgumentError(`Value is too large (max: ${max}).`);
  }
  return parsed;
}

export function formatCliError(error: unknown): string {
  if (error instanceof ValidationError) {
    return `❌ Validation Error: ${error.message}`;
  }
  if (error instanceof ConfigurationError) {
    return `❌ Configuration Error: ${error.message}`;
  }
  if (error instanceof DatabaseError) {
    return `❌ Database Error: ${error.message}`;
  }
  if (error instanceof ApiError) {
    return `❌ ${error.provider ?? 'Provider'} Error: ${error.message}`;
  }
  if (error instanceof FileError) {
    return `❌ File Error: ${error.message}`;
  }
  if (error instanceof Error) {
    return `❌ Error: ${error.message}`;
  }
  return `❌ Unknown error: ${String(error)}`;
}
