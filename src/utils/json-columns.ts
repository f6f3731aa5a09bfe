import { z } from 'zod';

const StringArraySchema = z.array(z.string());

/**
 * Decode a JSON string-array column; anything else reads as empty
 */
export function parseStringArray(value: string | null): string[] {
  if (!value) return [];

  let data: unknown;
  try {
    data = JSON.parse(value);
  } catch {
    return [];
  }

  const result = StringArraySchema.safeParse(data);
  return result.success ? result.data : [];
}

/**
 * Append values not already present, stopping at `limit`
 */
export function appendDistinct(target: string[], values: Iterable<string>, limit: number): void {
  for (const value of values) {
    if (target.length >= limit) return;
    if (!target.includes(value)) {
      target.push(value);
    }
  }
}
