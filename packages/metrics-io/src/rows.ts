import type { SqlValue } from "sql.js";
import type { z } from "zod";
import { InvalidFormatError } from "./errors";
import { flattenIssues } from "./events";

function corrupt(column: string, expected: string): InvalidFormatError {
  return new InvalidFormatError(`Archive column ${column} is not ${expected}`, {
    [column]: [`expected ${expected}`],
  });
}

export function text(value: SqlValue | undefined, column: string): string {
  if (typeof value !== "string") throw corrupt(column, "text");
  return value;
}

export function nullableText(value: SqlValue | undefined, column: string): string | null {
  if (value === null || value === undefined) return null;
  return text(value, column);
}

export function integer(value: SqlValue | undefined, column: string): number {
  if (typeof value !== "number" || !Number.isInteger(value)) throw corrupt(column, "an integer");
  return value;
}

export function nullableInteger(value: SqlValue | undefined, column: string): number | null {
  if (value === null || value === undefined) return null;
  return integer(value, column);
}

/** Parses a JSON text column and validates it against `schema`. */
export function jsonColumn<T>(
  value: SqlValue | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  column: string
): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text(value, column));
  } catch (e) {
    if (e instanceof InvalidFormatError) throw e;
    throw corrupt(column, "valid JSON");
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new InvalidFormatError(`Archive column ${column} has unexpected shape`, flattenIssues(result.error));
  }
  return result.data;
}

export function nullableJsonColumn<T>(
  value: SqlValue | undefined,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  column: string
): T | null {
  if (value === null || value === undefined) return null;
  return jsonColumn(value, schema, column);
}
