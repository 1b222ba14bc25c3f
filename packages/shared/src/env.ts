import { z } from "zod";

/**
 * Retrieves an optional environment variable. Empty strings count as unset.
 */
export function getOptionalEnv(key: string): string | undefined;
export function getOptionalEnv(key: string, defaultValue: string): string;
export function getOptionalEnv(
  key: string,
  defaultValue?: string,
): string | undefined {
  const value = process.env[key];
  if (value === undefined || value === "") {
    return defaultValue;
  }
  return value;
}

/**
 * Parses an environment variable as an integer using Zod.
 * Throws if set but not a whole number; returns `defaultValue` when unset.
 */
export function parseEnvInt(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const result = z.coerce.number().int().safeParse(raw);
  if (!result.success) {
    throw new Error(
      `Invalid integer value for ${key}: "${raw}". Expected a whole number.`,
    );
  }
  return result.data;
}

/**
 * Parses an environment variable as an absolute http(s) URL.
 * Throws if set but malformed; returns `defaultValue` when unset.
 */
export function parseEnvUrl(key: string, defaultValue: string): string {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const result = z
    .string()
    .url()
    .refine((value) => /^https?:\/\//.test(value))
    .safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid URL for ${key}: "${raw}". Expected http(s)://…`);
  }
  return result.data;
}
