/**
 * JSONPath lookups over decoded response bodies using jsonpath-plus
 */

import { JSONPath } from "jsonpath-plus";

export interface JsonPathResult {
  success: boolean;
  values: unknown[];
  error?: string;
}

/**
 * Execute a JSONPath query.
 * Accepts both bare dot notation ("cluster_name") and full syntax ("$[0].node").
 */
export function queryJsonPath(data: unknown, path: string): JsonPathResult {
  // Scalars and null have no children to select
  if (typeof data !== "object" || data === null) {
    return { success: true, values: [] };
  }

  try {
    const normalizedPath = path.startsWith("$") ? path : `$.${path}`;

    const results: unknown[] = JSONPath({
      path: normalizedPath,
      json: data,
      wrap: true,
    });

    return {
      success: true,
      values: results,
    };
  } catch (error) {
    return {
      success: false,
      values: [],
      error: error instanceof Error ? error.message : "JSONPath evaluation failed",
    };
  }
}

/**
 * First match of a path rendered as a string.
 * Missing, null and failed lookups give "".
 */
export function jsonString(data: unknown, path: string): string {
  const result = queryJsonPath(data, path);
  const value = result.values[0];

  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}
