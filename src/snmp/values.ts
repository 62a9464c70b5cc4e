/**
 * Numeric access to SNMP poll results.
 *
 * Pollers store values as whatever type the transport produced, so a
 * counter can arrive as a number or as its decimal text.
 */

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const DECIMAL_INTEGER = /^[+-]?[0-9]+$/;

export interface Float64Lookup {
  value: number;
  found: boolean;
}

export type Float64Value =
  | { status: "missing" }
  | { status: "ok"; value: number }
  | { status: "invalid"; raw: unknown };

/**
 * Parse a base-10 signed 64-bit integer, returning undefined when the text
 * is not one or is out of range
 */
export function parseInt64(text: string): number | undefined {
  if (!DECIMAL_INTEGER.test(text)) return undefined;

  const parsed = BigInt(text);
  if (parsed < INT64_MIN || parsed > INT64_MAX) return undefined;

  return Number(parsed);
}

export class SnmpValues {
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(values: ReadonlyMap<string, unknown>) {
    this.values = values;
  }

  static fromRecord(record: Readonly<Record<string, unknown>>): SnmpValues {
    return new SnmpValues(new Map(Object.entries(record)));
  }

  /**
   * Look up an OID and report exactly why no number came back
   */
  lookupFloat64(oid: string): Float64Value {
    if (!this.values.has(oid)) {
      return { status: "missing" };
    }

    const raw = this.values.get(oid);

    if (typeof raw === "number") {
      return { status: "ok", value: raw };
    }

    if (typeof raw === "string") {
      const value = parseInt64(raw);
      return value === undefined ? { status: "invalid", raw } : { status: "ok", value };
    }

    return { status: "invalid", raw };
  }

  /**
   * Value for an OID as a float, and whether the OID was present.
   *
   * A present but unusable value (non-numeric text, other types) yields
   * `{ value: 0, found: true }`, the same as a real zero. Use
   * {@link lookupFloat64} to tell them apart.
   */
  getFloat64(oid: string): Float64Lookup {
    const result = this.lookupFloat64(oid);

    switch (result.status) {
      case "missing":
        return { value: 0, found: false };
      case "ok":
        return { value: result.value, found: true };
      case "invalid":
        return { value: 0, found: true };
    }
  }
}
