import type { ConfigPrimitive, ConfigValue } from "../types.js";
import { isConfigObject } from "../types.js";

export interface Normalization {
  stringify?: boolean;
  unitAware?: readonly string[];
}

const DECIMAL_UNITS: Record<string, number> = {
  B: 1,
  KB: 1e3,
  MB: 1e6,
  GB: 1e9,
  TB: 1e12,
  PB: 1e15,
  EB: 1e18
};

const BINARY_UNITS: Record<string, number> = {
  KIB: 1024,
  MIB: 1024 ** 2,
  GIB: 1024 ** 3,
  TIB: 1024 ** 4,
  PIB: 1024 ** 5,
  EIB: 1024 ** 6
};

const SIZE_PATTERN = /^\s*(\d+(?:\.\d+)?)\s*([a-zA-Z]*)\s*$/;

/**
 * Parse a byte size such as `10GiB`, `512MB` or `1024` into bytes.
 * Returns null for anything that is not a size.
 */
export function parseByteSize(value: string | number): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  const match = SIZE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const amount = Number(match[1]);
  const unit = (match[2] ?? "").toUpperCase();
  if (unit.length === 0) {
    return amount;
  }
  const multiplier = BINARY_UNITS[unit] ?? DECIMAL_UNITS[unit];
  if (multiplier === undefined) {
    return null;
  }
  return amount * multiplier;
}

export function normalizeScalar(
  value: ConfigPrimitive,
  normalization: Normalization,
  key?: string
): ConfigPrimitive {
  if (value === null) {
    return null;
  }
  if (
    key !== undefined &&
    typeof value !== "boolean" &&
    normalization.unitAware?.includes(key)
  ) {
    const bytes = parseByteSize(value);
    if (bytes !== null) {
      return bytes;
    }
  }
  if (normalization.stringify) {
    return String(value);
  }
  return value;
}

/** Structural equality with the policy's scalar normalization applied at every depth. */
export function valuesEqual(
  left: ConfigValue | undefined,
  right: ConfigValue | undefined,
  normalization: Normalization = {},
  key?: string
): boolean {
  if (left === undefined || right === undefined) {
    return left === right;
  }
  if (Array.isArray(left) || Array.isArray(right)) {
    if (!Array.isArray(left) || !Array.isArray(right)) {
      return false;
    }
    if (left.length !== right.length) {
      return false;
    }
    return left.every((item, index) =>
      valuesEqual(item, right[index], normalization)
    );
  }
  if (isConfigObject(left) || isConfigObject(right)) {
    if (!isConfigObject(left) || !isConfigObject(right)) {
      return false;
    }
    const leftKeys = Object.keys(left);
    if (leftKeys.length !== Object.keys(right).length) {
      return false;
    }
    return leftKeys.every(
      (entry) =>
        entry in right &&
        valuesEqual(left[entry], right[entry], normalization, entry)
    );
  }
  return (
    normalizeScalar(left, normalization, key) ===
    normalizeScalar(right, normalization, key)
  );
}

export function cloneValue<T extends ConfigValue>(value: T): T {
  return structuredClone(value);
}
