import { UnitConversionError, SchemaMismatchError } from "./errors";

/**
 * Linear unit conversions into canonical storage units.
 * Formula: canonical = value * multiplier
 *
 * Conversions that shrink a value (e.g. ms → s) are stored in the other
 * direction and applied by division.
 */
export interface UnitConversion {
  fromUnit: string;
  toUnit: string;
  multiplier: number;
}

export const UNIT_CONVERSIONS: UnitConversion[] = [
  // Distance
  { fromUnit: "km", toUnit: "m", multiplier: 1000 },
  { fromUnit: "mi", toUnit: "m", multiplier: 1609.344 },
  { fromUnit: "ft", toUnit: "m", multiplier: 0.3048 },
  { fromUnit: "m", toUnit: "cm", multiplier: 100 },
  // Mass
  { fromUnit: "lb", toUnit: "kg", multiplier: 0.45359237 },
  { fromUnit: "kg", toUnit: "g", multiplier: 1000 },
  { fromUnit: "g", toUnit: "mg", multiplier: 1000 },
  { fromUnit: "oz", toUnit: "g", multiplier: 28.349523125 },
  // Duration
  { fromUnit: "min", toUnit: "s", multiplier: 60 },
  { fromUnit: "h", toUnit: "s", multiplier: 3600 },
  { fromUnit: "s", toUnit: "ms", multiplier: 1000 },
  // Energy
  { fromUnit: "kcal", toUnit: "kj", multiplier: 4.184 },
  // Ratio
  { fromUnit: "fraction", toUnit: "%", multiplier: 100 },
];

// Aliases seen across provider exports, normalized before lookup
const UNIT_ALIASES: Record<string, string> = {
  "count/min": "bpm",
  "beats/min": "bpm",
  "steps": "count",
  "kilometers": "km",
  "miles": "mi",
  "meters": "m",
  "centimeters": "cm",
  "feet": "ft",
  "lbs": "lb",
  "pounds": "lb",
  "kilograms": "kg",
  "grams": "g",
  "milligrams": "mg",
  "minutes": "min",
  "mins": "min",
  "hours": "h",
  "hr": "h",
  "hrs": "h",
  "seconds": "s",
  "sec": "s",
  "milliseconds": "ms",
  "kilocalories": "kcal",
  "kilojoules": "kj",
  "percent": "%",
};

/**
 * Units that name more than one quantity depending on the writer
 * ("cal" is a small calorie to a physicist and a kilocalorie on a food label).
 */
const AMBIGUOUS_UNITS = new Set(["cal", "calorie", "calories"]);

/**
 * Normalize unit strings to handle unicode variations and aliases
 * Converts μ (Greek micro) and µ (micro sign) to 'u', lowercases, and trims
 */
export function normalizeUnit(unit: string): string {
  const cleaned = unit
    .toLowerCase()
    .replace(/μ/g, 'u')
    .replace(/µ/g, 'u')
    .trim();
  return UNIT_ALIASES[cleaned] ?? cleaned;
}

export function isAmbiguousUnit(unit: string): boolean {
  return AMBIGUOUS_UNITS.has(normalizeUnit(unit));
}

/**
 * Convert a value from a provider unit into a canonical unit.
 * Throws SchemaMismatchError for ambiguous units and UnitConversionError when
 * no conversion path exists.
 */
export function convertUnit(
  value: number,
  fromUnit: string,
  toUnit: string,
  metricName: string
): number {
  if (!isFinite(value)) {
    throw new SchemaMismatchError(`Non-finite value for ${metricName}`);
  }
  if (isAmbiguousUnit(fromUnit)) {
    throw new SchemaMismatchError(`Unit "${fromUnit}" is ambiguous for ${metricName}`);
  }

  const normalizedFromUnit = normalizeUnit(fromUnit);
  const normalizedToUnit = normalizeUnit(toUnit);

  if (normalizedFromUnit === normalizedToUnit) {
    return value;
  }

  const conversion = UNIT_CONVERSIONS.find(
    (c) => c.fromUnit === normalizedFromUnit && c.toUnit === normalizedToUnit
  );
  if (conversion) {
    return value * conversion.multiplier;
  }

  // Try the reverse conversion and invert it: if y = x * m, then x = y / m
  const reverseConversion = UNIT_CONVERSIONS.find(
    (c) => c.fromUnit === normalizedToUnit && c.toUnit === normalizedFromUnit
  );
  if (reverseConversion) {
    return value / reverseConversion.multiplier;
  }

  throw new UnitConversionError(fromUnit, toUnit, metricName);
}
