import type { FieldType, IntegerOverflow } from "./Types";

export const INT64_MIN = -(2n ** 63n);
export const INT64_MAX = 2n ** 63n - 1n;

export function integer(value: bigint | number): FieldType
{
    if (typeof value === "number") {
        if (!Number.isSafeInteger(value)) {
            throw new Error(`integer(${value}) failed: expected a safe integer, use float() for fractional values`);
        }
        value = BigInt(value);
    }
    if (value < INT64_MIN || value > INT64_MAX) {
        throw new Error(`integer(${value}) failed: value is outside the 64-bit signed range`);
    }
    return { k: "integer", value };
}

export function float(value: number): FieldType
{
    return { k: "float", value };
}

/**
 * Adds two field values.
 * integer + integer stays integer, anything involving a float is a float
 * (the integer side is widened first). Never fails.
 */
export function combine(a: FieldType, b: FieldType, overflow: IntegerOverflow = "wrap"): FieldType
{
    if (a.k === "integer" && b.k === "integer") {
        return { k: "integer", value: addInt64(a.value, b.value, overflow) };
    }
    return { k: "float", value: toNumber(a) + toNumber(b) };
}

/** False for an integer outside the 64-bit signed range, which only a hand-built value can hold. */
export function inInt64Range(f: FieldType): boolean
{
    return f.k !== "integer" || (f.value >= INT64_MIN && f.value <= INT64_MAX);
}

export function toNumber(f: FieldType): number
{
    return f.k === "integer" ? Number(f.value) : f.value;
}

export function fieldEquals(a: FieldType, b: FieldType): boolean
{
    if (a.k === "integer" && b.k === "integer") return a.value === b.value;
    if (a.k === "float" && b.k === "float") return Object.is(a.value, b.value);
    return false;
}

function addInt64(a: bigint, b: bigint, overflow: IntegerOverflow): bigint
{
    const sum = a + b;
    switch (overflow) {
        case "wrap":
            return BigInt.asIntN(64, sum);
        case "saturate":
            if (sum > INT64_MAX) return INT64_MAX;
            if (sum < INT64_MIN) return INT64_MIN;
            return sum;
    }
}
