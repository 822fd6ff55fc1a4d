import type { EntityView, FieldType } from "./Types";

export function formatField(f: FieldType): string
{
    if (f.k === "integer") return `Integer(${f.value})`;
    return `Float(${formatFloat(f.value)})`;
}

export function formatComponent(c: ReadonlyMap<string, FieldType>): string
{
    if (c.size === 0) return "{}";
    const parts: string[] = [];
    for (const [name, f] of c) parts.push(`${name}: ${formatField(f)}`);
    return `{ ${parts.join(", ")} }`;
}

export function formatEntity(e: EntityView): string
{
    if (e.components.size === 0) return `Entity #${e.id} {}`;
    const parts: string[] = [];
    for (const [name, c] of e.components) parts.push(`${name}: ${formatComponent(c)}`);
    return `Entity #${e.id} { ${parts.join(", ")} }`;
}

/** One entity per line. */
export function formatEntities(list: readonly EntityView[]): string
{
    return list.map(formatEntity).join("\n");
}

function formatFloat(v: number): string
{
    if (Number.isNaN(v)) return "NaN";
    if (v === Infinity) return "inf";
    if (v === -Infinity) return "-inf";
    if (Object.is(v, -0)) return "-0.0";
    const s = String(v);
    // whole floats get ".0" unless String() already used exponent notation
    return Number.isInteger(v) && !s.includes("e") ? `${s}.0` : s;
}
