import type { Component, EntityId, FieldType } from "./Types";

/**
 * All components registered under one name, keyed by entity id.
 */
export class ComponentTable
{
    private readonly rows = new Map<EntityId, Component>();

    has(id: EntityId): boolean {
        return this.rows.has(id);
    }

    get(id: EntityId): Component | undefined {
        return this.rows.get(id);
    }

    /** First write wins. Returns false if the slot was already taken. */
    insert(id: EntityId, component: Component): boolean {
        if (this.rows.has(id)) return false;
        this.rows.set(id, component);
        return true;
    }

    setField(id: EntityId, field: string, value: FieldType): boolean {
        const c = this.rows.get(id);
        if (!c) return false;
        c.set(field, value);
        return true;
    }
}
