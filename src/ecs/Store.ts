import { ComponentTable } from "./ComponentTable";
import { EntityManager } from "./EntityManager";
import { combine, inInt64Range } from "./FieldType";
import { idsInAll } from "./IdSet";
import type {
    Component,
    ComponentBundle,
    ComponentInit,
    EntityId,
    EntityView,
    FieldAccessFailure,
    FieldType,
    StoreOptions
} from "./Types";

export class Store
{
    private readonly entities = new EntityManager();

    // component name -> (entity id -> component), in registration order
    private readonly tables = new Map<string, ComponentTable>();

    private readonly opts: Required<StoreOptions>;

    constructor(options: StoreOptions = {})
    {
        this.opts = {
            integerOverflow: options.integerOverflow ?? "wrap",
            debug: options.debug ?? false
        };
    }

    //#region ---------- Entities ----------
    /**
     * Allocates the next id and attaches every given component to it.
     * A component holding an out-of-range integer is skipped; the id is still used.
     */
    public addEntity(initial: ComponentBundle = {}): EntityId
    {
        const id = this.entities.create();
        for (const [name, component] of entriesOf<ComponentInit>(initial)) {
            this.attachComponent(id, name, component);
        }
        return id;
    }

    /**
     * Stores a copy of `component` under (id, name) unless one is already there.
     * `id` does not have to come from addEntity().
     * @returns false when an existing component was kept, or when a field
     * holds an integer outside the 64-bit range (nothing is stored then)
     */
    public attachComponent(id: EntityId, name: string, component: ComponentInit): boolean
    {
        const c = toComponent(component);
        for (const [field, value] of c) {
            if (!inInt64Range(value)) {
                this._debug(`attachComponent(${id}, "${name}") rejected: field "${field}" is outside the 64-bit integer range`);
                return false;
            }
        }
        const table = this._getOrCreateTable(name);
        if (!table.insert(id, c)) {
            this._debug(`attachComponent(${id}, "${name}") ignored: entity already has that component`);
            return false;
        }
        this.entities.recordAttach(id, name);
        return true;
    }

    /** Unknown ids give a view with no components. */
    public getEntity(id: EntityId): EntityView
    {
        const components = new Map<string, Component>();
        for (const name of this.entities.componentNames(id)) {
            const c = this.tables.get(name)?.get(id);
            if (c) components.set(name, new Map(c));
        }
        return { id, components };
    }

    /** Ids returned by addEntity(), oldest first. */
    public entityIds(): readonly EntityId[]
    {
        return this.entities.created().slice();
    }
    //#endregion

    //#region ---------- Queries ----------
    /**
     * Every created entity that carries all of `names`.
     * An empty list matches all entities; a name never attached to anything
     * matches none. Callers must not rely on the order of the result.
     */
    public getEntitiesWithComponents(names: readonly string[]): EntityView[]
    {
        const tables = names.map(n => this.tables.get(n));
        const ids = idsInAll(this.entities.created(), tables);
        return ids.map(id => this.getEntity(id));
    }

    public hasComponent(id: EntityId, name: string): boolean
    {
        return this.tables.get(name)?.has(id) ?? false;
    }

    /** Registered component names, first registration first. */
    public componentNames(): string[]
    {
        return Array.from(this.tables.keys());
    }
    //#endregion

    //#region ---------- Fields ----------
    public getField(id: EntityId, component: string, field: string): FieldType | undefined
    {
        return this.tables.get(component)?.get(id)?.get(field);
    }

    /**
     * Sets a field on an attached component, overwriting any previous value.
     * @returns false (and changes nothing) if the entity lacks the component
     * or `value` is an integer outside the 64-bit range
     */
    public updateField(id: EntityId, component: string, field: string, value: FieldType): boolean
    {
        if (!inInt64Range(value)) {
            this._debug(`updateField(${id}, "${component}", "${field}") rejected: value is outside the 64-bit integer range`);
            return false;
        }
        const table = this.tables.get(component);
        if (!table || !table.setField(id, field, value)) {
            this._debug(`updateField(${id}, "${component}", "${field}") failed: ${this.explainField(id, component, field)}`);
            return false;
        }
        return true;
    }

    /**
     * Adds `delta` to a field that is already set, using combine().
     * Read and write are two steps; do not share a Store across concurrent writers.
     */
    public incrementField(id: EntityId, component: string, field: string, delta: FieldType): boolean
    {
        if (!inInt64Range(delta)) {
            this._debug(`incrementField(${id}, "${component}", "${field}") rejected: delta is outside the 64-bit integer range`);
            return false;
        }
        const current = this.getField(id, component, field);
        if (current === undefined) {
            this._debug(`incrementField(${id}, "${component}", "${field}") failed: ${this.explainField(id, component, field)}`);
            return false;
        }
        return this.updateField(id, component, field, combine(current, delta, this.opts.integerOverflow));
    }

    /** Why getField() would come back empty, or undefined if the field is set. */
    public explainField(id: EntityId, component: string, field: string): FieldAccessFailure | undefined
    {
        const table = this.tables.get(component);
        if (!table) return "unknown-component";
        const c = table.get(id);
        if (!c) return "entity-lacks-component";
        if (!c.has(field)) return "field-unset";
        return undefined;
    }
    //#endregion

    //#region ---------- Internals ----------
    private _getOrCreateTable(name: string): ComponentTable
    {
        const existing = this.tables.get(name);
        if (existing) return existing;
        const t = new ComponentTable();
        this.tables.set(name, t);
        return t;
    }

    private _debug(message: string): void
    {
        if (this.opts.debug) console.debug(`[Store] ${message}`);
    }
    //#endregion
}

function isMap<V>(src: ReadonlyMap<string, V> | Readonly<Record<string, V>>): src is ReadonlyMap<string, V>
{
    return src instanceof Map;
}

function entriesOf<V>(src: ReadonlyMap<string, V> | Readonly<Record<string, V>>): Iterable<[string, V]>
{
    return isMap(src) ? src.entries() : Object.entries(src);
}

function toComponent(init: ComponentInit): Component
{
    return new Map(entriesOf<FieldType>(init));
}
