import { EntityId } from "./Types";

export class EntityManager
{
    private _nextId: EntityId = 1;
    private readonly _created: EntityId[] = [];
    // reverse index: id -> component names attached to it, in attach order
    private readonly _names = new Map<EntityId, string[]>();

    /** Ids are never reused; there is no kill(). */
    public create(): EntityId
    {
        const id = this._nextId++;
        this._created.push(id);
        return id;
    }

    /** Every id handed out by create(), oldest first. */
    public created(): readonly EntityId[]
    {
        return this._created;
    }

    public recordAttach(id: EntityId, name: string): void
    {
        const list = this._names.get(id);
        if (list) list.push(name);
        else this._names.set(id, [name]);
    }

    public componentNames(id: EntityId): readonly string[]
    {
        return this._names.get(id) ?? [];
    }
}
