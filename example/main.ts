import { Store, float, formatEntities, formatEntity } from "../src";

/**
 * Builds one entity with a position, then updates, increments and queries it.
 * Every result goes through `print`.
 */
export function runDemo(store: Store, print: (line: string) => void = console.log): void
{
    const entityId = store.addEntity({
        position: { x: float(0.0), y: float(0.0) }
    });
    store.addEntity();

    print(formatEntity(store.getEntity(entityId)));
    print(formatEntities(store.getEntitiesWithComponents(["position"])));

    store.updateField(entityId, "position", "x", float(1.0));
    print(formatEntities(store.getEntitiesWithComponents(["position"])));

    store.incrementField(entityId, "position", "x", float(1.0));
    print(formatEntities(store.getEntitiesWithComponents(["position"])));

    print(formatEntities(store.getEntitiesWithComponents([])));
}

if (require.main === module) {
    runDemo(new Store());
}
