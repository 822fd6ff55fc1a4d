export type EntityId = number;

/**
 * Tagged numeric value stored in a component field.
 * Integers are 64-bit signed; the store refuses values outside that range.
 */
export type FieldType =
    | Readonly<{ k: "integer"; value: bigint }>
    | Readonly<{ k: "float"; value: number }>;

/** Named bag of fields. */
export type Component = Map<string, FieldType>;

/** What callers may hand to the store for a component; it is always copied. */
export type ComponentInit = ReadonlyMap<string, FieldType> | Readonly<Record<string, FieldType>>;

/** Initial components for a new entity, keyed by component name. */
export type ComponentBundle = ReadonlyMap<string, ComponentInit> | Readonly<Record<string, ComponentInit>>;

/**
 * Transient view of every component registered under one id.
 * Rebuilt on each read, the components are copies.
 */
export type EntityView = Readonly<{
    id: EntityId;
    components: Map<string, Component>;
}>;

export type IntegerOverflow = "wrap" | "saturate";

export type FieldAccessFailure =
    | "unknown-component"
    | "entity-lacks-component"
    | "field-unset";

export type StoreOptions = Readonly<{
    /** What integer + integer does past the 64-bit range. Defaults to "wrap". */
    integerOverflow?: IntegerOverflow;

    /** Log ignored attachments and failed field writes via console.debug. */
    debug?: boolean;
}>;
