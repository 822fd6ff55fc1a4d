export * from "./ecs/Types";
export { Store } from "./ecs/Store";
export { combine, fieldEquals, float, inInt64Range, integer, toNumber, INT64_MAX, INT64_MIN } from "./ecs/FieldType";
export { formatComponent, formatEntities, formatEntity, formatField } from "./ecs/Format";
