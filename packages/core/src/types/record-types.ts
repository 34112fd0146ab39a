/**
 * A record as exchanged with a storage driver: field name to value.
 */
export type RawRecord = Readonly<Record<string, unknown>>;

/**
 * Flattened field-to-value state of an instance. Embedded objects appear as
 * nested snapshots under their field name.
 */
export type Snapshot = Readonly<Record<string, unknown>>;
