/**
 * Record types exchanged between the desktop dialect, the sync engine and the ERP side
 */

/**
 * One business object (item, customer, invoice...) as the desktop system reports it.
 *
 * Scalars arrive as strings. Nested references (`IncomeAccountRef`, `CustomerRef`...) are
 * objects with `ListID` / `FullName`; repeated children (line items) are arrays.
 */
export type EntityRecord = {
  [field: string]: unknown;
};

/** Field name -> new value. Empty means no mutation is needed. */
export type ChangeSet = {
  [field: string]: unknown;
};

/** A field changed on both sides since the last reconciliation. */
export interface FieldConflict {
  field: string;
  /** Value at the last reconciliation */
  baseValue: unknown;
  /** Value queued locally for push */
  localValue: unknown;
  /** Value the desktop system now reports */
  remoteValue: unknown;
}

/** Reference to another desktop entity, compared by display name */
export interface EntityRef {
  ListID?: string;
  FullName?: string;
}
