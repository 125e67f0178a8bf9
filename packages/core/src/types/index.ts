export type { EntityRecord, ChangeSet, FieldConflict, EntityRef } from './record.js';
