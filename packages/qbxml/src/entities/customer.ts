import { toEntityRecord, type XmlElement } from '../document.js';
import { appendFields } from './fields.js';
import { listQueryBody } from './query.js';
import type { EntityDefinition, FieldSpec } from './types.js';

/** Customer fields pushed back on add/mod, in CustomerMod element order */
export const CUSTOMER_FIELDS: FieldSpec[] = [
  { name: 'Name', kind: 'text' },
  { name: 'IsActive', kind: 'boolean' },
  { name: 'CompanyName', kind: 'text' },
  { name: 'FirstName', kind: 'text' },
  { name: 'LastName', kind: 'text' },
  { name: 'Phone', kind: 'text' },
  { name: 'Email', kind: 'text' },
];

export const customerEntity: EntityDefinition = {
  tag: 'Customer',
  kind: 'list',
  idField: 'ListID',
  secondaryKey: 'Name',
  pageSize: 50,
  buildQuery: (params) => listQueryBody(params, 50),
  parseRecord: toEntityRecord,
  mutation: {
    fields: CUSTOMER_FIELDS,
    tokenField: 'EditSequence',
    buildAdd(record) {
      return appendFields({}, CUSTOMER_FIELDS, record);
    },
    buildMod(id, token, changes) {
      const body: XmlElement = { ListID: id, EditSequence: token };
      return appendFields(body, CUSTOMER_FIELDS, changes);
    },
  },
};

export const vendorEntity: EntityDefinition = {
  tag: 'Vendor',
  kind: 'list',
  idField: 'ListID',
  secondaryKey: 'Name',
  pageSize: 50,
  buildQuery: (params) => listQueryBody(params, 50),
  parseRecord: toEntityRecord,
};
