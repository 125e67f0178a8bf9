import { getNumber, getRecord, getRefName, getText, toArray, isPlainObject } from '@ledgerlink/core';
import type { EntityRecord } from '@ledgerlink/core';
import type { CanonicalParty, PartyContact, PostalAddress } from './types.js';

function extractAddress(record: EntityRecord | undefined): PostalAddress | undefined {
  if (!record) return undefined;
  const lines: string[] = [];
  for (const field of ['Addr1', 'Addr2', 'Addr3', 'Addr4', 'Addr5']) {
    const line = getText(record, field);
    if (line) lines.push(line);
  }
  const address: PostalAddress = {
    lines,
    city: getText(record, 'City'),
    state: getText(record, 'State'),
    postalCode: getText(record, 'PostalCode'),
    country: getText(record, 'Country'),
  };
  const hasContent =
    lines.length > 0 ||
    address.city !== undefined ||
    address.state !== undefined ||
    address.postalCode !== undefined ||
    address.country !== undefined;
  return hasContent ? address : undefined;
}

function extractContacts(value: unknown): PartyContact[] {
  return toArray(value)
    .filter(isPlainObject)
    .map((contact) => ({
      listId: getText(contact, 'ListID'),
      firstName: getText(contact, 'FirstName'),
      lastName: getText(contact, 'LastName'),
      salutation: getText(contact, 'Salutation'),
    }));
}

function isActive(record: EntityRecord): boolean {
  return (getText(record, 'IsActive') ?? 'true').toLowerCase() === 'true';
}

export function extractCustomer(record: EntityRecord): CanonicalParty {
  return {
    kind: 'customer',
    listId: getText(record, 'ListID'),
    name: getText(record, 'Name') ?? '',
    fullName: getText(record, 'FullName'),
    companyName: getText(record, 'CompanyName'),
    firstName: getText(record, 'FirstName'),
    lastName: getText(record, 'LastName'),
    email: getText(record, 'Email'),
    phone: getText(record, 'Phone'),
    altPhone: getText(record, 'AltPhone'),
    fax: getText(record, 'Fax'),
    contact: getText(record, 'Contact'),
    notes: getText(record, 'Notes'),
    isActive: isActive(record),
    parentName: getRefName(record, 'ParentRef'),
    termsName: getRefName(record, 'TermsRef'),
    balance: getText(record, 'TotalBalance') !== undefined ? getNumber(record, 'TotalBalance') : undefined,
    address: extractAddress(getRecord(record, 'BillAddress')),
    shippingAddress: extractAddress(getRecord(record, 'ShipAddress')),
    contacts: extractContacts(record['ContactsRet']),
  };
}

export function extractVendor(record: EntityRecord): CanonicalParty {
  return {
    kind: 'vendor',
    listId: getText(record, 'ListID'),
    name: getText(record, 'Name') ?? '',
    fullName: getText(record, 'FullName'),
    companyName: getText(record, 'CompanyName'),
    firstName: getText(record, 'FirstName'),
    lastName: getText(record, 'LastName'),
    email: getText(record, 'Email'),
    phone: getText(record, 'Phone'),
    isActive: isActive(record),
    termsName: getRefName(record, 'TermsRef'),
    address: extractAddress(getRecord(record, 'VendorAddress')),
    contacts: [],
  };
}

/** Customers nested under another customer are jobs, not trading partners */
export function isJob(party: CanonicalParty): boolean {
  return party.kind === 'customer' && party.parentName !== undefined;
}
