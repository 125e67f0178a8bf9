import type { XmlElement } from '../document.js';
import type { QueryParams } from './types.js';

/**
 * First-page body of a list query (customers, vendors, items):
 * MaxReturned, ActiveStatus, FromModifiedDate, ToModifiedDate, NameFilter
 */
export function listQueryBody(params: QueryParams, pageSize: number): XmlElement {
  const body: XmlElement = { MaxReturned: String(params.maxReturned ?? pageSize) };
  if (params.activeStatus) body['ActiveStatus'] = params.activeStatus;
  if (params.fromModifiedDate) body['FromModifiedDate'] = params.fromModifiedDate;
  if (params.toModifiedDate) body['ToModifiedDate'] = params.toModifiedDate;
  if (params.nameStartsWith) {
    body['NameFilter'] = { MatchCriterion: 'StartsWith', Name: params.nameStartsWith };
  }
  return body;
}

/**
 * First-page body of a transaction query:
 * MaxReturned, TxnDateRangeFilter | ModifiedDateRangeFilter, IncludeLineItems
 */
export function txnQueryBody(params: QueryParams, pageSize: number): XmlElement {
  const body: XmlElement = { MaxReturned: String(params.maxReturned ?? pageSize) };

  if (params.fromTxnDate || params.toTxnDate) {
    const filter: XmlElement = {};
    if (params.fromTxnDate) filter['FromTxnDate'] = params.fromTxnDate;
    if (params.toTxnDate) filter['ToTxnDate'] = params.toTxnDate;
    body['TxnDateRangeFilter'] = filter;
  } else if (params.fromModifiedDate || params.toModifiedDate) {
    const filter: XmlElement = {};
    if (params.fromModifiedDate) filter['FromModifiedDate'] = params.fromModifiedDate;
    if (params.toModifiedDate) filter['ToModifiedDate'] = params.toModifiedDate;
    body['ModifiedDateRangeFilter'] = filter;
  }

  if (params.includeLineItems !== undefined) {
    body['IncludeLineItems'] = params.includeLineItems ? 'true' : 'false';
  }
  return body;
}
