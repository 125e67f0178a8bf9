import { describe, expect, it } from 'vitest';
import {
  createDefaultRegistry,
  customerEntity,
  EntityRegistry,
  itemInventoryEntity,
  listQueryBody,
  receivePaymentEntity,
  txnQueryBody,
} from '../src/index.js';

describe('EntityRegistry', () => {
  it('registers every synchronized entity type', () => {
    const registry = createDefaultRegistry();

    expect(registry.listTags()).toEqual([
      'Customer',
      'Vendor',
      'ItemInventory',
      'Invoice',
      'Bill',
      'ReceivePayment',
      'CreditMemo',
      'SalesOrder',
      'PurchaseOrder',
      'JournalEntry',
    ]);
    expect(registry.getOrThrow('Invoice').pageSize).toBe(10);
    expect(registry.getOrThrow('JournalEntry').idField).toBe('TxnID');
    expect(registry.getOrThrow('ItemInventory').pageSize).toBe(100);
  });

  it('rejects duplicate and unknown tags', () => {
    const registry = new EntityRegistry();
    registry.register(customerEntity);

    expect(() => registry.register(customerEntity)).toThrow(/already registered/);
    expect(() => registry.getOrThrow('Employee')).toThrow("Entity type 'Employee' is not registered");
  });
});

describe('query bodies', () => {
  it('orders list filters as the dialect expects', () => {
    const body = listQueryBody(
      { activeStatus: 'All', fromModifiedDate: '1980-01-01', nameStartsWith: 'Wid' },
      50
    );

    expect(Object.keys(body)).toEqual(['MaxReturned', 'ActiveStatus', 'FromModifiedDate', 'NameFilter']);
    expect(body['MaxReturned']).toBe('50');
    expect(body['NameFilter']).toEqual({ MatchCriterion: 'StartsWith', Name: 'Wid' });
  });

  it('prefers the transaction date range over the modified date range', () => {
    const body = txnQueryBody(
      { fromTxnDate: '2024-01-01', fromModifiedDate: '2023-01-01', includeLineItems: true },
      10
    );

    expect(body).toEqual({
      MaxReturned: '10',
      TxnDateRangeFilter: { FromTxnDate: '2024-01-01' },
      IncludeLineItems: 'true',
    });
  });

  it('always asks payments for their applied lines', () => {
    expect(receivePaymentEntity.buildQuery({})).toEqual({ MaxReturned: '50', IncludeLineItems: 'true' });
  });
});

describe('item inventory mutations', () => {
  const mutation = itemInventoryEntity.mutation;

  it('fills add defaults in element order', () => {
    const body = mutation?.buildAdd({ Name: 'Widget-100', SalesDesc: 'Blue widget' });

    expect(body).toEqual({
      Name: 'Widget-100',
      IsActive: 'true',
      SalesDesc: 'Blue widget',
      SalesPrice: '0.00',
      IncomeAccountRef: { FullName: 'Merchandise Sales' },
      COGSAccountRef: { FullName: 'Cost of Goods Sold' },
      AssetAccountRef: { FullName: 'Inventory Asset' },
    });
    expect(Object.keys(body ?? {})).toEqual([
      'Name',
      'IsActive',
      'SalesDesc',
      'SalesPrice',
      'IncomeAccountRef',
      'COGSAccountRef',
      'AssetAccountRef',
    ]);
  });

  it('keeps account references the record names', () => {
    const body = mutation?.buildAdd({
      Name: 'Gadget',
      SalesPrice: 12.5,
      IncomeAccountRef: { FullName: 'Service Income' },
    });

    expect(body?.['SalesPrice']).toBe('12.50');
    expect(body?.['IncomeAccountRef']).toEqual({ FullName: 'Service Income' });
  });

  it('puts id and edit sequence ahead of changed fields', () => {
    const body = mutation?.buildMod('80000001-1', '1700000000', {
      SalesPrice: '19.99',
      Name: 'Widget-100',
      PurchaseCost: 7,
    });

    expect(Object.keys(body ?? {})).toEqual(['ListID', 'EditSequence', 'Name', 'SalesPrice', 'PurchaseCost']);
    expect(body?.['PurchaseCost']).toBe('7.00');
  });
});
