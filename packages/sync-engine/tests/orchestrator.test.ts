import { afterEach, describe, expect, it, vi } from 'vitest';
import { ITEM_INVENTORY_FIELDS, itemInventoryEntity } from '@ledgerlink/qbxml';
import { createTask, diff, type CloudPropagator } from '../src/index.js';
import {
  createHarness,
  itemRet,
  mutationResponse,
  openSession,
  queryPage,
  type Harness,
} from './helpers.js';

describe('SessionOrchestrator', () => {
  let harness: Harness;

  afterEach(() => {
    vi.restoreAllMocks();
    harness.cleanup();
  });

  describe('authentication and tickets', () => {
    it('rejects bad credentials with the invalid-user sentinel', async () => {
      harness = createHarness();
      expect(await harness.orchestrator.authenticate('sync', 'wrong')).toEqual(['', 'nvu']);
      expect(await harness.sessions.list()).toEqual([]);
    });

    it('issues a fresh ticket with the default task queue', async () => {
      harness = createHarness();
      const [ticket, companyFile] = await harness.orchestrator.authenticate('sync', 'test-secret');

      expect(ticket).toMatch(/^[0-9a-f-]{36}$/);
      expect(companyFile).toBe('');
      expect((await harness.sessions.get(ticket))?.tasks.map((t) => t.entityType)).toEqual(['ItemInventory']);
    });

    it('answers an unknown ticket with an empty request and an explanatory error', async () => {
      harness = createHarness();

      expect(await harness.orchestrator.getNextRequest('bogus-ticket')).toBe('');
      const message = await harness.orchestrator.getLastError('bogus-ticket');
      expect(message).toBe('Invalid or expired session ticket: bogus-ticket');
      expect(message).toMatch(/invalid|expired/i);
    });

    it('treats a session idle past its TTL as unknown and never revives it', async () => {
      harness = createHarness();
      const ticket = await openSession(harness);

      harness.now.value += 60 * 60 * 1000 + 1;

      expect(await harness.orchestrator.getNextRequest(ticket)).toBe('');
      expect(await harness.orchestrator.getLastError(ticket)).toBe(
        `Invalid or expired session ticket: ${ticket}`
      );
      expect(await harness.sessions.get(ticket)).toBeUndefined();
    });

    it('reports "No error" for a healthy session', async () => {
      harness = createHarness();
      const ticket = await openSession(harness);
      expect(await harness.orchestrator.getLastError(ticket)).toBe('No error');
    });
  });

  describe('pagination', () => {
    it('commits a multi-page refresh once, after the last page', async () => {
      harness = createHarness();
      const commit = vi.spyOn(harness.snapshots, 'commit');
      const ticket = await openSession(harness);

      const first = await harness.orchestrator.getNextRequest(ticket);
      expect(first).toContain('iterator="Start"');

      expect(
        await harness.orchestrator.submitResponse(
          ticket,
          queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })], { iteratorID: 'it-1', remaining: 2 }),
          '',
          ''
        )
      ).toBe(50);
      expect(await harness.cursors.load()).toMatchObject({
        entityType: 'ItemInventory',
        iteratorID: 'it-1',
        remaining: 2,
      });

      const second = await harness.orchestrator.getNextRequest(ticket);
      expect(second).toContain('<ItemInventoryQueryRq requestID="2" iterator="Continue" iteratorID="it-1">');
      expect(
        await harness.orchestrator.submitResponse(
          ticket,
          queryPage('ItemInventory', [itemRet({ id: 'B', name: 'Beta' })], { iteratorID: 'it-1', remaining: 1 }),
          '',
          ''
        )
      ).toBe(50);
      expect(commit).not.toHaveBeenCalled();
      expect((await harness.snapshots.load('ItemInventory')).records).toEqual({});

      await harness.orchestrator.getNextRequest(ticket);
      expect(
        await harness.orchestrator.submitResponse(
          ticket,
          queryPage('ItemInventory', [itemRet({ id: 'C', name: 'Gamma' })], { iteratorID: 'it-1', remaining: 0 }),
          '',
          ''
        )
      ).toBe(100);

      expect(commit).toHaveBeenCalledTimes(1);
      const doc = await harness.snapshots.load('ItemInventory');
      expect(Object.keys(doc.records)).toEqual(['A', 'B', 'C']);
      expect(doc.version).toBe(1);
      expect(await harness.cursors.load()).toBeUndefined();
      expect(await harness.orchestrator.getNextRequest(ticket)).toBe('');
    });

    it('removes records missing from a full refresh', async () => {
      harness = createHarness();
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['A'] = { ListID: 'A', Name: 'Alpha', IsActive: 'true' };
        doc.records['B'] = { ListID: 'B', Name: 'Beta', IsActive: 'true' };
        doc.records['C'] = { ListID: 'C', Name: 'Gamma', IsActive: 'true' };
      });
      const ticket = await openSession(harness);

      await harness.orchestrator.getNextRequest(ticket);
      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' }), itemRet({ id: 'C', name: 'Gamma' })]),
        '',
        ''
      );

      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['A', 'C']);
    });

    it('keeps records when the refresh is not a full one', async () => {
      harness = createHarness([{ entityType: 'ItemInventory', fullRefresh: false }]);
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['B'] = { ListID: 'B', Name: 'Beta' };
      });
      const ticket = await openSession(harness);

      await harness.orchestrator.getNextRequest(ticket);
      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })]),
        '',
        ''
      );

      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['B', 'A']);
    });

    it('keeps records outside the window of a date-filtered query', async () => {
      harness = createHarness([{ entityType: 'ItemInventory', fromModifiedDate: '2024-04-30' }]);
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['B'] = { ListID: 'B', Name: 'Beta' };
      });
      const ticket = await openSession(harness);

      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<FromModifiedDate>2024-04-30</FromModifiedDate>');
      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })]),
        '',
        ''
      );

      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['B', 'A']);
    });

    it('resumes a persisted cursor without deleting records it did not see', async () => {
      harness = createHarness();
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['A'] = { ListID: 'A', Name: 'Alpha' };
        doc.records['B'] = { ListID: 'B', Name: 'Beta' };
      });
      await harness.cursors.save('ItemInventory', 'it-9', 1);
      const ticket = await openSession(harness);

      const request = await harness.orchestrator.getNextRequest(ticket);
      expect(request).toContain('iterator="Continue" iteratorID="it-9"');

      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'C', name: 'Gamma' })], { iteratorID: 'it-9', remaining: 0 }),
        '',
        ''
      );

      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['A', 'B', 'C']);
      expect(await harness.cursors.load()).toBeUndefined();
    });

    it('treats status 1 as an empty final page', async () => {
      harness = createHarness([{ entityType: 'Vendor' }, { entityType: 'Customer' }, { entityType: 'Bill' }]);
      const ticket = await openSession(harness);

      await harness.orchestrator.getNextRequest(ticket);
      const progress = await harness.orchestrator.submitResponse(
        ticket,
        queryPage('Vendor', [], { statusCode: '1', statusMessage: 'No match' }),
        '',
        ''
      );

      expect(progress).toBe(33);
      expect(await harness.orchestrator.getLastError(ticket)).toBe('No error');
    });
  });

  describe('task failures', () => {
    it('abandons a malformed page, records the error and moves on', async () => {
      harness = createHarness([
        { entityType: 'ItemInventory' },
        { entityType: 'Customer' },
        { entityType: 'Vendor' },
      ]);
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      const progress = await harness.orchestrator.submitResponse(ticket, '<not valid xml', '', '');

      expect(typeof progress).toBe('number');
      expect(progress).toBe(33);
      expect(await harness.orchestrator.getLastError(ticket)).toMatch(/^ItemInventory: XML parse error: /);
      const [status] = await harness.orchestrator.status();
      expect(status?.taskIndex).toBe(1);
      expect(status?.tasks[0]?.state).toBe('error');
      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<CustomerQueryRq');
    });

    it('abandons a task on a failure status', async () => {
      harness = createHarness([{ entityType: 'ItemInventory' }, { entityType: 'Customer' }]);
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [], { statusCode: '3200', statusMessage: 'The provided edit sequence is out-of-date' }),
        '',
        ''
      );

      expect(await harness.orchestrator.getLastError(ticket)).toBe(
        'ItemInventory: ItemInventoryQueryRs returned status 3200 (Error): The provided edit sequence is out-of-date'
      );
    });

    it('returns -1 and skips the task when the connector reports an error', async () => {
      harness = createHarness([{ entityType: 'ItemInventory' }, { entityType: 'Customer' }]);
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      const progress = await harness.orchestrator.submitResponse(
        ticket,
        '',
        '0x80040400',
        'QuickBooks found an error when parsing the provided XML text stream.'
      );

      expect(progress).toBe(-1);
      expect(await harness.orchestrator.getLastError(ticket)).toBe(
        'ItemInventory: Connector error: QuickBooks found an error when parsing the provided XML text stream.'
      );
      expect((await harness.orchestrator.status())[0]?.taskIndex).toBe(1);
    });

    it('drops the persisted cursor of an abandoned paginated query', async () => {
      harness = createHarness();
      const first = await openSession(harness);
      await harness.orchestrator.getNextRequest(first);
      await harness.orchestrator.submitResponse(
        first,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })], { iteratorID: 'it-1', remaining: 5 }),
        '',
        ''
      );
      expect(await harness.cursors.load()).toMatchObject({ iteratorID: 'it-1' });

      expect(await harness.orchestrator.submitResponse(first, '', '0x80040400', 'Company file is locked')).toBe(-1);
      expect(await harness.cursors.load()).toBeUndefined();

      const second = await openSession(harness);
      expect(await harness.orchestrator.getNextRequest(second)).toContain(
        '<ItemInventoryQueryRq requestID="1" iterator="Start">'
      );
    });

    it('drops the persisted cursor when a paginated query ends with an empty response', async () => {
      harness = createHarness();
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);
      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })], { iteratorID: 'it-2', remaining: 3 }),
        '',
        ''
      );

      expect(await harness.orchestrator.submitResponse(ticket, '', '', '')).toBe(100);
      expect(await harness.cursors.load()).toBeUndefined();
    });

    it('treats an empty response as a finished task', async () => {
      harness = createHarness([{ entityType: 'ItemInventory' }, { entityType: 'Customer' }]);
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      expect(await harness.orchestrator.submitResponse(ticket, '   ', '', '')).toBe(50);
      expect((await harness.orchestrator.status())[0]?.tasks[0]?.state).toBe('complete');
    });

    it('reports the company file and version the connector announced', async () => {
      harness = createHarness();
      const ticket = await openSession(harness);

      await harness.orchestrator.getNextRequest(ticket, {
        majorVersion: '13',
        minorVersion: '0',
        companyFile: 'C:\\Books\\company.qbw',
      });

      expect((await harness.orchestrator.status())[0]).toMatchObject({
        companyFile: 'C:\\Books\\company.qbw',
        qbxmlVersion: '13.0',
      });
    });

    it('records a build failure and issues the next task instead', async () => {
      harness = createHarness([{ entityType: 'Vendor' }, { entityType: 'Customer' }]);
      vi.spyOn(harness.registry.getOrThrow('Vendor'), 'buildQuery').mockImplementation(() => {
        throw new Error('filter rejected');
      });
      const ticket = await openSession(harness);

      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<CustomerQueryRq');
      expect(await harness.orchestrator.getLastError(ticket)).toBe('Vendor: filter rejected');
    });

    it('records connection errors and tells the connector it is done', async () => {
      harness = createHarness();
      const ticket = await openSession(harness);

      expect(await harness.orchestrator.connectionError(ticket, '0x80040408', 'Could not start QuickBooks.')).toBe(
        'done'
      );
      expect(await harness.orchestrator.getLastError(ticket)).toBe('Connection error: Could not start QuickBooks.');
    });
  });

  describe('session isolation', () => {
    it('advances each session independently and closes one without touching the other', async () => {
      harness = createHarness([{ entityType: 'Customer' }, { entityType: 'Vendor' }, { entityType: 'Bill' }]);
      const first = await openSession(harness);
      const second = await openSession(harness);
      expect(first).not.toBe(second);

      await harness.orchestrator.getNextRequest(first);
      expect(await harness.orchestrator.submitResponse(first, '', '', '')).toBe(33);

      const byTicket = new Map((await harness.orchestrator.status()).map((s) => [s.ticket, s.taskIndex]));
      expect(byTicket.get(first)).toBe(1);
      expect(byTicket.get(second)).toBe(0);

      expect(await harness.orchestrator.close(first)).toBe('OK');
      expect(await harness.orchestrator.close(first)).toBe('OK');
      expect(await harness.orchestrator.getNextRequest(second)).toContain('<CustomerQueryRq');
      expect(await harness.orchestrator.getNextRequest(first)).toBe('');
    });
  });

  describe('local changes', () => {
    it('round-trips a new item: add, id assigned, placeholder replaced, then a clean query', async () => {
      harness = createHarness();
      await harness.snapshots.stageChange(itemInventoryEntity, { Name: 'Widget-100', SalesPrice: '10.00' });
      const ticket = await openSession(harness);

      const add = await harness.orchestrator.getNextRequest(ticket);
      expect(add).toContain('<ItemInventoryAddRq requestID="1.1">');
      expect(add).toContain('<Name>Widget-100</Name>');

      const ret = itemRet({ id: '80000010-1', name: 'Widget-100', editSequence: '1', salesPrice: '10.00' });
      expect(await harness.orchestrator.submitResponse(ticket, mutationResponse('ItemInventoryAddRs', ret), '', '')).toBe(
        50
      );
      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['80000010-1']);

      const query = await harness.orchestrator.getNextRequest(ticket);
      expect(query).toContain('<ItemInventoryQueryRq requestID="1" iterator="Start">');
      expect(await harness.orchestrator.submitResponse(ticket, queryPage('ItemInventory', [ret]), '', '')).toBe(100);

      const doc = await harness.snapshots.load('ItemInventory');
      const cached = doc.records['80000010-1'];
      expect(cached).toMatchObject({ ListID: '80000010-1', Name: 'Widget-100', SalesPrice: '10.00' });
      expect(diff(cached ?? {}, cached ?? {}, ITEM_INVENTORY_FIELDS)).toEqual({});
    });

    it('still queries after a rejected add and assigns the placeholder by name', async () => {
      harness = createHarness([{ entityType: 'ItemInventory' }, { entityType: 'Customer' }]);
      await harness.snapshots.stageChange(itemInventoryEntity, { Name: 'Widget-100' });
      const ticket = await openSession(harness);
      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<ItemInventoryAddRq');

      const progress = await harness.orchestrator.submitResponse(
        ticket,
        mutationResponse(
          'ItemInventoryAddRs',
          '',
          '3100',
          'The name &quot;Widget-100&quot; of the list element is already in use.'
        ),
        '',
        ''
      );

      expect(progress).toBe(50);
      expect(await harness.orchestrator.getLastError(ticket)).toBe(
        'ItemInventory: 1 change(s) rejected: ItemInventoryAddRs returned status 3100 (Error): The name "Widget-100" of the list element is already in use.'
      );

      const query = await harness.orchestrator.getNextRequest(ticket);
      expect(query).toContain('<ItemInventoryQueryRq requestID="1" iterator="Start">');
      const existing = itemRet({ id: '80000020-1', name: 'Widget-100', editSequence: '3' });
      expect(await harness.orchestrator.submitResponse(ticket, queryPage('ItemInventory', [existing]), '', '')).toBe(50);

      expect(Object.keys((await harness.snapshots.load('ItemInventory')).records)).toEqual(['80000020-1']);
      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<CustomerQueryRq');
    });

    it('refreshes a stale edit sequence so the next session can push the edit', async () => {
      harness = createHarness();
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['80000001-1'] = { ListID: '80000001-1', EditSequence: '5', Name: 'Widget-100', SalesPrice: '19.99' };
      });
      await harness.snapshots.stageChange(itemInventoryEntity, { ListID: '80000001-1', SalesPrice: '24.99' });
      const stale = mutationResponse('ItemInventoryModRs', '', '3200', 'The provided edit sequence is out-of-date.');
      const current = itemRet({ id: '80000001-1', name: 'Widget-100', editSequence: '7', salesPrice: '19.99' });

      const first = await openSession(harness);
      expect(await harness.orchestrator.getNextRequest(first)).toContain('<EditSequence>5</EditSequence>');
      expect(await harness.orchestrator.submitResponse(first, stale, '', '')).toBe(50);
      expect(await harness.orchestrator.getNextRequest(first)).toContain('<ItemInventoryQueryRq');
      expect(await harness.orchestrator.submitResponse(first, queryPage('ItemInventory', [current]), '', '')).toBe(100);

      const doc = await harness.snapshots.load('ItemInventory');
      expect(doc.records['80000001-1']).toMatchObject({ EditSequence: '7', SalesPrice: '19.99' });
      expect(doc.localEdits['80000001-1']).toEqual({ ListID: '80000001-1', SalesPrice: '24.99' });

      const second = await openSession(harness);
      const retry = await harness.orchestrator.getNextRequest(second);
      expect(retry).toContain('<ItemInventoryModRq');
      expect(retry).toContain('<EditSequence>7</EditSequence>');
      expect(retry).toContain('<SalesPrice>24.99</SalesPrice>');
    });

    it('applies a modify acknowledgement and drops the local edit', async () => {
      harness = createHarness();
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['80000001-1'] = { ListID: '80000001-1', EditSequence: '5', Name: 'Widget-100', SalesPrice: '19.99' };
      });
      await harness.snapshots.stageChange(itemInventoryEntity, { ListID: '80000001-1', SalesPrice: '24.99' });
      const ticket = await openSession(harness);

      expect(await harness.orchestrator.getNextRequest(ticket)).toContain('<ItemInventoryModRq');
      const ret = itemRet({ id: '80000001-1', name: 'Widget-100', editSequence: '6', salesPrice: '24.99' });
      await harness.orchestrator.submitResponse(ticket, mutationResponse('ItemInventoryModRs', ret), '', '');

      const doc = await harness.snapshots.load('ItemInventory');
      expect(doc.localEdits).toEqual({});
      expect(doc.records['80000001-1']).toMatchObject({ EditSequence: '6', SalesPrice: '24.99' });
    });
  });

  describe('cloud propagation', () => {
    it('hands added and changed records to the propagator after the commit', async () => {
      const propagate = vi.fn<CloudPropagator['propagate']>().mockResolvedValue(undefined);
      harness = createHarness([{ entityType: 'ItemInventory' }], { propagate });
      await harness.snapshots.commit('ItemInventory', (doc) => {
        doc.records['A'] = { ListID: 'A', Name: 'Alpha', IsActive: 'true' };
        doc.records['B'] = { ListID: 'B', Name: 'Beta', IsActive: 'true' };
      });
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [
          itemRet({ id: 'A', name: 'Alpha' }),
          itemRet({ id: 'B', name: 'Beta-2' }),
          itemRet({ id: 'C', name: 'Gamma' }),
        ]),
        '',
        ''
      );

      expect(propagate).toHaveBeenCalledTimes(1);
      expect(propagate.mock.calls[0]?.[0]).toBe('ItemInventory');
      expect(propagate.mock.calls[0]?.[1].map((r) => r['ListID'])).toEqual(['C', 'B']);
    });

    it('does not fail the task when propagation throws', async () => {
      const propagate = vi.fn<CloudPropagator['propagate']>().mockRejectedValue(new Error('ERP offline'));
      harness = createHarness([{ entityType: 'ItemInventory' }], { propagate });
      const ticket = await openSession(harness);
      await harness.orchestrator.getNextRequest(ticket);

      const progress = await harness.orchestrator.submitResponse(
        ticket,
        queryPage('ItemInventory', [itemRet({ id: 'A', name: 'Alpha' })]),
        '',
        ''
      );

      expect(progress).toBe(100);
      expect(await harness.orchestrator.getLastError(ticket)).toBe('No error');
    });
  });

  it('accepts any connector version and reports its own', async () => {
    harness = createHarness();
    expect(harness.orchestrator.clientVersion('2.3.0.36')).toBe('');
    expect(harness.orchestrator.serverVersion()).toBe('');
    expect(createTask({ entityType: 'Bill' }).requestSeq).toBe(1);
  });

  it('makes only unfiltered queries full refreshes by default', () => {
    harness = createHarness();
    expect(createTask({ entityType: 'Customer', fromModifiedDate: '1980-01-01' }).params.fullRefresh).toBe(true);
    expect(createTask({ entityType: 'Customer', fromModifiedDate: '2024-04-30' }).params.fullRefresh).toBe(false);
    expect(createTask({ entityType: 'ItemInventory', nameStartsWith: 'W' }).params.fullRefresh).toBe(false);
    expect(createTask({ entityType: 'Invoice', fromTxnDate: '2024-01-01' }).params.fullRefresh).toBe(false);
    expect(createTask({ entityType: 'Vendor', activeStatus: 'All' }).params.fullRefresh).toBe(true);
    expect(createTask({ entityType: 'Vendor', activeStatus: 'ActiveOnly' }).params.fullRefresh).toBe(false);
    expect(createTask({ entityType: 'Invoice', includeLineItems: true }).params.fullRefresh).toBe(true);
  });
});
