import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConnectorError } from '@ledgerlink/core';
import { OdooClient, classifyFault } from '../src/index.js';

function rpcResponse(payload: { result?: unknown; error?: unknown }): Response {
  return new Response(JSON.stringify({ jsonrpc: '2.0', id: 1, ...payload }), {
    status: 200,
    headers: { 'Content-Type': 'application/json' },
  });
}

const SESSION_EXPIRED = {
  code: 100,
  message: 'Odoo Session Expired',
  data: { name: 'odoo.http.SessionExpiredException', message: 'Session expired' },
};

describe('OdooClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  function sentArgs(call: number): unknown[] {
    const body: { params: { args: unknown[] } } = JSON.parse(String(fetchMock.mock.calls[call]?.[1]?.body));
    return body.params.args;
  }

  function client(): OdooClient {
    return new OdooClient({
      url: 'http://odoo.test/',
      database: 'books',
      username: 'sync@example.test',
      password: 'test-secret',
    });
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('logs in lazily and sends execute_kw calls with the uid', async () => {
    fetchMock
      .mockResolvedValueOnce(rpcResponse({ result: 7 }))
      .mockResolvedValueOnce(rpcResponse({ result: [{ id: 3, name: 'Acme' }] }));

    const rows = await client().searchRead('res.partner', [['name', '=', 'Acme']], { fields: ['id'], limit: 1 });

    expect(rows).toEqual([{ id: 3, name: 'Acme' }]);
    expect(fetchMock.mock.calls[0]?.[0]).toBe('http://odoo.test/jsonrpc');
    expect(sentArgs(0)).toEqual(['books', 'sync@example.test', 'test-secret', {}]);
    expect(sentArgs(1)).toEqual([
      'books',
      7,
      'test-secret',
      'res.partner',
      'search_read',
      [[['name', '=', 'Acme']]],
      { fields: ['id'], limit: 1 },
    ]);
  });

  it('logs in again once when the session expired', async () => {
    fetchMock
      .mockResolvedValueOnce(rpcResponse({ result: 7 }))
      .mockResolvedValueOnce(rpcResponse({ error: SESSION_EXPIRED }))
      .mockResolvedValueOnce(rpcResponse({ result: 8 }))
      .mockResolvedValueOnce(rpcResponse({ result: 42 }));

    const id = await client().create('res.partner', { name: 'Acme' });

    expect(id).toBe(42);
    expect(fetchMock).toHaveBeenCalledTimes(4);
    expect(sentArgs(3)[1]).toBe(8);
  });

  it('gives up when the retry fails as well', async () => {
    fetchMock
      .mockResolvedValueOnce(rpcResponse({ result: 7 }))
      .mockResolvedValueOnce(rpcResponse({ error: SESSION_EXPIRED }))
      .mockResolvedValueOnce(rpcResponse({ result: 8 }))
      .mockResolvedValueOnce(rpcResponse({ error: SESSION_EXPIRED }));

    await expect(client().write('res.partner', [1], { name: 'Acme' })).rejects.toMatchObject({
      code: 'SESSION_EXPIRED',
    });
    expect(fetchMock).toHaveBeenCalledTimes(4);
  });

  it('does not retry other faults', async () => {
    fetchMock.mockResolvedValueOnce(rpcResponse({ result: 7 })).mockResolvedValueOnce(
      rpcResponse({
        error: { code: 200, message: 'Odoo Server Error', data: { name: 'builtins.ValueError', message: "Invalid field 'foo'" } },
      })
    );

    await expect(client().searchRead('res.partner', [['foo', '=', 1]])).rejects.toMatchObject({
      code: 'RPC_FAULT',
      message: "Odoo error: Invalid field 'foo'",
    });
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects a failed login', async () => {
    fetchMock.mockResolvedValueOnce(rpcResponse({ result: false }));

    await expect(client().authenticate()).rejects.toMatchObject({ code: 'AUTHENTICATION_FAILED' });
  });

  it('rejects results of the wrong shape', async () => {
    fetchMock.mockResolvedValueOnce(rpcResponse({ result: 7 })).mockResolvedValueOnce(rpcResponse({ result: 'yes' }));

    await expect(client().create('res.partner', { name: 'Acme' })).rejects.toMatchObject({
      code: 'RPC_FAULT',
      message: 'Unexpected result from res.partner.create',
    });
  });

  it('maps HTTP errors to connection failures', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad gateway', { status: 502, statusText: 'Bad Gateway' }));

    await expect(client().authenticate()).rejects.toMatchObject({
      code: 'CONNECTION_FAILED',
      message: 'HTTP 502: Bad Gateway',
    });
  });
});

describe('classifyFault', () => {
  it('treats denied access as an authentication fault', () => {
    const err = classifyFault({
      code: 200,
      message: 'Odoo Server Error',
      data: { name: 'odoo.exceptions.AccessDenied', message: 'Access Denied' },
    });
    expect(err).toBeInstanceOf(ConnectorError);
    expect(err.code).toBe('AUTHENTICATION_FAILED');
  });

  it('treats code 100 as an expired session', () => {
    expect(classifyFault({ code: 100, message: 'Odoo Session Expired' }).code).toBe('SESSION_EXPIRED');
  });
});
