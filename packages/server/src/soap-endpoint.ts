/**
 * HTTP surface of the polling connector: SOAP calls on one path, plus health and metrics.
 */

import type { IncomingMessage, RequestListener, ServerResponse } from 'node:http';
import { ConnectorError, errorMessage, silentLogger, type Logger } from '@ledgerlink/core';
import {
  parseSoapCall,
  renderSoapFault,
  renderSoapResponse,
  type SoapCall,
  type SoapResult,
} from '@ledgerlink/qbxml';
import type { SessionOrchestrator } from '@ledgerlink/sync-engine';
import type { HttpConfig } from './config.js';
import type { Metrics } from './metrics.js';

export interface SoapReply {
  status: number;
  body: string;
}

export interface SoapEndpointOptions {
  metrics?: Metrics;
  logger?: Logger;
  clock?: () => number;
}

export class SoapEndpoint {
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(
    private readonly orchestrator: SessionOrchestrator,
    private readonly options: SoapEndpointOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger();
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Decode one SOAP request body, run the call and encode its result. Malformed envelopes and
   * unknown operations become client faults.
   */
  async handle(xml: string): Promise<SoapReply> {
    let call: SoapCall;
    try {
      call = await parseSoapCall(xml);
    } catch (err) {
      this.options.metrics?.incCall('invalid', 'error');
      this.logger.warn('Rejected SOAP request', { error: errorMessage(err), bytes: xml.length });
      return { status: 500, body: renderSoapFault(errorMessage(err)) };
    }

    const start = this.clock();
    try {
      const result = await this.dispatch(call);
      const durationMs = this.clock() - start;
      this.options.metrics?.incCall(call.method, 'success');
      this.options.metrics?.observeCallDuration(call.method, durationMs);
      this.logger.debug('Connector call completed', { method: call.method, durationMs });
      return { status: 200, body: renderSoapResponse(call.method, result) };
    } catch (err) {
      const durationMs = this.clock() - start;
      this.options.metrics?.incCall(call.method, 'error');
      this.options.metrics?.observeCallDuration(call.method, durationMs);
      this.logger.error('Connector call failed', { method: call.method, durationMs, error: err });
      const message = err instanceof ConnectorError ? err.toActionableMessage() : errorMessage(err);
      return { status: 500, body: renderSoapFault(message, 'soap:Server') };
    }
  }

  private async dispatch(call: SoapCall): Promise<SoapResult> {
    switch (call.method) {
      case 'authenticate':
        return this.orchestrator.authenticate(call.strUserName, call.strPassword);
      case 'sendRequestXML':
        return this.orchestrator.getNextRequest(call.ticket, {
          companyFile: call.strCompanyFileName,
          country: call.qbXMLCountry,
          majorVersion: call.qbXMLMajorVers,
          minorVersion: call.qbXMLMinorVers,
        });
      case 'receiveResponseXML':
        return this.orchestrator.submitResponse(call.ticket, call.response, call.hresult, call.message);
      case 'getLastError':
        return this.orchestrator.getLastError(call.ticket);
      case 'connectionError':
        return this.orchestrator.connectionError(call.ticket, call.hresult, call.message);
      case 'closeConnection':
        return this.orchestrator.close(call.ticket);
      case 'serverVersion':
        return this.orchestrator.serverVersion();
      case 'clientVersion':
        return this.orchestrator.clientVersion(call.strVersion);
    }
  }
}

export interface HttpListenerOptions {
  endpoint: SoapEndpoint;
  orchestrator: SessionOrchestrator;
  http: Pick<HttpConfig, 'path' | 'healthPath' | 'metricsPath' | 'maxRequestBytes'>;
  name: string;
  version: string;
  metrics?: Metrics;
  logger?: Logger;
}

class PayloadTooLarge extends Error {}

async function readBody(req: IncomingMessage, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk), 'utf8');
    size += buffer.length;
    if (size > limit) throw new PayloadTooLarge();
    chunks.push(buffer);
  }
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Request listener for `node:http`. Every route answers; failures end in a 500.
 */
export function createHttpListener(options: HttpListenerOptions): RequestListener {
  const logger = options.logger ?? silentLogger();
  const { path, healthPath, metricsPath, maxRequestBytes } = options.http;

  const send = (res: ServerResponse, status: number, body: string, contentType: string) => {
    res.writeHead(status, {
      'Content-Type': contentType,
      'X-Content-Type-Options': 'nosniff',
    });
    res.end(body);
  };
  const sendText = (res: ServerResponse, status: number, body: string) =>
    send(res, status, body, 'text/plain; charset=utf-8');

  const route = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    const url = new URL(req.url ?? '/', 'http://localhost');

    const contentLength = Number(req.headers['content-length'] ?? '0');
    if (Number.isFinite(contentLength) && contentLength > maxRequestBytes) {
      sendText(res, 413, 'Request entity too large');
      return;
    }

    if (req.method === 'GET' && url.pathname === healthPath) {
      const sessions = await options.orchestrator.status();
      send(
        res,
        200,
        JSON.stringify({ status: 'ok', name: options.name, version: options.version, sessions: sessions.length }),
        'application/json; charset=utf-8'
      );
      return;
    }

    if (req.method === 'GET' && url.pathname === metricsPath && options.metrics) {
      const sessions = await options.orchestrator.status();
      options.metrics.setActiveSessions(sessions.length);
      send(res, 200, options.metrics.render(), 'text/plain; version=0.0.4; charset=utf-8');
      return;
    }

    if (url.pathname === path) {
      if (req.method !== 'POST') {
        sendText(res, 405, 'Method not allowed');
        return;
      }
      let body: string;
      try {
        body = await readBody(req, maxRequestBytes);
      } catch (err) {
        if (err instanceof PayloadTooLarge) {
          sendText(res, 413, 'Request entity too large');
          return;
        }
        throw err;
      }
      const reply = await options.endpoint.handle(body);
      send(res, reply.status, reply.body, 'text/xml; charset=utf-8');
      return;
    }

    sendText(res, 404, 'Not found');
  };

  return (req, res) => {
    route(req, res).catch((err: unknown) => {
      logger.error('HTTP request failed', { path: req.url, error: err });
      if (!res.headersSent) {
        sendText(res, 500, 'Internal server error');
      } else {
        res.end();
      }
    });
  };
}
