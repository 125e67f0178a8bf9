/**
 * Reference Resolver
 *
 * Turns human-readable names (country, state, payment term, tax, product category) into ERP ids
 * with read-only searches. Each lookup walks an explicit chain of strategies; the strategy that
 * matched, or the fact that none did, is logged so a misassignment is always visible.
 */

import { silentLogger, type Logger } from '@ledgerlink/core';
import type { OdooRpc } from './client.js';
import { either, eq, eqIgnoreCase, type OdooDomain } from './domain.js';

export type ReferenceKind = 'country' | 'state' | 'paymentTerm' | 'tax' | 'category';

export interface ResolveContext {
  /** Narrows state lookups */
  countryId?: number;
  /** Narrows tax lookups */
  taxScope?: 'sale' | 'purchase';
}

interface Strategy {
  /** Logged as `via` */
  name: string;
  model: string;
  domain: OdooDomain;
}

export class ReferenceResolver {
  private readonly cache = new Map<string, number | null>();
  private readonly logger: Logger;

  constructor(
    private readonly rpc: OdooRpc,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger();
  }

  async resolve(kind: ReferenceKind, name: string | undefined, context: ResolveContext = {}): Promise<number | undefined> {
    const value = name?.trim();
    if (!value) return undefined;

    const cacheKey = `${kind}:${value.toLowerCase()}:${context.countryId ?? ''}:${context.taxScope ?? ''}`;
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) return cached ?? undefined;

    const strategies = this.strategies(kind, value, context);
    for (const [index, strategy] of strategies.entries()) {
      const rows = await this.rpc.searchRead(strategy.model, strategy.domain, { fields: ['id'], limit: 1 });
      const id = rows[0]?.['id'];
      if (typeof id !== 'number') continue;

      if (index === 0) {
        this.logger.debug('Reference resolved', { kind, name: value, id, via: strategy.name });
      } else {
        this.logger.warn('Reference resolved by fallback', {
          kind,
          name: value,
          id,
          via: strategy.name,
          tried: strategies.slice(0, index).map((s) => s.name),
        });
      }
      this.cache.set(cacheKey, id);
      return id;
    }

    this.logger.warn('Reference not found', { kind, name: value, tried: strategies.map((s) => s.name) });
    this.cache.set(cacheKey, null);
    return undefined;
  }

  country(name: string | undefined): Promise<number | undefined> {
    return this.resolve('country', name);
  }

  state(name: string | undefined, countryId?: number): Promise<number | undefined> {
    return this.resolve('state', name, { countryId });
  }

  paymentTerm(name: string | undefined): Promise<number | undefined> {
    return this.resolve('paymentTerm', name);
  }

  tax(name: string | undefined, taxScope?: 'sale' | 'purchase'): Promise<number | undefined> {
    return this.resolve('tax', name, { taxScope });
  }

  category(name: string | undefined): Promise<number | undefined> {
    return this.resolve('category', name);
  }

  private strategies(kind: ReferenceKind, value: string, context: ResolveContext): Strategy[] {
    switch (kind) {
      case 'country': {
        const domain = /^[A-Za-z]{2}$/.test(value)
          ? either(eq('code', value.toUpperCase()), eqIgnoreCase('name', value))
          : [eqIgnoreCase('name', value)];
        return [{ name: 'code_or_name', model: 'res.country', domain }];
      }
      case 'state': {
        const model = 'res.country.state';
        const codeOrName = either(eqIgnoreCase('code', value), eqIgnoreCase('name', value));
        const anyCountry: Strategy = { name: 'any_country', model, domain: codeOrName };
        if (context.countryId === undefined) return [anyCountry];
        return [
          { name: 'in_country', model, domain: [...codeOrName, eq('country_id', context.countryId)] },
          anyCountry,
        ];
      }
      case 'paymentTerm':
        return [{ name: 'name', model: 'account.payment.term', domain: [eqIgnoreCase('name', value)] }];
      case 'tax': {
        const byName = eqIgnoreCase('name', value);
        const anyScope: Strategy = { name: 'name', model: 'account.tax', domain: [byName] };
        if (!context.taxScope) return [anyScope];
        return [
          { name: 'name_in_scope', model: 'account.tax', domain: [byName, eq('type_tax_use', context.taxScope)] },
          anyScope,
        ];
      }
      case 'category':
        return [
          { name: 'complete_name', model: 'product.category', domain: [eqIgnoreCase('complete_name', value)] },
          { name: 'name', model: 'product.category', domain: [eqIgnoreCase('name', value)] },
        ];
    }
  }
}
