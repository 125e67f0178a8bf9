/**
 * Odoo domain helpers
 *
 * Odoo domains: [['field', 'operator', 'value'], ...], AND-ed by default, with prefix
 * '|' / '&' / '!' operators for anything else.
 */

/** Odoo domain tuple: [field, operator, value] */
export type OdooDomainTuple = [string, string, unknown];

export type OdooDomainOperator = '|' | '&' | '!';

export type OdooDomain = Array<OdooDomainTuple | OdooDomainOperator>;

export function eq(field: string, value: unknown): OdooDomainTuple {
  return [field, '=', value];
}

export function ilike(field: string, value: string): OdooDomainTuple {
  return [field, 'ilike', value];
}

/** Case-insensitive exact match */
export function eqIgnoreCase(field: string, value: string): OdooDomainTuple {
  return [field, '=ilike', value];
}

/** Either of two conditions */
export function either(a: OdooDomainTuple, b: OdooDomainTuple): OdooDomain {
  return ['|', a, b];
}

export function isIn(field: string, values: unknown[]): OdooDomainTuple {
  return [field, 'in', values];
}

/**
 * Id of a many2one value. Odoo reads them as `[id, display_name]`, writes them as a bare id,
 * and reports an empty one as `false`.
 */
export function many2oneId(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (Array.isArray(value) && typeof value[0] === 'number') return value[0];
  return undefined;
}

/**
 * Orderings under which a person's name may be stored. The desktop system keeps
 * "Last, First" where the ERP usually keeps "First Last".
 */
export function personNameVariants(name: string, firstName?: string, lastName?: string): string[] {
  const variants = [name.trim()];
  const first = firstName?.trim();
  const last = lastName?.trim();

  if (first && last) {
    variants.push(`${last}, ${first}`, `${first} ${last}`);
  } else {
    const comma = /^([^,]+),\s*(.+)$/.exec(name.trim());
    if (comma?.[1] && comma[2]) {
      variants.push(`${comma[2].trim()} ${comma[1].trim()}`);
    } else {
      const words = name.trim().split(/\s+/);
      if (words.length === 2 && words[0] && words[1]) {
        variants.push(`${words[1]}, ${words[0]}`);
      }
    }
  }

  return [...new Set(variants.filter((v) => v.length > 0))];
}
