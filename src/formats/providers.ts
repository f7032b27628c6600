/**
 * Additional properties providers
 *
 * A format set can name a provider in `get_additional_props.function`;
 * the projector asks it for extra column values that the element's
 * properties and header don't carry directly.
 */

import { EgeriaElement } from '../types';
import { getLogger } from '../lib/logger';
import { rollUpRelated } from './values';

export interface AdditionalPropsProvider {
  readonly name: string;
  /** Extra values keyed by column key */
  extract(element: EgeriaElement, mode: string): Record<string, string>;
}

/**
 * Normalize a provider reference: `Class.method`, `_extract_x` and `x`
 * all name provider `x`.
 */
export function providerKey(reference: string): string {
  const method = reference.includes('.') ? reference.slice(reference.lastIndexOf('.') + 1) : reference;
  return method.replace(/^_extract_/, '').replace(/^_+/, '');
}

function rollUpField(element: EgeriaElement, field: string): string | undefined {
  const items = element[field];
  return Array.isArray(items) ? rollUpRelated(items) : undefined;
}

export const digitalProductProvider: AdditionalPropsProvider = {
  name: 'digital_product_properties',
  extract(element) {
    const values: Record<string, string> = {};
    const usedBy = rollUpField(element, 'usedByDigitalProducts');
    if (usedBy !== undefined) values.used_by_digital_products = usedBy;
    const uses = rollUpField(element, 'usesDigitalProducts');
    if (uses !== undefined) values.uses_digital_products = uses;
    return values;
  },
};

export const agreementProvider: AdditionalPropsProvider = {
  name: 'agreement_properties',
  extract(element) {
    const values: Record<string, string> = {};
    const items = rollUpField(element, 'agreementItems');
    if (items !== undefined) values.agreement_items = items;
    return values;
  },
};

export class ProviderRegistry {
  private providers = new Map<string, AdditionalPropsProvider>();

  constructor(providers: AdditionalPropsProvider[] = []) {
    providers.forEach(p => this.register(p));
  }

  register(provider: AdditionalPropsProvider): void {
    this.providers.set(providerKey(provider.name), provider);
  }

  /**
   * Provider for a format set's reference; unknown names are logged and
   * answered with undefined
   */
  resolve(reference: string): AdditionalPropsProvider | undefined {
    const provider = this.providers.get(providerKey(reference));
    if (!provider) {
      getLogger().debug(`No additional-properties provider named '${reference}'`);
    }
    return provider;
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

export function createDefaultProviders(): ProviderRegistry {
  return new ProviderRegistry([digitalProductProvider, agreementProvider]);
}
