import { describe, it, expect } from 'vitest';
import { InvalidSelectorError } from '../errors/index';
import { Manifest } from '../manifest/index';
import { makeExposure, makeNode, makeSource, makeTest } from '../testing/fixtures';
import { MethodRegistry, matchesQualifiedName } from './index';

const manifest = new Manifest([
  makeNode('stg_orders', { fqn: ['shop', 'staging', 'stg_orders'], path: 'models/staging/stg_orders.sql', tags: ['nightly'] }),
  makeNode('orders', { fqn: ['shop', 'marts', 'orders'], path: 'models/marts/orders.sql', tags: ['finance'] }),
  makeNode('seed_codes', { resourceType: 'seed', packageName: 'ref', fqn: ['ref', 'seed_codes'] }),
  makeTest('not_null_orders_id', ['model.shop.orders']),
  makeSource('raw', 'orders', { tags: ['nightly'] }),
  makeSource('stripe', 'payments'),
  makeExposure('revenue_dashboard'),
]);
const all = new Set(manifest.ids());
const registry = new MethodRegistry(manifest);

function search(method: string, value: string, included: ReadonlySet<string> = all): string[] {
  return [...registry.getMethod(method).search(included, value)].sort();
}

describe('matchesQualifiedName', () => {
  it.each([
    [['shop', 'marts', 'orders'], 'orders', true],
    [['shop', 'marts', 'orders'], 'shop.marts', true],
    [['shop', 'marts', 'orders'], 'shop.*.orders', true],
    [['shop', 'marts', 'orders'], 'shop.staging', false],
    [['shop', 'marts', 'orders'], 'shop.marts.orders.extra', false],
    [['shop', 'marts', 'orders'], '*', true],
  ] as const)('%j matches %s: %s', (fqn, selector, expected) => {
    expect(matchesQualifiedName(fqn, selector)).toBe(expected);
  });
});

describe('MethodRegistry', () => {
  it('fqn only matches executable nodes', () => {
    expect(search('fqn', 'orders')).toEqual(['model.shop.orders']);
    expect(search('fqn', 'shop.staging')).toEqual(['model.shop.stg_orders']);
  });

  it('only searches the included ids', () => {
    expect(search('fqn', '*', new Set(['model.shop.orders', 'source.shop.raw.orders']))).toEqual([
      'model.shop.orders',
    ]);
  });

  it('tag matches nodes and sources', () => {
    expect(search('tag', 'nightly')).toEqual(['model.shop.stg_orders', 'source.shop.raw.orders']);
  });

  it('resource_type matches the exact kind', () => {
    expect(search('resource_type', 'test')).toEqual(['test.shop.not_null_orders_id']);
    expect(search('resource_type', 'seed')).toEqual(['seed.shop.seed_codes']);
  });

  it('path matches directory prefixes and wildcards', () => {
    expect(search('path', 'models/staging')).toEqual(['model.shop.stg_orders']);
    expect(search('path', 'models/*/orders.sql')).toEqual(['model.shop.orders']);
  });

  it('package matches the package name', () => {
    expect(search('package', 'ref')).toEqual(['seed.shop.seed_codes']);
  });

  it('source accepts one, two or three parts', () => {
    expect(search('source', 'raw')).toEqual(['source.shop.raw.orders']);
    expect(search('source', '*.payments')).toEqual(['source.shop.stripe.payments']);
    expect(search('source', 'shop.stripe.*')).toEqual(['source.shop.stripe.payments']);
    expect(() => search('source', 'a.b.c.d')).toThrow(InvalidSelectorError);
  });

  it('exposure matches by name or package-qualified name', () => {
    expect(search('exposure', 'revenue_dashboard')).toEqual(['exposure.shop.revenue_dashboard']);
    expect(search('exposure', 'shop.*')).toEqual(['exposure.shop.revenue_dashboard']);
  });

  it('throws for unknown methods', () => {
    expect(() => registry.getMethod('colour')).toThrow(InvalidSelectorError);
  });

  it('accepts custom methods with their arguments', () => {
    const custom = new MethodRegistry(manifest).register('name_length', (target, args) => ({
      search(included, value) {
        const limit = Number(value) + Number(args['offset'] ?? 0);
        return new Set(
          [...included].filter((uniqueId) => (target.lookup(uniqueId)?.name.length ?? 0) <= limit),
        );
      },
    }));

    expect(custom.methodNames()).toContain('name_length');
    expect([...custom.getMethod('name_length', { offset: '1' }).search(all, '5')].sort()).toEqual([
      'model.shop.orders',
      'source.shop.raw.orders',
    ]);
  });
});
