import { describe, it, expect } from 'vitest';
import { InternalSelectionError, ManifestFormatError } from '../errors/index';
import { makeExposure, makeNode, makeSource } from '../testing/fixtures';
import { Manifest, loadManifest } from './index';

describe('Manifest', () => {
  const manifest = new Manifest([
    makeNode('orders'),
    makeNode('disabled', { enabled: false }),
    makeNode('ephemeral', { empty: true }),
    makeSource('raw', 'orders'),
    makeSource('raw', 'legacy', { enabled: false }),
    makeExposure('dashboard'),
    makeExposure('retired', { enabled: false }),
  ]);

  it('looks members up across all collections', () => {
    expect(manifest.lookup('model.shop.orders')?.memberKind).toBe('node');
    expect(manifest.lookup('source.shop.raw.orders')?.memberKind).toBe('source');
    expect(manifest.lookup('exposure.shop.dashboard')?.memberKind).toBe('exposure');
    expect(manifest.lookup('model.shop.nope')).toBeUndefined();
  });

  it('lookupNode ignores sources and exposures', () => {
    expect(manifest.lookupNode('model.shop.orders')?.name).toBe('orders');
    expect(manifest.lookupNode('source.shop.raw.orders')).toBeUndefined();
  });

  it('resolve throws an internal error for unknown ids', () => {
    expect(() => manifest.resolve('model.shop.nope')).toThrow(InternalSelectionError);
    expect(() => manifest.resolve('model.shop.nope')).toThrow('Node model.shop.nope not found in the manifest!');
  });

  it.each([
    ['model.shop.orders', true],
    ['model.shop.disabled', false],
    ['model.shop.ephemeral', false],
    ['source.shop.raw.orders', true],
    ['source.shop.raw.legacy', false],
    ['exposure.shop.dashboard', true],
    ['exposure.shop.retired', false],
  ])('isGraphMember(%s) is %s', (uniqueId, expected) => {
    expect(manifest.isGraphMember(uniqueId)).toBe(expected);
  });

  it('rejects duplicate ids', () => {
    expect(() => new Manifest([makeNode('a'), makeNode('a')])).toThrow(ManifestFormatError);
  });
});

describe('loadManifest', () => {
  it('fills defaults and derives package and fqn from the unique id', () => {
    const manifest = loadManifest({
      nodes: {
        'model.shop.orders': { name: 'orders', resourceType: 'model', dependsOn: ['source.shop.raw.orders'] },
      },
      sources: {
        'source.shop.raw.orders': { name: 'orders', sourceName: 'raw' },
      },
    });

    expect(manifest.size).toBe(2);
    expect(manifest.resolve('model.shop.orders')).toEqual({
      memberKind: 'node',
      uniqueId: 'model.shop.orders',
      name: 'orders',
      resourceType: 'model',
      packageName: 'shop',
      fqn: ['shop', 'orders'],
      path: '',
      tags: [],
      enabled: true,
      empty: false,
      dependsOn: ['source.shop.raw.orders'],
    });
    expect(manifest.resolve('source.shop.raw.orders').fqn).toEqual(['shop', 'raw', 'orders']);
  });

  it('reports every schema issue', () => {
    expect(() =>
      loadManifest({
        nodes: { 'model.shop.bad': { name: '', resourceType: 'widget' } },
      }),
    ).toThrow(ManifestFormatError);
  });

  it('lists the failing paths in the error', () => {
    try {
      loadManifest({ nodes: { 'model.shop.bad': { resourceType: 'model' } } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ManifestFormatError);
      if (error instanceof ManifestFormatError) {
        expect(error.issues).toEqual(['nodes.model.shop.bad.name: Required']);
      }
    }
  });

  it('rejects unknown keys', () => {
    expect(() => loadManifest({ models: {} })).toThrow(ManifestFormatError);
  });
});
