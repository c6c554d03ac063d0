/**
 * Warden Kernel — Capability Bundle Tests
 *
 * Covers the capability operations every provider exposes:
 * - declaration wins over confines, and accumulates
 * - capabilities() is sorted and duplicate-free
 * - satisfies() is vacuously true and short-circuits on a missing name
 * - extendConfine() on an unknown capability throws and creates nothing
 * - per-provider isolation of extended confines
 * - one memoized bundle per type
 */

import { describe, it, expect } from 'vitest';
import { DefinitionError, MemoryEnvironment, NULL_ENVIRONMENT } from '@warden/confine';
import {
  CapabilityBundleRegistry,
  ConfinementLogger,
  ResourceType,
  type ConfinementEvent,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

type PackageFeature = 'installable' | 'upgradeable' | 'holdable';

class AptImplementation {
  install(): string {
    return 'installed';
  }

  update(): string {
    return 'updated';
  }
}

function packageType(logger?: ConfinementLogger): ResourceType<PackageFeature> {
  return new ResourceType<PackageFeature>('package', { logger })
    .feature('upgradeable', 'Can upgrade.', { methods: ['update'] })
    .feature('installable', 'Can install.', { methods: ['install'] })
    .feature('holdable', 'Can hold.', { methods: ['hold'] });
}

// ---------------------------------------------------------------------------
// Bundle registry
// ---------------------------------------------------------------------------

describe('CapabilityBundleRegistry', () => {
  it('builds one bundle per type and reuses it', () => {
    const registry = new CapabilityBundleRegistry();
    const type = packageType();

    const first = registry.bundleFor(type);
    expect(registry.bundleFor(type)).toBe(first);
    expect(registry.has('package')).toBe(true);
  });

  it('refuses a different type object under a name already in use', () => {
    const registry = new CapabilityBundleRegistry();
    registry.bundleFor(packageType());
    expect(() => registry.bundleFor(packageType())).toThrow(DefinitionError);
  });

  it('forgets every bundle on clear()', () => {
    const registry = new CapabilityBundleRegistry();
    const type = packageType();
    const first = registry.bundleFor(type);

    registry.clear();

    expect(registry.has('package')).toBe(false);
    expect(registry.bundleFor(type)).not.toBe(first);
  });

  it('records a bundle.built event with the sorted capability names', () => {
    const events: ConfinementEvent[] = [];
    const logger = new ConfinementLogger(
      { append: (event) => events.push(event) },
      () => '2026-01-01T00:00:00.000Z',
    );
    new CapabilityBundleRegistry().bundleFor(packageType(logger));

    expect(events.filter((e) => e.event === 'bundle.built')).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        event: 'bundle.built',
        type: 'package',
        names: ['holdable', 'installable', 'upgradeable'],
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

describe('ProviderCapabilities queries', () => {
  it('lists capability names alphabetically', () => {
    const bundle = new CapabilityBundleRegistry().bundleFor(packageType());
    expect(bundle.names()).toEqual(['holdable', 'installable', 'upgradeable']);
  });

  it('reports capabilities whose confines pass against the provider class', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);

    expect(apt.hasCapability('installable')).toBe(true);
    expect(apt.hasCapability('holdable')).toBe(false);
    expect(apt.capabilities()).toEqual(['installable', 'upgradeable']);
  });

  it('reports nothing without a subject to inspect', () => {
    const bare = new CapabilityBundleRegistry().bundleFor(packageType()).bind('bare');
    expect(bare.capabilities()).toEqual([]);
  });

  it('treats unknown names as absent', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);
    expect(apt.hasCapability('purgeable')).toBe(false);
  });

  it('is vacuously satisfied by no names', () => {
    const bare = new CapabilityBundleRegistry().bundleFor(packageType()).bind('bare');
    expect(bare.satisfies()).toBe(true);
  });

  it('is not satisfied when one of several names is missing', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);
    expect(apt.satisfies('installable', 'upgradeable')).toBe(true);
    expect(apt.satisfies(['installable', 'holdable'], 'upgradeable')).toBe(false);
  });

  it('evaluates a view against an instance', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);
    const instance = { install: (): string => 'installed', hold: (): string => 'held' };

    expect(apt.view(instance).capabilities()).toEqual(['holdable', 'installable']);
    expect(apt.capabilities()).toEqual(['installable', 'upgradeable']);
  });
});

describe('ProviderCapabilities predicates', () => {
  it('returns a predicate that re-evaluates on every call', () => {
    const type = new ResourceType('service');
    let running = false;
    type.feature('refreshable', 'Can refresh.', { true: () => running });
    const provider = new CapabilityBundleRegistry().bundleFor(type).bind('systemd');

    const refreshable = provider.predicate('refreshable');
    expect(refreshable()).toBe(false);
    running = true;
    expect(refreshable()).toBe(true);
  });

  it('refuses a predicate for a capability the type does not declare', () => {
    const provider = new CapabilityBundleRegistry().bundleFor(new ResourceType('service')).bind('x');
    expect(() => provider.predicate('enableable')).toThrow(DefinitionError);
  });

  it('returns one predicate per capability in name order', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);
    const predicates = apt.predicates();

    expect([...predicates.keys()]).toEqual(['holdable', 'installable', 'upgradeable']);
    expect([...predicates.values()].map((predicate) => predicate())).toEqual([false, true, true]);
  });
});

// ---------------------------------------------------------------------------
// Declarations
// ---------------------------------------------------------------------------

describe('ProviderCapabilities.declareCapabilities', () => {
  it('wins over failing confines', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);

    apt.declareCapabilities('holdable');

    expect(apt.hasCapability('holdable')).toBe(true);
    expect(apt.capabilities()).toEqual(['holdable', 'installable', 'upgradeable']);
  });

  it('accumulates across calls and ignores repeats', () => {
    const bare = new CapabilityBundleRegistry().bundleFor(packageType()).bind('bare');

    bare.declareCapabilities('holdable');
    bare.declareCapabilities(['installable', 'holdable']);

    expect(bare.declared()).toEqual(['holdable', 'installable']);
    expect(bare.capabilities()).toEqual(['holdable', 'installable']);
  });

  it('stores names in canonical form', () => {
    const bare = new CapabilityBundleRegistry().bundleFor(packageType()).bind('bare');
    bare.declareCapabilities(' holdable ');
    expect(bare.isDeclared('holdable')).toBe(true);
    expect(bare.hasCapability('holdable')).toBe(true);
  });

  it('answers true for a declared name the type does not know, without listing it', () => {
    const bare = new CapabilityBundleRegistry().bundleFor(packageType()).bind('bare');
    bare.declareCapabilities('purgeable');
    expect(bare.hasCapability('purgeable')).toBe(true);
    expect(bare.capabilities()).toEqual([]);
  });

  it('does not leak to other providers of the type', () => {
    const bundle = new CapabilityBundleRegistry().bundleFor(packageType());
    const apt = bundle.bind('apt', AptImplementation);
    const dpkg = bundle.bind('dpkg', AptImplementation);

    apt.declareCapabilities('holdable');

    expect(dpkg.hasCapability('holdable')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Extension
// ---------------------------------------------------------------------------

describe('ProviderCapabilities.extendConfine', () => {
  it('appends confines to the provider copy only', () => {
    const type = packageType();
    const bundle = new CapabilityBundleRegistry().bundleFor(type);
    const apt = bundle.bind('apt', AptImplementation);
    const dpkg = bundle.bind('dpkg', AptImplementation);

    apt.extendConfine('installable', { false: true });

    expect(apt.hasCapability('installable')).toBe(false);
    expect(apt.collection('installable')?.size).toBe(2);
    expect(dpkg.hasCapability('installable')).toBe(true);
    expect(type.features.providerFeature('installable')?.size).toBe(1);
    expect(bundle.cloneCollections().get('installable')?.size).toBe(1);
  });

  it('throws for an unknown capability and never creates it', () => {
    const apt = new CapabilityBundleRegistry().bundleFor(packageType()).bind('apt', AptImplementation);

    expect(() => apt.extendConfine('purgeable', { true: true })).toThrow(DefinitionError);
    expect(() => apt.extendConfine('purgeable', { true: true })).toThrow(
      'Unable to find capability purgeable',
    );
    expect(apt.collection('purgeable')).toBeUndefined();
    expect(apt.hasCapability('purgeable')).toBe(false);
  });

  it('records confine.extended and capability.declared events', () => {
    const events: ConfinementEvent[] = [];
    const logger = new ConfinementLogger(
      { append: (event) => events.push(event) },
      () => '2026-01-01T00:00:00.000Z',
    );
    const apt = new CapabilityBundleRegistry().bundleFor(packageType(logger)).bind('apt');

    apt.extendConfine('holdable', { osfamily: 'debian' });
    apt.declareCapabilities('upgradeable');

    expect(events.slice(-2)).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        event: 'confine.extended',
        type: 'package',
        provider: 'apt',
        names: ['holdable'],
        detail: { confines: 2 },
      },
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        event: 'capability.declared',
        type: 'package',
        provider: 'apt',
        names: ['upgradeable'],
      },
    ]);
  });
});

// ---------------------------------------------------------------------------
// End-to-end scenario
// ---------------------------------------------------------------------------

describe('feature guarded by a true confine', () => {
  it('follows the confines until the provider declares the feature', () => {
    const type = new ResourceType('T', { environment: NULL_ENVIRONMENT });
    type.feature('f', 'Feature f.', { true: false });
    const p1 = new CapabilityBundleRegistry().bundleFor(type).bind('P1');

    expect(p1.hasCapability('f')).toBe(false);

    p1.extendConfine('f', { true: true });
    expect(p1.hasCapability('f')).toBe(false);

    p1.declareCapabilities('f');
    expect(p1.hasCapability('f')).toBe(true);
  });

  it('turns a passing feature off with an appended failing confine', () => {
    const type = new ResourceType('T');
    type.feature('f', 'Feature f.', { true: true });
    const p1 = new CapabilityBundleRegistry().bundleFor(type).bind('P1');

    expect(p1.hasCapability('f')).toBe(true);

    p1.extendConfine('f', { false: true });
    expect(p1.hasCapability('f')).toBe(false);

    p1.declareCapabilities('f');
    expect(p1.hasCapability('f')).toBe(true);
  });

  it('never reports a feature declared without confines unless declared', () => {
    const type = new ResourceType('T', { environment: new MemoryEnvironment() });
    type.feature('f', 'Feature f.');
    const bundle = new CapabilityBundleRegistry().bundleFor(type);
    const p1 = bundle.bind('P1');
    const p2 = bundle.bind('P2');

    p2.declareCapabilities('f');

    expect(p1.hasCapability('f')).toBe(false);
    expect(p2.hasCapability('f')).toBe(true);
  });
});
