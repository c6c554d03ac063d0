/**
 * Warden Provider Loader — Type Registry Tests
 *
 * Covers type and provider registration, declaration validation, the
 * provider source used by feature documentation, and suitability reports.
 *
 * Host state comes from MemoryEnvironment; no I/O.
 */

import { describe, it, expect } from 'vitest';
import { DefinitionError, MemoryEnvironment } from '@warden/confine';
import { ConfinementLogger, Provider, ResourceType, type ConfinementEvent } from '@warden/kernel';
import {
  ProviderValidator,
  TypeRegistry,
  buildSuitabilityReport,
  suitableProviders,
} from '../src/index.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

type ServiceFeature = 'refreshable' | 'enableable';

const env = new MemoryEnvironment({
  facts: { kernel: 'Linux' },
  binaries: { systemctl: '/usr/bin/systemctl' },
});

class SystemdProvider extends Provider<ServiceFeature> {
  restart(): string {
    return 'restarted';
  }
}

function serviceType(logger?: ConfinementLogger): ResourceType<ServiceFeature> {
  return new ResourceType<ServiceFeature>('service', { environment: env, logger })
    .feature('refreshable', 'The provider can restart the service.', { methods: ['restart'] })
    .feature('enableable', 'The provider can enable the service at boot.');
}

function registryWithService(logger?: ConfinementLogger): {
  registry: TypeRegistry;
  type: ResourceType<ServiceFeature>;
} {
  const registry = new TypeRegistry();
  const type = registry.registerType(serviceType(logger));
  registry.registerProvider(type, {
    name: 'systemd',
    implementation: SystemdProvider,
    confines: [{ kernel: 'linux' }, { exists: 'systemctl', for_binary: true }],
    capabilities: ['enableable'],
  });
  registry.registerProvider(type, {
    name: 'launchd',
    confines: [{ kernel: 'darwin' }],
  });
  registry.registerProvider(type, { name: 'base' });
  return { registry, type };
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

describe('TypeRegistry types', () => {
  it('registers and lists types by name', () => {
    const registry = new TypeRegistry();
    const service = registry.registerType(serviceType());
    registry.registerType(new ResourceType('package'));

    expect(registry.getType('service')).toBe(service);
    expect(registry.getType('cron')).toBeUndefined();
    expect(registry.listTypes()).toEqual(['package', 'service']);
  });

  it('refuses a second type with the same name', () => {
    const registry = new TypeRegistry();
    registry.registerType(serviceType());
    expect(() => registry.registerType(serviceType())).toThrow(
      'Resource type service is already registered',
    );
  });
});

// ---------------------------------------------------------------------------
// Providers
// ---------------------------------------------------------------------------

describe('TypeRegistry providers', () => {
  it('lists providers sorted by name', () => {
    const { registry } = registryWithService();
    expect(registry.providers('service')).toEqual(['base', 'launchd', 'systemd']);
    expect(registry.providers('cron')).toEqual([]);
  });

  it('applies confines, declared capabilities and the implementation', () => {
    const { registry } = registryWithService();
    const systemd = registry.provider('service', 'systemd');

    expect(systemd?.suitable()).toBe(true);
    expect(systemd?.subject).toBe(SystemdProvider);
    expect(systemd?.queries.capabilities()).toEqual(['enableable', 'refreshable']);
  });

  it('applies per-capability confines to that provider only', () => {
    const { registry, type } = registryWithService();
    const upstart = registry.registerProvider(type, {
      name: 'upstart',
      implementation: SystemdProvider,
      featureConfines: { refreshable: { exists: '/sbin/initctl' } },
    });

    expect(upstart.hasCapability('refreshable')).toBe(false);
    expect(registry.provider('service', 'systemd')?.queries.hasCapability('refreshable')).toBe(true);
  });

  it('applies a confine for every feature named in featureConfines', () => {
    const events: ConfinementEvent[] = [];
    const logger = new ConfinementLogger(
      { append: (event) => events.push(event) },
      () => '2026-01-01T00:00:00.000Z',
    );
    const { registry, type } = registryWithService(logger);
    const sysv = registry.registerProvider(type, {
      name: 'sysv',
      implementation: SystemdProvider,
      featureConfines: {
        enableable: { exists: '/usr/sbin/update-rc.d' },
        refreshable: { false: true },
      },
    });

    expect(
      events
        .filter((e) => e.provider === 'sysv' && e.event === 'confine.extended')
        .flatMap((e) => e.names ?? [])
        .sort(),
    ).toEqual(['enableable', 'refreshable']);
    expect(sysv.hasCapability('refreshable')).toBe(false);
  });

  it('refuses a duplicate provider name', () => {
    const { registry, type } = registryWithService();
    expect(() => registry.registerProvider(type, { name: 'systemd' })).toThrow(
      'Provider systemd is already registered for service',
    );
  });

  it('refuses a type object that is not the registered one', () => {
    const { registry } = registryWithService();
    expect(() => registry.registerProvider(serviceType(), { name: 'sysv' })).toThrow(
      'Resource type service is not registered',
    );
  });

  it('rejects an invalid declaration and leaves the registry unchanged', () => {
    const registry = new TypeRegistry();
    const type = registry.registerType(new ResourceType('service', { environment: env }));
    type.feature('refreshable', 'Can restart.');

    expect(() =>
      registry.registerProvider(type, { name: 'sysv', capabilities: ['purgeable'] }),
    ).toThrow(
      'Invalid provider declaration sysv for service:\n' +
        '  Declared capability "purgeable" is not a feature of service',
    );
    expect(registry.providers('service')).toEqual([]);
  });

  it('records a provider.registered event', () => {
    const events: ConfinementEvent[] = [];
    const logger = new ConfinementLogger(
      { append: (event) => events.push(event) },
      () => '2026-01-01T00:00:00.000Z',
    );
    registryWithService(logger);

    expect(events.filter((e) => e.event === 'provider.registered').map((e) => e.provider)).toEqual([
      'systemd',
      'launchd',
      'base',
    ]);
    expect(events.find((e) => e.provider === 'systemd' && e.event === 'provider.registered')?.detail).toEqual({
      confines: 2,
    });
  });

  it('hands out the shared bundle of a type', () => {
    const { registry } = registryWithService();
    expect(registry.bundleFor('service')?.names()).toEqual(['enableable', 'refreshable']);
    expect(registry.bundleFor('cron')).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Documentation
// ---------------------------------------------------------------------------

describe('TypeRegistry.providerSource', () => {
  it('feeds the provider matrix of the feature documentation', () => {
    const { registry, type } = registryWithService();

    expect(type.documentation(registry.providerSource('service'))).toBe(
      '- *enableable*: The provider can enable the service at boot.\n' +
        '- *refreshable*: The provider can restart the service.\n' +
        '\n' +
        '| Provider | enableable | refreshable |\n' +
        '| -------- | ---------- | ----------- |\n' +
        '| base     |            |             |\n' +
        '| launchd  |            |             |\n' +
        '| systemd  | *X*        | *X*         |\n',
    );
  });
});

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe('ProviderValidator', () => {
  it('accepts a declaration naming known features', () => {
    expect(
      new ProviderValidator().validateDeclaration(serviceType(), {
        name: 'systemd',
        capabilities: ['enableable'],
        featureConfines: { refreshable: { true: true } },
      }),
    ).toEqual({ ok: true });
  });

  it('reports every problem', () => {
    const type = new ResourceType('service');
    type.feature('refreshable', 'Can restart.');

    expect(
      new ProviderValidator().validateDeclaration(type, {
        name: ' ',
        capabilities: ['enableable'],
        featureConfines: { purgeable: { true: true } },
        confines: [{ kernel: 'linux' }, {}],
      }),
    ).toEqual({
      ok: false,
      errors: [
        { message: 'Provider name must be a non-empty string', context: 'type: service, provider:  ' },
        {
          message: 'Declared capability "enableable" is not a feature of service',
          context: 'type: service, provider:  ',
        },
        {
          message: 'Feature confines for "purgeable", which is not a feature of service',
          context: 'type: service, provider:  ',
        },
        { message: 'Provider confine #2 is empty', context: 'type: service, provider:  ' },
      ],
    });
  });
});

// ---------------------------------------------------------------------------
// Suitability
// ---------------------------------------------------------------------------

describe('buildSuitabilityReport', () => {
  it('reports every provider with its reasons', () => {
    const { registry } = registryWithService();

    expect(buildSuitabilityReport(registry, 'service')).toEqual({
      type: 'service',
      providers: [
        { provider: 'base', suitable: true, summary: {}, failures: [], capabilities: [] },
        {
          provider: 'launchd',
          suitable: false,
          summary: { variable: { kernel: ['darwin'] } },
          failures: ["service::launchd: fact value 'Linux' for 'kernel' not in required list 'darwin'"],
          capabilities: [],
        },
        {
          provider: 'systemd',
          suitable: true,
          summary: {},
          failures: [],
          capabilities: ['enableable', 'refreshable'],
        },
      ],
    });
  });

  it('records unsuitable providers', () => {
    const events: ConfinementEvent[] = [];
    const logger = new ConfinementLogger(
      { append: (event) => events.push(event) },
      () => '2026-01-01T00:00:00.000Z',
    );
    const { registry } = registryWithService(logger);

    buildSuitabilityReport(registry, 'service');

    expect(events.filter((e) => e.event === 'provider.unsuitable')).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        event: 'provider.unsuitable',
        type: 'service',
        provider: 'launchd',
        detail: { summary: { variable: { kernel: ['darwin'] } } },
      },
    ]);
  });

  it('refuses an unknown type', () => {
    expect(() => buildSuitabilityReport(new TypeRegistry(), 'cron')).toThrow(DefinitionError);
  });
});

describe('suitableProviders', () => {
  it('names the suitable providers', () => {
    const { registry } = registryWithService();
    expect(suitableProviders(registry, 'service')).toEqual(['base', 'systemd']);
  });
});
