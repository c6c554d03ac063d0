/**
 * Warden First-Party Package Module — Providers
 *
 * Provider classes for the package type. A provider plans the command
 * line for an operation; it never runs it. Which operations a class
 * implements decides which methods-guarded features it has.
 */

import { Provider } from '@warden/kernel';
import type { PackageFeature } from './type.js';

/** An argv vector, program first. */
export type PackageCommand = ReadonlyArray<string>;

abstract class PackageProvider extends Provider<PackageFeature> {
  /** Without a version the provider's default candidate is installed. */
  abstract install(name: string, version?: string): PackageCommand;
  abstract query(name: string): PackageCommand;
}

export class AptProvider extends PackageProvider {
  install(name: string, version?: string): PackageCommand {
    return ['apt-get', '-q', '-y', 'install', version === undefined ? name : `${name}=${version}`];
  }

  uninstall(name: string): PackageCommand {
    return ['apt-get', '-q', '-y', 'remove', name];
  }

  purge(name: string): PackageCommand {
    return ['apt-get', '-q', '-y', 'purge', name];
  }

  update(name: string): PackageCommand {
    return this.install(name);
  }

  latest(name: string): PackageCommand {
    return ['apt-cache', 'policy', name];
  }

  query(name: string): PackageCommand {
    return ['dpkg-query', '-W', '--showformat', '${Status} ${Version}\\n', name];
  }

  hold(name: string): PackageCommand {
    return ['apt-mark', 'hold', name];
  }

  unhold(name: string): PackageCommand {
    return ['apt-mark', 'unhold', name];
  }
}

export class YumProvider extends PackageProvider {
  install(name: string, version?: string): PackageCommand {
    return ['yum', '-d', '0', '-e', '0', '-y', 'install', version === undefined ? name : `${name}-${version}`];
  }

  uninstall(name: string): PackageCommand {
    return ['yum', '-y', 'erase', name];
  }

  update(name: string): PackageCommand {
    return ['yum', '-y', 'update', name];
  }

  latest(name: string): PackageCommand {
    return ['yum', '-q', 'list', 'available', name];
  }

  query(name: string): PackageCommand {
    return ['rpm', '-q', name];
  }

  // Needs the versionlock plugin; see the holdable confine in the catalog.
  hold(name: string): PackageCommand {
    return ['yum', 'versionlock', 'add', name];
  }

  unhold(name: string): PackageCommand {
    return ['yum', 'versionlock', 'delete', name];
  }
}

export class PipProvider extends PackageProvider {
  install(name: string, version?: string): PackageCommand {
    return ['pip', 'install', '-q', version === undefined ? name : `${name}==${version}`];
  }

  uninstall(name: string): PackageCommand {
    return ['pip', 'uninstall', '-y', '-q', name];
  }

  update(name: string): PackageCommand {
    return ['pip', 'install', '-q', '--upgrade', name];
  }

  latest(name: string): PackageCommand {
    return ['pip', 'index', 'versions', name];
  }

  query(name: string): PackageCommand {
    return ['pip', 'show', name];
  }
}
