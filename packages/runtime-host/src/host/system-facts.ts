/**
 * Warden Runtime Host — System Facts
 *
 * The facts the host reports about itself, under the names confines use:
 *
 *   kernel           Linux | Darwin | windows | ...
 *   kernelrelease    os.release()
 *   operatingsystem  Debian, Ubuntu, RedHat, CentOS, ... (from /etc/os-release on Linux)
 *   osfamily         Debian, RedHat, Suse, ... (from ID / ID_LIKE)
 *   architecture     x86_64, aarch64, i386, ...
 *   hostname
 *   nodeversion
 *
 * The os-release parsing and the family mapping are pure and exported for
 * tests. collectSystemFacts() is the only function here that reads the host.
 */

import { readFileSync } from 'node:fs';
import { arch, hostname, release, type } from 'node:os';
import type { FactValue } from '@warden/confine';

/** os-release ID -> operatingsystem fact. */
const OPERATING_SYSTEMS: Readonly<Record<string, string>> = {
  debian: 'Debian',
  ubuntu: 'Ubuntu',
  linuxmint: 'LinuxMint',
  rhel: 'RedHat',
  centos: 'CentOS',
  fedora: 'Fedora',
  rocky: 'Rocky',
  almalinux: 'AlmaLinux',
  amzn: 'Amazon',
  sles: 'SLES',
  'opensuse-leap': 'OpenSuSE',
  'opensuse-tumbleweed': 'OpenSuSE',
  arch: 'Archlinux',
  alpine: 'Alpine',
  gentoo: 'Gentoo',
};

/** os-release ID or ID_LIKE entry -> osfamily fact. */
const OS_FAMILIES: Readonly<Record<string, string>> = {
  debian: 'Debian',
  ubuntu: 'Debian',
  rhel: 'RedHat',
  centos: 'RedHat',
  fedora: 'RedHat',
  amzn: 'RedHat',
  suse: 'Suse',
  sles: 'Suse',
  opensuse: 'Suse',
  arch: 'Archlinux',
  alpine: 'Alpine',
  gentoo: 'Gentoo',
};

const ARCHITECTURES: Readonly<Record<string, string>> = {
  x64: 'x86_64',
  arm64: 'aarch64',
  ia32: 'i386',
};

/**
 * Parse os-release content: KEY=value lines, values optionally quoted.
 * Comments and malformed lines are skipped.
 */
export function parseOsRelease(content: string): Readonly<Record<string, string>> {
  const result: Record<string, string> = {};
  for (const line of content.split('\n')) {
    const match = /^([A-Z0-9_]+)=(.*)$/.exec(line.trim());
    if (match === null) continue;
    const [, key = '', rawValue = ''] = match;
    result[key] = rawValue.replace(/^(["'])(.*)\1$/, '$2');
  }
  return result;
}

/**
 * operatingsystem and osfamily facts for a kernel name and, on Linux, the
 * parsed os-release.
 */
export function operatingSystemFacts(
  kernel: string,
  osRelease: Readonly<Record<string, string>>,
): { operatingsystem: string; osfamily: string } {
  if (kernel !== 'Linux') {
    return { operatingsystem: kernel, osfamily: kernel };
  }
  const id = (osRelease['ID'] ?? '').toLowerCase();
  const candidates = [id, ...(osRelease['ID_LIKE'] ?? '').toLowerCase().split(/\s+/)];
  const family = candidates.map((candidate) => OS_FAMILIES[candidate]).find((f) => f !== undefined);
  const operatingsystem = OPERATING_SYSTEMS[id] ?? (id === '' ? 'Linux' : capitalize(id));
  return { operatingsystem, osfamily: family ?? operatingsystem };
}

/** Kernel fact for os.type(). */
export function kernelName(osType: string): string {
  return osType === 'Windows_NT' ? 'windows' : osType;
}

/**
 * Read the system facts of the running host.
 *
 * @param osReleasePath - Default: /etc/os-release
 */
export function collectSystemFacts(
  osReleasePath = '/etc/os-release',
): Readonly<Record<string, FactValue>> {
  const kernel = kernelName(type());
  const osRelease = kernel === 'Linux' ? parseOsRelease(readOptional(osReleasePath)) : {};
  return {
    kernel,
    kernelrelease: release(),
    ...operatingSystemFacts(kernel, osRelease),
    architecture: ARCHITECTURES[arch()] ?? arch(),
    hostname: hostname(),
    nodeversion: process.versions.node,
  };
}

function readOptional(path: string): string {
  try {
    return readFileSync(path, 'utf-8');
  } catch {
    return '';
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
