/**
 * Warden Runtime Host — NodeHostEnvironment Tests
 *
 * Verifies fact overlay, search path lookup and global feature resolution
 * against a temp directory standing in for the host. System facts are
 * injected so results do not depend on the machine running the tests.
 */

import { describe, it, expect } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { NodeHostEnvironment } from '../src/host/node-environment.js';
import { HostConfigurationError } from '../src/host/operator-state.js';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const SYSTEM_FACTS = { kernel: 'Linux', osfamily: 'Debian' };

/** A bin directory holding an executable, a plain file and a subdirectory. */
function binDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'warden-bin-'));
  writeFileSync(join(dir, 'tool'), '#!/bin/sh\n', 'utf-8');
  chmodSync(join(dir, 'tool'), 0o755);
  writeFileSync(join(dir, 'data'), 'plain', 'utf-8');
  chmodSync(join(dir, 'data'), 0o644);
  writeFileSync(join(dir, 'run.cmd'), '@echo off\n', 'utf-8');
  chmodSync(join(dir, 'run.cmd'), 0o755);
  mkdirSync(join(dir, 'subdir'));
  return dir;
}

function environment(dir: string, extensions: ReadonlyArray<string> = []): NodeHostEnvironment {
  return new NodeHostEnvironment({
    systemFacts: SYSTEM_FACTS,
    facts: { OsFamily: 'RedHat' },
    features: ['augeas'],
    searchPath: dir,
    pathExtensions: extensions,
    resolveFrom: dir,
  });
}

// ---------------------------------------------------------------------------
// Facts
// ---------------------------------------------------------------------------

describe('NodeHostEnvironment facts', () => {
  it('overlays operator facts on system facts, ignoring case', () => {
    const env = environment(binDir());
    expect(env.factValue('osfamily')).toBe('RedHat');
    expect(env.factValue('KERNEL')).toBe('Linux');
    expect(env.factValue('zone')).toBeUndefined();
  });

  it('lists every fact sorted by name', () => {
    expect(environment(binDir()).facts()).toEqual([
      ['kernel', 'Linux'],
      ['osfamily', 'RedHat'],
    ]);
  });
});

// ---------------------------------------------------------------------------
// Paths and binaries
// ---------------------------------------------------------------------------

describe('NodeHostEnvironment search path', () => {
  it.skipIf(process.platform === 'win32')('finds executables on the search path', () => {
    const dir = binDir();
    expect(environment(dir).findOnSearchPath('tool')).toBe(join(dir, 'tool'));
  });

  it.skipIf(process.platform === 'win32')('skips files that are not executable', () => {
    expect(environment(binDir()).findOnSearchPath('data')).toBeNull();
  });

  it('skips directories and missing names', () => {
    const env = environment(binDir());
    expect(env.findOnSearchPath('subdir')).toBeNull();
    expect(env.findOnSearchPath('missing')).toBeNull();
    expect(env.findOnSearchPath('')).toBeNull();
  });

  it.skipIf(process.platform === 'win32')('checks a name containing a path directly', () => {
    const dir = binDir();
    expect(environment('').findOnSearchPath(join(dir, 'tool'))).toBe(join(dir, 'tool'));
  });

  it.skipIf(process.platform === 'win32')('tries each executable extension', () => {
    const dir = binDir();
    expect(environment(dir, ['.cmd']).findOnSearchPath('run')).toBe(join(dir, 'run.cmd'));
    expect(environment(dir).findOnSearchPath('run')).toBeNull();
  });

  it('checks path existence on the file system', () => {
    const dir = binDir();
    const env = environment(dir);
    expect(env.pathExists(join(dir, 'data'))).toBe(true);
    expect(env.pathExists(join(dir, 'nothing'))).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Global features
// ---------------------------------------------------------------------------

describe('NodeHostEnvironment global features', () => {
  it('accepts operator-listed features', () => {
    expect(environment(binDir()).globalFeatureAvailable('augeas')).toBe(true);
  });

  it('accepts modules that resolve and rejects those that do not', () => {
    const env = environment(binDir());
    expect(env.globalFeatureAvailable('fs')).toBe(true);
    expect(env.globalFeatureAvailable('warden-test-no-such-module')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Operator state
// ---------------------------------------------------------------------------

describe('NodeHostEnvironment.fromState', () => {
  it('loads facts and features from the warden home', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('facts.json', { Zone: 'dmz' });
    stateIO.writeJson('features.json', ['selinux']);

    const env = NodeHostEnvironment.fromState(stateIO, { systemFacts: SYSTEM_FACTS });

    expect(env.factValue('zone')).toBe('dmz');
    expect(env.factValue('kernel')).toBe('Linux');
    expect(env.globalFeatureAvailable('selinux')).toBe(true);
  });

  it('rejects a malformed facts file', () => {
    const stateIO = new MemoryStateIO();
    stateIO.writeJson('facts.json', { zone: ['dmz'] });

    expect(() => NodeHostEnvironment.fromState(stateIO, { systemFacts: SYSTEM_FACTS })).toThrow(
      HostConfigurationError,
    );
  });

  it('rejects a facts file on disk that is not valid JSON', () => {
    const home = mkdtempSync(join(tmpdir(), 'warden-home-'));
    mkdirSync(join(home, 'state'));
    writeFileSync(join(home, 'state', 'facts.json'), '{ "osfamily": "debian", }', 'utf-8');

    expect(() =>
      NodeHostEnvironment.fromState(new FileStateIO(home), { systemFacts: SYSTEM_FACTS }),
    ).toThrow(HostConfigurationError);
  });
});
