/**
 * HostsLoader and SubdomainsLoader tests
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HostsLoader } from '../../../src/services/HostsLoader.js';
import { loadSubdomains } from '../../../src/services/SubdomainsLoader.js';
import { ConfigurationError, ExternalIpError } from '../../../src/core/errors.js';
import type { ExternalIpProvider } from '../../../src/ip/ExternalIpProvider.js';
import { createTempDir, type TempDir } from '../../helpers/tempFiles.js';

function fixedProvider(ip: string) {
  return { name: 'fixed', currentIp: vi.fn(async () => ip) } satisfies ExternalIpProvider;
}

describe('HostsLoader', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.remove();
  });

  it('should not look up the external IP when every host has a destination', async () => {
    const provider = fixedProvider('198.51.100.7');
    const loader = new HostsLoader(provider);

    const state = await loader.fromHostsFile({
      zone: { domainname: 'example.com', ttl: 300 },
      hosts: [
        { hostname: 'www', type: 'CNAME', destination: '@' },
        { hostname: 'mail', type: 'MX', destination: 'mx.example.net', priority: 10 },
      ],
    });

    expect(provider.currentIp).not.toHaveBeenCalled();
    expect(state.domain).toBe('example.com');
    expect(state.ttl).toBe(300);
    expect(state.externalIp).toBeUndefined();
    expect(state.records.map((r) => [r.hostname, r.type, r.destination, r.priority])).toEqual([
      ['www', 'CNAME', '@', 0],
      ['mail', 'MX', 'mx.example.net', 10],
    ]);
  });

  it('should point hosts without a destination at the external IP', async () => {
    const provider = fixedProvider('198.51.100.7');
    const loader = new HostsLoader(provider);

    const state = await loader.fromHostsFile({
      zone: { domainname: 'example.com' },
      hosts: [
        { hostname: '@', type: 'A' },
        { hostname: 'home', type: 'A' },
        { hostname: 'www', type: 'CNAME', destination: '@' },
      ],
    });

    expect(provider.currentIp).toHaveBeenCalledTimes(1);
    expect(state.externalIp).toBe('198.51.100.7');
    expect(state.ttl).toBeUndefined();
    expect(state.records.map((r) => r.destination)).toEqual(['198.51.100.7', '198.51.100.7', '@']);
  });

  it('should require a provider for hosts without a destination', async () => {
    const loader = new HostsLoader();

    await expect(
      loader.fromHostsFile({ zone: { domainname: 'example.com' }, hosts: [{ hostname: '@', type: 'A' }] })
    ).rejects.toThrow(new ConfigurationError('Hosts without a destination need an external IP provider'));
  });

  it('should pass on provider failures', async () => {
    const loader = new HostsLoader({
      name: 'broken',
      currentIp: async () => {
        throw new ExternalIpError('router unreachable');
      },
    });

    await expect(
      loader.fromHostsFile({ zone: { domainname: 'example.com' }, hosts: [{ hostname: '@', type: 'A' }] })
    ).rejects.toThrow(ExternalIpError);
  });

  it('should load and validate a hosts file', async () => {
    const path = dir.writeJson('hosts.json', {
      zone: { domainname: 'example.com', ttl: '600' },
      hosts: [{ hostname: 'www', type: 'A', destination: '192.0.2.10' }],
    });

    const state = await new HostsLoader().load(path);

    expect(state.ttl).toBe(600);
    expect(state.records.map((r) => r.destination)).toEqual(['192.0.2.10']);
  });

  it('should reject unknown record types', async () => {
    const path = dir.writeJson('hosts.json', {
      zone: { domainname: 'example.com' },
      hosts: [{ hostname: 'www', type: 'PTR', destination: 'example.net' }],
    });

    await expect(new HostsLoader().load(path)).rejects.toThrow(/^Invalid hosts file: hosts\.0\.type: /);
  });
});

describe('loadSubdomains', () => {
  let dir: TempDir;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    dir.remove();
  });

  it('should map keys to hostnames', () => {
    const path = dir.writeJson('subdomains.json', {
      domainname: 'example.com',
      hosts: [
        { key: 'key-home', hostname: 'home' },
        { key: 'key-office', hostname: 'office' },
      ],
    });

    const subdomains = loadSubdomains(path);

    expect(subdomains.domain).toBe('example.com');
    expect(subdomains.hosts.get('key-home')).toBe('home');
    expect(subdomains.hosts.get('key-office')).toBe('office');
    expect(subdomains.hosts.get('unknown')).toBeUndefined();
  });

  it('should pick up edits on the next call', () => {
    const path = dir.writeJson('subdomains.json', { domainname: 'example.com', hosts: [] });
    expect(loadSubdomains(path).hosts.size).toBe(0);

    dir.writeJson('subdomains.json', { domainname: 'example.com', hosts: [{ key: 'key-new', hostname: 'new' }] });
    expect(loadSubdomains(path).hosts.get('key-new')).toBe('new');
  });

  it('should report a missing file', () => {
    expect(() => loadSubdomains(`${dir.path}/nope.json`)).toThrow('subdomains file not found');
  });
});
