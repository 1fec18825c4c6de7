import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DnsNameResolutionClient, type DnsResolver } from '../../../../src/discovery/dns/client.js';
import { createService } from '../../../../src/discovery/types/service.js';
import { TransportError } from '../../../../src/discovery/utils/errors.js';
import { silentLogger } from '../../../helpers/stub-name-resolution-client.js';

class FakeResolver implements DnsResolver {
  servers: readonly string[] = [];
  txt = new Map<string, string[][]>();
  aaaa = new Map<string, string[]>();

  readonly setServers = vi.fn((servers: readonly string[]) => {
    this.servers = servers;
  });

  readonly resolveTxt = vi.fn(async (hostname: string): Promise<string[][]> => {
    const records = this.txt.get(hostname);
    if (!records) {
      throw Object.assign(new Error(`queryTxt ENOTFOUND ${hostname}`), { code: 'ENOTFOUND' });
    }
    return records;
  });

  readonly resolve6 = vi.fn(async (hostname: string): Promise<string[]> => {
    const addresses = this.aaaa.get(hostname);
    if (!addresses) {
      throw Object.assign(new Error(`queryAaaa ENOTFOUND ${hostname}`), { code: 'ENOTFOUND' });
    }
    return addresses;
  });

  readonly cancel = vi.fn();
}

describe('DnsNameResolutionClient', () => {
  let resolver: FakeResolver;
  let client: DnsNameResolutionClient;

  beforeEach(() => {
    resolver = new FakeResolver();
    client = new DnsNameResolutionClient({}, { resolver, logger: silentLogger });
  });

  it('points the resolver at the overlay DNS server by default', () => {
    expect(resolver.setServers).toHaveBeenCalledWith(['fdaa::3']);
  });

  it('uses configured servers and domain', () => {
    const custom = new FakeResolver();
    const configured = new DnsNameResolutionClient(
      { servers: ['fd00::53'], domain: 'mesh.test' },
      { resolver: custom, logger: silentLogger }
    );

    expect(custom.servers).toEqual(['fd00::53']);
    expect(configured.appsHostname()).toBe('_apps.mesh.test');
  });

  it('builds the nearest-instances hostname from the service', () => {
    expect(client.instancesHostname(createService('api', 8080))).toBe('top1.nearest.of.api.internal');
    expect(client.instancesHostname(createService('api', 8080, 3))).toBe('top3.nearest.of.api.internal');
  });

  describe('listAllServiceNames', () => {
    it('splits the comma-separated TXT answer', async () => {
      resolver.txt.set('_apps.internal', [['api,worker, billing']]);

      await expect(client.listAllServiceNames()).resolves.toEqual(['api', 'worker', 'billing']);
    });

    it('joins a record split into several strings', async () => {
      resolver.txt.set('_apps.internal', [['api,wor', 'ker,'], ['ignored']]);

      await expect(client.listAllServiceNames()).resolves.toEqual(['api', 'worker']);
    });

    it('fails when the query has no answers', async () => {
      resolver.txt.set('_apps.internal', []);

      await expect(client.listAllServiceNames()).rejects.toThrow(
        new TransportError('The DNS query for _apps.internal did not have any answers')
      );
    });

    it('wraps resolver errors', async () => {
      const error: unknown = await client.listAllServiceNames().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      expect(error).toHaveProperty('message', 'Error during TXT record DNS query for _apps.internal');
      expect(error).toHaveProperty('cause.code', 'ENOTFOUND');
    });
  });

  describe('listInstancesOf', () => {
    it('pairs every address with the service port', async () => {
      resolver.aaaa.set('top2.nearest.of.api.internal', ['fdaa::1', 'fdaa::2']);

      await expect(client.listInstancesOf(createService('api', 8080, 2))).resolves.toEqual([
        { host: 'fdaa::1', port: 8080 },
        { host: 'fdaa::2', port: 8080 },
      ]);
    });

    it('returns an empty list for an empty answer', async () => {
      resolver.aaaa.set('top1.nearest.of.api.internal', []);

      await expect(client.listInstancesOf(createService('api', 8080))).resolves.toEqual([]);
    });

    it('still answers when the caller already gave up', async () => {
      resolver.aaaa.set('top1.nearest.of.api.internal', ['fdaa::1']);
      const controller = new AbortController();
      controller.abort();

      await expect(
        client.listInstancesOf(createService('api', 8080), { signal: controller.signal })
      ).resolves.toEqual([{ host: 'fdaa::1', port: 8080 }]);
    });

    it('wraps resolver errors', async () => {
      await expect(client.listInstancesOf(createService('api', 8080))).rejects.toMatchObject({
        code: 'TRANSPORT_ERROR',
        message: 'Error during AAAA record DNS query for top1.nearest.of.api.internal',
      });
    });
  });

  it('cancels outstanding queries on close', () => {
    client.close();

    expect(resolver.cancel).toHaveBeenCalledTimes(1);
  });
});
