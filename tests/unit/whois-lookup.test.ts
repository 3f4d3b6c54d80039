/**
 * Unit Tests for WHOIS server selection and referrals.
 *
 * Every WHOIS host is routed to its own in-process server, so the real
 * host names from the TLD table can be used.
 */

import { lookupRaw, Port43WhoisSource } from '../../src/whois';
import { checkDomain } from '../../src/services/session';
import { WhoisConnectionError, WhoisLookupError } from '../../src/utils/errors';
import { MockWhoisServer, REGISTERED_EXAMPLE } from '../helpers/mock-whois-server';

const mockHostPorts = new Map<string, number>();

jest.mock('node:net', () => {
  const actual = jest.requireActual<typeof import('node:net')>('node:net');
  return {
    ...actual,
    createConnection: (options: { host?: string; port: number }, listener?: () => void) =>
      actual.createConnection(
        { host: '127.0.0.1', port: mockHostPorts.get(options.host ?? '') ?? options.port },
        listener,
      ),
  };
});

const REGISTRY = 'whois.verisign-grs.com';
const REGISTRAR = 'whois.example-registrar.test';
const IANA = 'whois.iana.org';
const TLD_SERVER = 'whois.nic.example';

const NOW = new Date('2025-06-01T12:00:00Z');

const OPTIONS = { port: 43, timeoutMs: 2000, followReferrals: true };

const REGISTRAR_RECORD = [
  'Domain Name: example.com',
  `Registrar WHOIS Server: ${REGISTRAR}`,
  'Registrar: Example Registrar, Inc.',
  'Registrant Organization: Example Org',
  '',
].join('\r\n');

const TAKEN_REGISTRY_RECORD = [
  '   Domain Name: TAKEN-EXAMPLE.COM',
  `   Registrar WHOIS Server: ${REGISTRAR}`,
  '   Registrar: Example Registrar, Inc.',
  '   Name Server: NS1.EXAMPLE.NET',
  '',
].join('\r\n');

const IANA_REFER = [
  '% IANA WHOIS server',
  '',
  `refer:        ${TLD_SERVER}`,
  '',
  'domain:       EXAMPLE',
  'organisation: Example Registry Services',
  '',
].join('\n');

const IANA_NO_REFER = ['% IANA WHOIS server', '', '% This query returned 0 objects.', ''].join('\n');

const TLD_RECORD = [
  'Domain Name: DOMAIN.EXAMPLE',
  'Registrar: Example Registrar, Inc.',
  'Creation Date: 2020-01-01T00:00:00Z',
  '',
].join('\r\n');

/**
 * A port nothing listens on.
 */
async function closedPort(): Promise<number> {
  const server = new MockWhoisServer();
  await server.start();
  const port = server.port;
  await server.stop();
  return port;
}

describe('lookupRaw', () => {
  let registry: MockWhoisServer;
  let registrar: MockWhoisServer;
  let iana: MockWhoisServer;
  let tldServer: MockWhoisServer;

  async function startServer(host: string): Promise<MockWhoisServer> {
    const server = new MockWhoisServer();
    await server.start();
    mockHostPorts.set(host, server.port);
    return server;
  }

  beforeEach(async () => {
    registry = await startServer(REGISTRY);
    registrar = await startServer(REGISTRAR);
    iana = await startServer(IANA);
    tldServer = await startServer(TLD_SERVER);
  });

  afterEach(async () => {
    await Promise.all([registry.stop(), registrar.stop(), iana.stop(), tldServer.stop()]);
    mockHostPorts.clear();
  });

  describe('registrar referrals', () => {
    it('follows the registry to the registrar', async () => {
      registry.addResponse('example.com', REGISTERED_EXAMPLE);
      registrar.addResponse('example.com', REGISTRAR_RECORD);

      const result = await lookupRaw('Example.com', OPTIONS);

      expect(result).toEqual({ raw: REGISTRAR_RECORD, server: REGISTRAR });
      expect(registry.queries).toEqual(['example.com']);
      expect(registrar.queries).toEqual(['example.com']);
    });

    it('keeps the registry record when the registrar has no match', async () => {
      registry.addResponse('taken-example.com', TAKEN_REGISTRY_RECORD);

      const result = await lookupRaw('taken-example.com', OPTIONS);

      expect(registrar.queries).toEqual(['taken-example.com']);
      expect(result).toEqual({ raw: TAKEN_REGISTRY_RECORD, server: REGISTRY });
    });

    it('reports the domain registered when the registrar has no match', async () => {
      registry.addResponse('taken-example.com', TAKEN_REGISTRY_RECORD);
      const source = new Port43WhoisSource(OPTIONS);

      const verdict = await checkDomain('taken-example.com', { source, now: () => NOW });

      expect(verdict).toEqual({
        available: false,
        outcome: 'registered',
        message:
          'Domain taken-example.com is registered (Registrar: Example Registrar, Inc. | Nameservers: 1 configured)',
      });
    });

    it('keeps the registry record when the registrar is rate limiting', async () => {
      registry.addResponse('taken-example.com', TAKEN_REGISTRY_RECORD);
      registrar.addResponse('taken-example.com', 'Query limit exceeded, try again later\r\n');

      const result = await lookupRaw('taken-example.com', OPTIONS);

      expect(result.server).toBe(REGISTRY);
      expect(result.raw).toBe(TAKEN_REGISTRY_RECORD);
    });

    it('keeps the registry record when the registrar is unreachable', async () => {
      registry.addResponse('example.com', REGISTERED_EXAMPLE);
      mockHostPorts.set(REGISTRAR, await closedPort());

      const result = await lookupRaw('example.com', OPTIONS);

      expect(result).toEqual({ raw: REGISTERED_EXAMPLE, server: REGISTRY });
    });

    it('stays with the registry when referrals are off', async () => {
      registry.addResponse('example.com', REGISTERED_EXAMPLE);

      const result = await lookupRaw('example.com', { ...OPTIONS, followReferrals: false });

      expect(result).toEqual({ raw: REGISTERED_EXAMPLE, server: REGISTRY });
      expect(registrar.queries).toEqual([]);
    });
  });

  describe('unknown TLDs', () => {
    it('asks IANA and follows its referral even with referrals off', async () => {
      iana.addResponse('domain.example', IANA_REFER);
      tldServer.addResponse('domain.example', TLD_RECORD);

      const result = await lookupRaw('domain.example', { ...OPTIONS, followReferrals: false });

      expect(result).toEqual({ raw: TLD_RECORD, server: TLD_SERVER });
      expect(iana.queries).toEqual(['domain.example']);
      expect(registry.queries).toEqual([]);
    });

    it('returns the TLD server answer even when it has no match', async () => {
      iana.addResponse('free.example', IANA_REFER);
      const source = new Port43WhoisSource(OPTIONS);

      const error = await source.lookup('free.example').catch((e: unknown) => e);

      expect(tldServer.queries).toEqual(['free.example']);
      expect(error).toBeInstanceOf(WhoisLookupError);
      expect(error).toMatchObject({ kind: 'no_record' });
    });

    it('fails when IANA names no server', async () => {
      iana.addResponse('orphan.zz', IANA_NO_REFER);

      const error = await lookupRaw('orphan.zz', OPTIONS).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(WhoisLookupError);
      expect(error).toMatchObject({
        kind: 'failure',
        message: 'No WHOIS server known for .zz',
      });
    });

    it('fails when the server IANA names is unreachable', async () => {
      iana.addResponse('domain.example', IANA_REFER);
      mockHostPorts.set(TLD_SERVER, await closedPort());

      await expect(lookupRaw('domain.example', OPTIONS)).rejects.toBeInstanceOf(
        WhoisConnectionError,
      );
    });
  });

  it('sends every query to a configured server without referrals', async () => {
    registry.addResponse('example.com', REGISTERED_EXAMPLE);

    const result = await lookupRaw('example.com', { ...OPTIONS, server: REGISTRY });

    expect(result.server).toBe(REGISTRY);
    expect(registrar.queries).toEqual([]);
  });
});
