import { Buffer } from 'buffer';
import {
  DnsResolver,
  findGlueAddress,
  type DnsMessage,
  type DnsTransport,
  type ResolverOptions,
} from '../src/index.js';
import { DNS_FLAGS } from '../src/constants.js';
import {
  AbortError,
  ConfigurationError,
  InvalidResponseError,
  NoResolutionPathError,
  ResolutionDepthExceededError,
  TimeoutError,
} from '../src/errors.js';
import {
  a,
  aaaa,
  buildResponse,
  cname,
  createFakeTransport,
  ns,
  zoneTable,
  type ResponseSections,
} from './dns-test-helpers.js';

const ROOT = '10.0.0.1';
const TLD = '10.0.0.2';
const AUTH = '10.0.0.3';

// a decoded reply holding only the given sections
function message(sections: ResponseSections): DnsMessage {
  const answers = sections.answers ?? [];
  const authorities = sections.authorities ?? [];
  const additionals = sections.additionals ?? [];
  return {
    header: {
      id: 1,
      flags: DNS_FLAGS.QR,
      questionCount: 0,
      answerCount: answers.length,
      authorityCount: authorities.length,
      additionalCount: additionals.length,
    },
    questions: [],
    answers,
    authorities,
    additionals,
    trailingBytes: 0,
  };
}

describe('DnsResolver', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('Iterative resolution', () => {
    test('should follow glue from the root to the authoritative server', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({
          [ROOT]: {
            'www.example.com': {
              authorities: [ns('com', 'a.gtld.test')],
              additionals: [a('a.gtld.test', TLD)],
            },
          },
          [TLD]: {
            'www.example.com': {
              authorities: [ns('example.com', 'ns1.example.com')],
              additionals: [a('ns1.example.com', AUTH)],
            },
          },
          [AUTH]: {
            'www.example.com': { answers: [a('www.example.com', '192.0.2.10')] },
          },
        })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      const resolution = await resolver.resolveTrace('www.example.com');

      expect(resolution.address).toBe('192.0.2.10');
      expect(sent.map(query => query.server)).toEqual([ROOT, TLD, AUTH]);
      // glue means the nameserver names are never looked up
      expect(sent.map(query => query.question.name)).toEqual([
        'www.example.com',
        'www.example.com',
        'www.example.com',
      ]);
      expect(resolution.trace.map(hop => [hop.outcome, hop.next])).toEqual([
        ['glue', TLD],
        ['glue', AUTH],
        ['answer', '192.0.2.10'],
      ]);
    });

    test('should resolve a nameserver without glue before asking it', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({
          [ROOT]: {
            'example.org': { authorities: [ns('example.org', 'ns1.example.net')] },
            'ns1.example.net': { answers: [a('ns1.example.net', '10.0.0.9')] },
          },
          '10.0.0.9': {
            'example.org': { answers: [a('example.org', '192.0.2.20')] },
          },
        })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      const resolution = await resolver.resolveTrace('example.org');

      expect(resolution.address).toBe('192.0.2.20');
      expect(sent.map(query => [query.server, query.question.name])).toEqual([
        [ROOT, 'example.org'],
        [ROOT, 'ns1.example.net'],
        ['10.0.0.9', 'example.org'],
      ]);
      expect(resolution.trace.map(hop => [hop.query, hop.depth, hop.outcome])).toEqual([
        ['example.org', 0, 'referral'],
        ['ns1.example.net', 1, 'answer'],
        ['example.org', 0, 'answer'],
      ]);
    });

    test('should stop at the first server that answers', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await expect(resolver.resolve('example.com')).resolves.toBe('192.0.2.1');
      expect(sent).toHaveLength(1);
    });

    test('should record what each hop cost', async () => {
      const { transport } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      const { trace } = await resolver.resolveTrace('example.com');

      expect(trace).toEqual([
        {
          server: ROOT,
          query: 'example.com',
          type: 'A',
          depth: 0,
          outcome: 'answer',
          next: '192.0.2.1',
          elapsed: expect.any(Number),
          bytes: expect.any(Number),
          timestamp: expect.any(Date),
        },
      ]);
    });

    test('should normalize the queried name', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      const resolution = await resolver.resolveTrace('  Example.COM. ');

      expect(resolution.query).toBe('example.com');
      expect(sent[0].question.name).toBe('example.com');
    });

    test('should resolve AAAA records', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({
          [ROOT]: {
            'example.com': {
              answers: [a('example.com', '192.0.2.1'), aaaa('example.com', '2001:db8::1')],
            },
          },
        })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await expect(resolver.resolve('example.com', 'aaaa')).resolves.toBe('2001:db8::1');
      expect(sent[0].question.type).toBe(28);
    });

    test('should fail when a reply offers no way forward', async () => {
      const { transport, sent } = createFakeTransport(zoneTable({}));
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await expect(resolver.resolve('example.com')).rejects.toThrow(NoResolutionPathError);
      expect(sent).toHaveLength(1);
    });

    test('should give up after maxDepth queries', async () => {
      // the root keeps referring back to itself
      const { transport, sent } = createFakeTransport(() => ({
        authorities: [ns('com', 'a.root.test')],
        additionals: [a('a.root.test', ROOT)],
      }));
      const resolver = new DnsResolver({ rootServer: ROOT, transport, maxDepth: 5 });

      await expect(resolver.resolve('example.com')).rejects.toThrow(ResolutionDepthExceededError);
      expect(sent).toHaveLength(5);
    });

    test('should count nested nameserver lookups against maxDepth', async () => {
      // every nameserver name needs its own lookup, which refers to another one
      const { transport, sent } = createFakeTransport((_server, question) => ({
        authorities: [ns(question.name, `ns.${question.name}`)],
      }));
      const resolver = new DnsResolver({ rootServer: ROOT, transport, maxDepth: 4 });

      await expect(resolver.resolve('example.com')).rejects.toThrow(ResolutionDepthExceededError);
      expect(sent.map(query => query.question.name)).toEqual([
        'example.com',
        'ns.example.com',
        'ns.ns.example.com',
        'ns.ns.ns.example.com',
      ]);
    });

    test('should propagate transport errors', async () => {
      const transport = jest.fn<ReturnType<DnsTransport>, Parameters<DnsTransport>>(async () => {
        throw new TimeoutError('no reply');
      });
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await expect(resolver.resolve('example.com')).rejects.toThrow(TimeoutError);
    });
  });

  describe('CNAME handling', () => {
    const aliasTable = zoneTable({
      [ROOT]: {
        'www.example.com': { answers: [cname('www.example.com', 'web.example.net')] },
        'web.example.net': { answers: [a('web.example.net', '192.0.2.30')] },
      },
    });

    test('should restart at the root with the canonical name', async () => {
      const { transport, sent } = createFakeTransport(aliasTable);
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      const resolution = await resolver.resolveTrace('www.example.com');

      expect(resolution.address).toBe('192.0.2.30');
      expect(resolution.trace.map(hop => [hop.query, hop.outcome, hop.next])).toEqual([
        ['www.example.com', 'cname', 'web.example.net'],
        ['web.example.net', 'answer', '192.0.2.30'],
      ]);
      expect(sent.map(query => query.server)).toEqual([ROOT, ROOT]);
    });

    test('should not follow aliases when disabled', async () => {
      const { transport } = createFakeTransport(aliasTable);
      const resolver = new DnsResolver({ rootServer: ROOT, transport, followCnames: false });

      await expect(resolver.resolve('www.example.com')).rejects.toThrow(NoResolutionPathError);
    });
  });

  describe('findGlueAddress', () => {
    test('should pick the additional record of a referred nameserver', () => {
      const reply = message({
        authorities: [ns('example.com', 'ns1.example.com')],
        additionals: [a('unrelated.test', '10.9.9.9'), a('NS1.Example.com', AUTH)],
      });
      expect(findGlueAddress(reply)).toBe(AUTH);
    });

    test('should ignore address records for other names', () => {
      const reply = message({
        authorities: [ns('example.com', 'ns1.example.com')],
        additionals: [a('unrelated.test', '10.9.9.9')],
      });
      expect(findGlueAddress(reply)).toBeNull();
    });

    test('should take any additional address when no nameserver is named', () => {
      const reply = message({ additionals: [a('somewhere.test', '10.9.9.9')] });
      expect(findGlueAddress(reply)).toBe('10.9.9.9');
    });

    test('should not treat AAAA records as glue', () => {
      const reply = message({
        authorities: [ns('example.com', 'ns1.example.com')],
        additionals: [aaaa('ns1.example.com', '2001:db8::53')],
      });
      expect(findGlueAddress(reply)).toBeNull();
    });
  });

  describe('Queries on the wire', () => {
    test('should not ask for recursion while walking', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({
          [ROOT]: {
            'www.example.com': {
              authorities: [ns('com', 'a.gtld.test')],
              additionals: [a('a.gtld.test', TLD)],
            },
          },
          [TLD]: { 'www.example.com': { answers: [a('www.example.com', '192.0.2.10')] } },
        })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await resolver.resolve('www.example.com');

      expect(sent.map(query => query.flags)).toEqual([0, 0]);
      expect(sent.map(query => query.port)).toEqual([53, 53]);
    });

    test('should ask the recursive server for recursion in a stub query', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({
          '1.1.1.1': {
            'example.com': {
              answers: [
                {
                  name: 'example.com',
                  ttl: 300,
                  class: 1,
                  type: 'MX',
                  preference: 10,
                  exchange: 'mail.example.com',
                },
              ],
            },
          },
        })
      );
      const resolver = new DnsResolver({ transport });

      const response = await resolver.query('Example.COM.', 'mx');

      expect(sent).toEqual([
        {
          server: '1.1.1.1',
          port: 53,
          id: expect.any(Number),
          flags: DNS_FLAGS.RD,
          question: { name: 'example.com', type: 15, class: 1 },
        },
      ]);
      expect(response.answers).toEqual([
        {
          name: 'example.com',
          ttl: 300,
          class: 1,
          type: 'MX',
          preference: 10,
          exchange: 'mail.example.com',
        },
      ]);
    });

    test('should send stub queries to the server given per call', async () => {
      const { transport, sent } = createFakeTransport(zoneTable({}));
      const resolver = new DnsResolver({ transport, port: 5353 });

      await resolver.query('example.com', 'TXT', '10.0.0.53');

      expect(sent[0]).toMatchObject({ server: '10.0.0.53', port: 5353 });
    });

    test('should reject a stub query server that is not an IP address', async () => {
      const { transport } = createFakeTransport(zoneTable({}));
      const resolver = new DnsResolver({ transport });

      await expect(resolver.query('example.com', 'A', 'dns.example')).rejects.toThrow(
        ConfigurationError
      );
    });

    test('should use the injected id generator', async () => {
      const { transport, sent } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport, generateId: () => 0x4242 });

      await resolver.resolve('example.com');

      expect(sent[0].id).toBe(0x4242);
    });

    test('should reject replies carrying a different id', async () => {
      const transport: DnsTransport = async request => {
        const reply = buildResponse(request.payload, { answers: [a('example.com', '192.0.2.1')] });
        reply.writeUInt16BE(0x1111, 0);
        return reply;
      };
      const resolver = new DnsResolver({ rootServer: ROOT, transport, generateId: () => 0x2222 });

      await expect(resolver.resolve('example.com')).rejects.toThrow(InvalidResponseError);
    });
  });

  describe('Cancellation', () => {
    test('should not send anything once the signal is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const transport = jest.fn<ReturnType<DnsTransport>, Parameters<DnsTransport>>();
      const resolver = new DnsResolver({ rootServer: ROOT, transport, signal: controller.signal });

      await expect(resolver.resolve('example.com')).rejects.toThrow(AbortError);
      expect(transport).not.toHaveBeenCalled();
    });

    test('should stop between hops when aborted mid-walk', async () => {
      const controller = new AbortController();
      const { transport: fake, sent } = createFakeTransport(() => ({
        authorities: [ns('com', 'a.gtld.test')],
        additionals: [a('a.gtld.test', TLD)],
      }));
      const transport: DnsTransport = async request => {
        const reply = await fake(request);
        controller.abort();
        return reply;
      };
      const resolver = new DnsResolver({ rootServer: ROOT, transport, signal: controller.signal });

      await expect(resolver.resolve('example.com')).rejects.toThrow(AbortError);
      expect(sent).toHaveLength(1);
    });

    test('should pass the signal to the transport', async () => {
      const controller = new AbortController();
      const { transport: fake } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const transport = jest.fn<ReturnType<DnsTransport>, Parameters<DnsTransport>>(fake);
      const resolver = new DnsResolver({
        rootServer: ROOT,
        transport,
        signal: controller.signal,
        timeout: 250,
      });

      await resolver.resolve('example.com');

      expect(transport).toHaveBeenCalledWith(
        expect.objectContaining({ server: ROOT, timeout: 250, signal: controller.signal })
      );
    });
  });

  describe('Logging', () => {
    test('should warn about trailing bytes and keep the reply', async () => {
      const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
      const { transport: fake } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const transport: DnsTransport = async request =>
        Buffer.concat([await fake(request), Buffer.from([0, 0])]);
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await expect(resolver.resolve('example.com')).resolves.toBe('192.0.2.1');
      expect(warn).toHaveBeenCalledWith(`Reply from '${ROOT}' has 2 trailing byte(s)`);
    });

    test('should log each query when verbose', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const { transport } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport, verbose: true });

      await resolver.resolve('example.com');

      expect(log).toHaveBeenCalledWith(`Querying ${ROOT} for example.com (A)`);
    });

    test('should stay quiet by default', async () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
      const { transport } = createFakeTransport(
        zoneTable({ [ROOT]: { 'example.com': { answers: [a('example.com', '192.0.2.1')] } } })
      );
      const resolver = new DnsResolver({ rootServer: ROOT, transport });

      await resolver.resolve('example.com');

      expect(log).not.toHaveBeenCalled();
    });
  });

  describe('Options', () => {
    test('should fill in defaults', () => {
      const resolver = new DnsResolver();
      expect(resolver.options).toMatchObject({
        rootServer: '198.41.0.4',
        server: '1.1.1.1',
        port: 53,
        timeout: 5000,
        maxDepth: 30,
        followCnames: true,
        verbose: false,
      });
    });

    test.each<[string, Partial<ResolverOptions>]>([
      ['a root server that is not an IP', { rootServer: 'a.root-servers.net' }],
      ['a server that is not an IP', { server: 'one.one.one.one' }],
      ['port 0', { port: 0 }],
      ['a port above 65535', { port: 70000 }],
      ['a zero timeout', { timeout: 0 }],
      ['a zero maxDepth', { maxDepth: 0 }],
      ['a fractional maxDepth', { maxDepth: 2.5 }],
    ])('should reject %s', (_label, opts) => {
      expect(() => new DnsResolver(opts)).toThrow(ConfigurationError);
    });

    test('should accept IPv6 servers', () => {
      expect(() => new DnsResolver({ rootServer: '2001:503:ba3e::2:30' })).not.toThrow();
    });
  });
});
