import { describe, it, expect, beforeEach } from 'vitest';
import { isLiteralAddress, NameLookup, Resolution, Resolver } from '../modules/resolver/resolver.service';
import { TtlCache } from '../utils/cache';
import { fakeLookup } from './helpers';

const DNS_TTL_MS = 300_000;

describe('Resolver', () => {
  let t = 0;
  const clock = () => t;

  const createResolver = (forward: Record<string, string>, reverse: Record<string, string[]>) => {
    const dns = fakeLookup(forward, reverse);
    const resolver = new Resolver({
      cache:        new TtlCache<Resolution>(DNS_TTL_MS, clock),
      reverseCache: new TtlCache<string>(DNS_TTL_MS, clock),
      lookup:       dns.lookup,
    });
    return { resolver, calls: dns.calls };
  };

  beforeEach(() => {
    t = 0;
  });

  it('una IP literal se usa tal cual y toma el nombre del DNS inverso', async () => {
    const { resolver, calls } = createResolver({}, { '10.0.0.1': ['sw1.example.local'] });

    expect(await resolver.resolve('10.0.0.1')).toEqual({ address: '10.0.0.1', canonicalName: 'sw1.example.local' });
    expect(calls.forward).toEqual([]);
  });

  it('una IP literal sin DNS inverso queda con nombre vacío', async () => {
    const { resolver } = createResolver({}, {});
    expect(await resolver.resolve('10.0.0.9')).toEqual({ address: '10.0.0.9', canonicalName: '' });
  });

  it('un hostname resuelve a su primera dirección y su FQDN', async () => {
    const { resolver } = createResolver(
      { 'core-sw-1': '10.0.0.5' },
      { '10.0.0.5': ['core-sw-1', 'core-sw-1.example.local'] },
    );
    expect(await resolver.resolve('core-sw-1')).toEqual({ address: '10.0.0.5', canonicalName: 'core-sw-1.example.local' });
  });

  it('sin FQDN disponible, el nombre es la entrada original', async () => {
    const { resolver } = createResolver({ 'core-sw-2': '10.0.0.6' }, {});
    expect(await resolver.resolve('core-sw-2')).toEqual({ address: '10.0.0.6', canonicalName: 'core-sw-2' });
  });

  it('un hostname que no resuelve queda con dirección y nombre vacíos', async () => {
    const { resolver } = createResolver({}, {});
    expect(await resolver.resolve('bogus.invalid')).toEqual({ address: '', canonicalName: '' });
  });

  it('reutiliza la cache hasta que vence el TTL', async () => {
    const { resolver, calls } = createResolver({ 'core-sw-1': '10.0.0.5' }, {});

    await resolver.resolve('core-sw-1');
    t = DNS_TTL_MS - 1;
    await resolver.resolve('core-sw-1');
    expect(calls.forward).toEqual(['core-sw-1']);

    t = DNS_TTL_MS;
    await resolver.resolve('core-sw-1');
    expect(calls.forward).toEqual(['core-sw-1', 'core-sw-1']);
  });

  it('también cachea los fallos', async () => {
    const { resolver, calls } = createResolver({}, {});
    await resolver.resolve('bogus.invalid');
    await resolver.resolve('bogus.invalid');
    expect(calls.forward).toEqual(['bogus.invalid']);
  });

  it('una consulta DNS que no responde cuenta como no resuelta', async () => {
    const lookup: NameLookup = {
      forward: () => new Promise<string>(() => undefined),
      reverse: () => new Promise<string[]>(() => undefined),
    };
    const resolver = new Resolver({
      cache:        new TtlCache<Resolution>(DNS_TTL_MS, clock),
      reverseCache: new TtlCache<string>(DNS_TTL_MS, clock),
      lookup,
      timeoutMs:    20,
    });

    expect(await resolver.resolve('slow-dns.lab')).toEqual({ address: '', canonicalName: '' });
    expect(await resolver.resolve('10.0.0.1')).toEqual({ address: '10.0.0.1', canonicalName: '' });
  });

  it('si solo el DNS inverso no responde, el nombre es la entrada', async () => {
    const lookup: NameLookup = {
      forward: async () => '10.0.0.5',
      reverse: () => new Promise<string[]>(() => undefined),
    };
    const resolver = new Resolver({
      cache:        new TtlCache<Resolution>(DNS_TTL_MS, clock),
      reverseCache: new TtlCache<string>(DNS_TTL_MS, clock),
      lookup,
      timeoutMs:    20,
    });

    expect(await resolver.resolve('core-sw-1')).toEqual({ address: '10.0.0.5', canonicalName: 'core-sw-1' });
  });

  it('resolveAll arma los DeviceSpec en el mismo orden', async () => {
    const { resolver } = createResolver({ 'core-sw-1': '10.0.0.5' }, { '10.0.0.1': ['sw1.example.local'] });

    expect(await resolver.resolveAll(['core-sw-1', 'bogus.invalid', '10.0.0.1'])).toEqual([
      { original: 'core-sw-1',     resolvedAddress: '10.0.0.5', displayNameHint: 'core-sw-1' },
      { original: 'bogus.invalid', resolvedAddress: '',         displayNameHint: '' },
      { original: '10.0.0.1',      resolvedAddress: '10.0.0.1', displayNameHint: 'sw1.example.local' },
    ]);
  });
});

describe('isLiteralAddress', () => {
  it('reconoce IPv4 e IPv6', () => {
    expect(isLiteralAddress('192.168.1.10')).toBe(true);
    expect(isLiteralAddress('fe80::1')).toBe(true);
    expect(isLiteralAddress('core-sw-1')).toBe(false);
    expect(isLiteralAddress('10.0.0')).toBe(false);
  });
});
