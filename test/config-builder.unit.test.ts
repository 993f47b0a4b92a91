import { describe, expect, it } from 'vitest';

import {
  buildDocument,
  readRemoteEndpoint,
  resolveBindings,
  serialize,
} from '../src/modules/config';
import { parseLink } from '../src/modules/link';
import { REALITY_LINK, TEST_USER_ID, TLS_LINK, WS_LINK } from './links';

describe('buildDocument', () => {
  it('builds http and socks inbounds and one vless outbound', () => {
    const document = buildDocument(parseLink(TLS_LINK), resolveBindings());
    const [httpInbound, socksInbound] = document.inbounds;

    expect(httpInbound).toMatchObject({ tag: 'http', protocol: 'http', listen: '127.0.0.1', port: 1080 });
    expect(socksInbound).toMatchObject({ tag: 'socks', protocol: 'socks', listen: '127.0.0.1', port: 1090 });
    expect(socksInbound.settings).toEqual({ auth: 'noauth', udp: true });

    expect(document.outbounds).toHaveLength(1);
    const [proxy] = document.outbounds;
    expect(proxy.tag).toBe('proxy');
    expect(proxy.settings.vnext[0]).toEqual({
      address: 'example.com',
      port: 443,
      users: [{ id: TEST_USER_ID, encryption: 'none' }],
    });
    expect(proxy.streamSettings).toEqual({ network: 'tcp', security: 'tls', tlsSettings: {} });
    expect(proxy.unmappedParams).toBeUndefined();
  });

  it('binds inbounds to the supplied ports', () => {
    const document = buildDocument(parseLink(TLS_LINK), resolveBindings(2080, 2090));

    expect(document.inbounds.map((inbound) => inbound.port)).toEqual([2080, 2090]);
  });

  it('writes the link flow into the user entry', () => {
    const document = buildDocument(parseLink(REALITY_LINK), resolveBindings(), { policy: 'strict' });

    expect(document.outbounds[0].settings.vnext[0].users[0]).toEqual({
      id: TEST_USER_ID,
      encryption: 'none',
      flow: 'xtls-rprx-vision',
    });
  });

  it('keeps unmapped params on the proxy outbound in lenient mode', () => {
    const link = parseLink(`vless://${TEST_USER_ID}@example.com:443?security=tls&ed=2048`);
    const document = buildDocument(link, resolveBindings());

    expect(document.outbounds[0].unmappedParams).toEqual({ ed: '2048' });
  });

  it('uses the requested engine log level', () => {
    const document = buildDocument(parseLink(TLS_LINK), resolveBindings(), { engineLogLevel: 'debug' });

    expect(document.log).toEqual({ access: 'none', error: '', loglevel: 'debug', dnsLog: false });
  });

  it('adds stats, api, routing and auxiliary outbounds in the full preset', () => {
    const document = buildDocument(parseLink(REALITY_LINK), resolveBindings(), { preset: 'full' });

    expect(document.outbounds.map((outbound) => outbound.tag)).toEqual(['proxy', 'direct', 'block']);
    expect(document.outbounds.filter((outbound) => outbound.protocol === 'vless')).toHaveLength(1);
    expect(document.api).toEqual({ tag: 'api', services: ['StatsService'] });
    expect(document.stats).toEqual({});
    expect(document.policy?.system).toEqual({ statsOutboundUplink: true, statsOutboundDownlink: true });
    expect(document.routing?.rules).toHaveLength(7);
    expect(document.routing?.rules[0]).toEqual({ type: 'field', inboundTag: ['api'], outboundTag: 'api' });
    expect(document.routing?.rules[1]).toEqual({ type: 'field', ip: ['geoip:private'], outboundTag: 'block' });
  });

  it('leaves stats, api and routing out of the basic preset', () => {
    const document = buildDocument(parseLink(TLS_LINK), resolveBindings());

    expect(Object.keys(document).sort()).toEqual(['inbounds', 'log', 'outbounds']);
  });

  it.each([TLS_LINK, REALITY_LINK, WS_LINK])('is deterministic for %s', (raw) => {
    const first = serialize(buildDocument(parseLink(raw), resolveBindings(3080, 3090)));
    const second = serialize(buildDocument(parseLink(raw), resolveBindings(3080, 3090)));

    expect(second).toBe(first);
  });
});

describe('readRemoteEndpoint', () => {
  it.each([
    TLS_LINK,
    REALITY_LINK,
    WS_LINK,
    `vless://${TEST_USER_ID}@[2001:db8::1]:8443?type=grpc&serviceName=tunnel`,
  ])('reads back host, port and user id of %s', (raw) => {
    const link = parseLink(raw);
    const text = serialize(buildDocument(link, resolveBindings(), { preset: 'full' }));

    expect(readRemoteEndpoint(text)).toEqual({ address: link.host, port: link.port, id: link.userId });
  });

  it('rejects a document without a vless outbound', () => {
    const text = JSON.stringify({ outbounds: [{ tag: 'direct', protocol: 'freedom' }] });

    expect(() => readRemoteEndpoint(text)).toThrowError(/Config document has no vless outbound/);
  });
});
