import pino from 'pino';
import { describe, expect, it } from 'vitest';

import { LinkConfigCompiler } from '../src/compiler';
import { InvalidPortError, UnsupportedTransportError } from '../src/lib/errors';
import { serialize } from '../src/modules/config';
import { captureError, TEST_USER_ID, TLS_LINK } from './links';

function createCapturingLogger(): { logger: pino.Logger; lines: () => Record<string, unknown>[] } {
  const chunks: string[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write: (chunk: string) => {
        chunks.push(chunk);
      },
    },
  );

  return {
    logger,
    lines: () => chunks.map((chunk) => JSON.parse(chunk) as Record<string, unknown>),
  };
}

describe('LinkConfigCompiler', () => {
  it('fills in frozen default settings', () => {
    const compiler = new LinkConfigCompiler();

    expect(compiler.settings).toEqual({
      strict: false,
      defaultHttpPort: 1080,
      defaultSocksPort: 1090,
      preset: 'basic',
      engineLogLevel: 'warning',
    });
    expect(Object.isFrozen(compiler.settings)).toBe(true);
  });

  it('compiles a link into a document and its canonical text', () => {
    const result = new LinkConfigCompiler().compile(TLS_LINK, { httpPort: 2080, socksPort: 2090 });

    expect(result.link.userId).toBe(TEST_USER_ID);
    expect(result.bindings).toEqual({ listen: '127.0.0.1', httpProxyPort: 2080, socks5ProxyPort: 2090 });
    expect(result.document.inbounds.map((inbound) => inbound.port)).toEqual([2080, 2090]);
    expect(result.text).toBe(serialize(result.document));
  });

  it('applies custom default ports', () => {
    const compiler = new LinkConfigCompiler({ defaultHttpPort: 8108, defaultSocksPort: 8107 });

    expect(compiler.compile(TLS_LINK).bindings).toMatchObject({ httpProxyPort: 8108, socks5ProxyPort: 8107 });
  });

  it('rejects an invalid default port up front', () => {
    const error = captureError(() => new LinkConfigCompiler({ defaultHttpPort: 0 }));

    expect(error).toBeInstanceOf(InvalidPortError);
    expect(error).toMatchObject({ field: 'defaultHttpPort' });
  });

  it('rejects defaults that collide', () => {
    const compiler = new LinkConfigCompiler({ defaultHttpPort: 1090 });

    expect(() => compiler.compile(TLS_LINK)).toThrowError(InvalidPortError);
  });

  it('rejects unmapped params in strict mode', () => {
    const compiler = new LinkConfigCompiler({ strict: true });

    expect(() => compiler.compile(`${TLS_LINK.replace('#MyNode', '')}&foo=bar`)).toThrowError(
      UnsupportedTransportError,
    );
  });

  it('warns about unmapped params in lenient mode', () => {
    const { logger, lines } = createCapturingLogger();
    const compiler = new LinkConfigCompiler({}, logger);

    const result = compiler.compile(`vless://${TEST_USER_ID}@example.com:443?security=tls&foo=bar`);

    expect(result.document.outbounds[0].unmappedParams).toEqual({ foo: 'bar' });
    const warning = lines().find((line) => line.level === 40);
    expect(warning).toMatchObject({
      params: ['foo'],
      msg: 'link params without mapping kept under unmappedParams',
    });
  });

  it('treats a __proto__ param like any other unmapped key', () => {
    const link = `vless://${TEST_USER_ID}@example.com:443?security=tls&__proto__=x`;

    const result = new LinkConfigCompiler().compile(link);
    expect(Object.keys(result.document.outbounds[0].unmappedParams ?? {})).toEqual(['__proto__']);
    expect(result.text).toContain('      "unmappedParams": {\n        "__proto__": "x"\n      }');

    expect(() => new LinkConfigCompiler({ strict: true }).compile(link)).toThrowError(
      UnsupportedTransportError,
    );
  });

  it('builds the full preset when configured', () => {
    const result = new LinkConfigCompiler({ preset: 'full' }).compile(TLS_LINK);

    expect(result.document.outbounds).toHaveLength(3);
    expect(result.document.routing?.domainStrategy).toBe('AsIs');
  });
});
