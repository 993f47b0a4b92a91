import type { Logger } from 'pino';
import { z } from 'zod';

import { InvalidPortError } from './lib/errors';
import { isValidPort, MAX_PORT, MIN_PORT } from './lib/validation';
import {
  buildDocument,
  CONFIG_PRESETS,
  DEFAULT_HTTP_PROXY_PORT,
  DEFAULT_SOCKS5_PROXY_PORT,
  ENGINE_LOG_LEVELS,
  resolveBindings,
  serialize,
  type LocalBindings,
  type ProxyConfigDocument,
} from './modules/config';
import { parseLink, type ProxyLink } from './modules/link';

const compilerSettingsSchema = z
  .object({
    strict: z.boolean().default(false),
    defaultHttpPort: z.number().default(DEFAULT_HTTP_PROXY_PORT),
    defaultSocksPort: z.number().default(DEFAULT_SOCKS5_PROXY_PORT),
    preset: z.enum(CONFIG_PRESETS).default('basic'),
    engineLogLevel: z.enum(ENGINE_LOG_LEVELS).default('warning'),
  })
  .strict();

export type CompilerSettings = Readonly<z.infer<typeof compilerSettingsSchema>>;
export type CompilerSettingsInput = z.input<typeof compilerSettingsSchema>;

export interface PortOverrides {
  httpPort?: number;
  socksPort?: number;
}

export interface CompileResult {
  link: ProxyLink;
  bindings: LocalBindings;
  document: ProxyConfigDocument;
  text: string;
}

export class LinkConfigCompiler {
  public readonly settings: CompilerSettings;

  public constructor(
    settings: CompilerSettingsInput = {},
    private readonly logger?: Logger,
  ) {
    this.settings = Object.freeze(compilerSettingsSchema.parse(settings));
    this.checkDefaultPort('defaultHttpPort', this.settings.defaultHttpPort);
    this.checkDefaultPort('defaultSocksPort', this.settings.defaultSocksPort);
  }

  public compile(raw: string, ports: PortOverrides = {}): CompileResult {
    const link = parseLink(raw);
    const bindings = resolveBindings(ports.httpPort, ports.socksPort, {
      httpProxyPort: this.settings.defaultHttpPort,
      socks5ProxyPort: this.settings.defaultSocksPort,
    });

    const document = buildDocument(link, bindings, {
      policy: this.settings.strict ? 'strict' : 'lenient',
      preset: this.settings.preset,
      engineLogLevel: this.settings.engineLogLevel,
    });

    const [proxy] = document.outbounds;
    if (proxy.unmappedParams) {
      this.logger?.warn(
        { params: Object.keys(proxy.unmappedParams) },
        'link params without mapping kept under unmappedParams',
      );
    }

    this.logger?.debug(
      {
        link: { userId: link.userId, host: link.host, port: link.port, name: link.name },
        bindings,
        preset: this.settings.preset,
        strict: this.settings.strict,
      },
      'config document built',
    );

    return { link, bindings, document, text: serialize(document) };
  }

  private checkDefaultPort(field: string, value: number): void {
    if (isValidPort(value)) return;

    throw new InvalidPortError({
      field,
      message: `default port ${value} should be an integer in range ${MIN_PORT}..${MAX_PORT}`,
    });
  }
}
