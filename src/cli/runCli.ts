import { chmod, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import yargs from 'yargs';

import { LinkConfigCompiler } from '../compiler';
import { parseEnv, type Env } from '../lib/env';
import { CompilerError, formatCompilerError, toErrorMessage } from '../lib/errors';
import { createCliLogger, type CliLogger } from '../lib/logger';
import { CONFIG_PRESETS, readRemoteEndpoint, type ConfigPreset } from '../modules/config';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  logger?: CliLogger;
}

interface CliRequest {
  link: string;
  httpPort?: number;
  socksPort?: number;
  output: string;
  toStdout: boolean;
  strict: boolean;
  preset: ConfigPreset;
}

class CliUsageError extends Error {}

const EPILOG = `Samples:
  vless2json 'vless://<UUID>@example.com:443?security=reality&encryption=none'
  vless2json --http-proxy 1080 'vless://<UUID>@example.com:443?...'
  vless2json --socks5-proxy 1090 'vless://<UUID>@example.com:443?...'`;

async function parseRequest(args: string[], env: Env): Promise<CliRequest | undefined> {
  const requests: CliRequest[] = [];

  const parser = yargs(args)
    .scriptName('vless2json')
    .command(
      '$0 <link>',
      'Convert a VLESS link into an Xray client config',
      (builder) =>
        builder
          .positional('link', {
            type: 'string',
            demandOption: true,
            describe: 'VLESS link in format of vless://<uuid>@host:port?[query...]',
          })
          .option('http-proxy', {
            type: 'number',
            describe: 'Local HTTP proxy port (1080 by default)',
          })
          .option('socks5-proxy', {
            type: 'number',
            describe: 'Local SOCKS5 proxy port (1090 by default)',
          })
          .option('output', {
            alias: 'o',
            type: 'string',
            default: env.VLESS2JSON_OUTPUT,
            describe: 'Where to write the config',
          })
          .option('stdout', {
            type: 'boolean',
            default: false,
            describe: 'Print the config instead of writing a file',
          })
          .option('strict', {
            type: 'boolean',
            default: env.VLESS2JSON_STRICT,
            describe: 'Reject link params that have no mapping',
          })
          .option('preset', {
            type: 'string',
            choices: CONFIG_PRESETS,
            default: env.VLESS2JSON_PRESET,
            describe: 'basic: proxy outbound only, full: adds stats, api and routing',
          }),
      (argv) => {
        requests.push({
          link: argv.link,
          ...(argv['http-proxy'] !== undefined ? { httpPort: argv['http-proxy'] } : {}),
          ...(argv['socks5-proxy'] !== undefined ? { socksPort: argv['socks5-proxy'] } : {}),
          output: argv.output,
          toStdout: argv.stdout,
          strict: argv.strict,
          preset: argv.preset,
        });
      },
    )
    .epilog(EPILOG)
    .strict()
    .version(false)
    .help()
    .exitProcess(false)
    .fail((message: string | undefined, error: Error | undefined) => {
      throw error ?? new CliUsageError(message ?? 'Invalid arguments');
    });

  await parser.parseAsync();
  return requests[0];
}

export async function runCli(args: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(`${text}\n`));

  let env: Env;
  try {
    env = parseEnv(deps.env ?? process.env);
  } catch (error) {
    stderr(toErrorMessage(error));
    return EXIT_FAILURE;
  }

  let request: CliRequest | undefined;
  try {
    request = await parseRequest(args, env);
  } catch (error) {
    stderr(toErrorMessage(error));
    return EXIT_USAGE;
  }

  if (!request) return EXIT_OK;

  const logger = deps.logger ?? createCliLogger(env);

  try {
    const compiler = new LinkConfigCompiler(
      {
        strict: request.strict,
        preset: request.preset,
        engineLogLevel: env.VLESS2JSON_ENGINE_LOGLEVEL,
      },
      logger,
    );

    const result = compiler.compile(request.link, {
      ...(request.httpPort !== undefined ? { httpPort: request.httpPort } : {}),
      ...(request.socksPort !== undefined ? { socksPort: request.socksPort } : {}),
    });

    if (request.toStdout) {
      stdout(result.text.trimEnd());
      return EXIT_OK;
    }

    const outputPath = resolve(deps.cwd ?? process.cwd(), request.output);
    await writeFile(outputPath, result.text, 'utf8');
    if (process.platform !== 'win32') {
      await chmod(outputPath, 0o600);
    }

    const remote = readRemoteEndpoint(result.text);
    logger.info(
      {
        output: outputPath,
        address: remote.address,
        port: remote.port,
        httpProxyPort: result.bindings.httpProxyPort,
        socks5ProxyPort: result.bindings.socks5ProxyPort,
      },
      'config written',
    );

    stdout(`Config written to ${outputPath}`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof CompilerError) {
      logger.debug({ err: error, field: error.field }, 'link compilation failed');
      stderr(formatCompilerError(error));
      return EXIT_FAILURE;
    }

    logger.error({ err: error }, 'command failed');
    stderr(toErrorMessage(error));
    return EXIT_FAILURE;
  }
}
