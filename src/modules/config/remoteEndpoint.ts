import { z } from 'zod';

import { portSchema } from '../../lib/validation';

const vlessOutboundSchema = z.object({
  tag: z.string(),
  protocol: z.literal('vless'),
  settings: z.object({
    vnext: z
      .array(
        z.object({
          address: z.string().min(1),
          port: portSchema,
          users: z.array(z.object({ id: z.string().min(1) })).length(1),
        }),
      )
      .length(1),
  }),
});

const renderedDocumentSchema = z.object({
  outbounds: z.tuple([vlessOutboundSchema]).rest(z.unknown()),
});

export interface RemoteEndpoint {
  address: string;
  port: number;
  id: string;
}

/** Reads the remote identity fields back out of a rendered config. */
export function readRemoteEndpoint(text: string): RemoteEndpoint {
  const parsed = renderedDocumentSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    throw new Error(`Config document has no vless outbound: ${parsed.error.message}`);
  }

  const [proxy] = parsed.data.outbounds;
  const [server] = proxy.settings.vnext;
  const user = server?.users[0];
  if (!server || !user) {
    throw new Error('Config document has no vless outbound');
  }

  return {
    address: server.address,
    port: server.port,
    id: user.id,
  };
}
