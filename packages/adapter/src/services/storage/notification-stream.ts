import type { Agent } from 'node:http';
import { request as httpRequest } from 'node:http';
import { request as httpsRequest } from 'node:https';
import { createInterface } from 'node:readline';
import type { Readable } from 'node:stream';
import { Hash } from '@smithy/hash-node';
import { SignatureV4 } from '@smithy/signature-v4';
import { z } from 'zod';
import type { ResourceAddress } from '@/services/storage/address';
import type { ListenOptions, NotificationInfo, NotificationRecord } from '@/services/storage/backend';

const recordSchema = z.object({
  eventName: z.string(),
  eventTime: z.string().default(''),
  s3: z.object({
    bucket: z.object({ name: z.string() }),
    object: z.object({
      key: z.string(),
      size: z.number().nonnegative().default(0),
    }),
  }),
});

const notificationSchema = z.object({
  Records: z.array(recordSchema).nullish(),
});

export interface SignedRequest {
  protocol: 'http:' | 'https:';
  hostname: string;
  port?: number;
  path: string;
  headers: Record<string, string>;
}

export interface TransportResponse {
  statusCode: number;
  body: Readable;
}

/** Opens a streaming GET; resolves once response headers are in. */
export type NotificationTransport = (
  request: SignedRequest,
  signal: AbortSignal
) => Promise<TransportResponse>;

export interface NotificationStreamOptions {
  endpoint: ResourceAddress;
  region: string;
  credentials: {
    accessKeyId: string;
    secretAccessKey: string;
  };
  agent?: Agent;
  userAgent?: string;
  transport?: NotificationTransport;
}

export class NotificationStreamError extends Error {
  readonly Code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'NotificationStreamError';
    this.Code = code;
  }
}

const nodeTransport =
  (agent: Agent | undefined): NotificationTransport =>
  (request, signal) =>
    new Promise<TransportResponse>((resolve, reject) => {
      const send = request.protocol === 'https:' ? httpsRequest : httpRequest;
      const outgoing = send(
        {
          protocol: request.protocol,
          hostname: request.hostname,
          port: request.port,
          path: request.path,
          method: 'GET',
          headers: request.headers,
          agent,
          signal,
        },
        (response) => resolve({ statusCode: response.statusCode ?? 0, body: response })
      );
      outgoing.on('error', reject);
      outgoing.end();
    });

const readAll = async (body: Readable): Promise<string> => {
  const chunks: Buffer[] = [];
  for await (const chunk of body) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
};

const errorFromResponse = (statusCode: number, text: string): NotificationStreamError => {
  const code = text.match(/<Code>([^<]+)<\/Code>/)?.[1] ?? `HTTP${statusCode}`;
  const message = text.match(/<Message>([^<]+)<\/Message>/)?.[1] ?? `Notification request failed with status ${statusCode}`;
  return new NotificationStreamError(message, code);
};

const toRecords = (line: string): NotificationRecord[] => {
  const parsed = notificationSchema.parse(JSON.parse(line));
  return (parsed.Records ?? []).map((record) => ({
    eventName: record.eventName,
    eventTime: record.eventTime,
    bucketName: record.s3.bucket.name,
    key: record.s3.object.key,
    size: record.s3.object.size,
  }));
};

/**
 * Reads newline-delimited notification documents. Blank lines are keep-alives;
 * a line that fails to parse is reported and reading continues.
 */
export async function* readNotifications(body: Readable): AsyncGenerator<NotificationInfo, void, undefined> {
  const lines = createInterface({ input: body, crlfDelay: Infinity });
  try {
    for await (const line of lines) {
      if (line.trim().length === 0) {
        continue;
      }
      try {
        yield { ok: true, records: toRecords(line) };
      } catch (error) {
        yield { ok: false, error };
      }
    }
  } finally {
    lines.close();
  }
}

/**
 * Listens for bucket notifications over the backend's long-lived
 * notification endpoint, signing the request with the client's credentials.
 */
export class NotificationStream {
  private readonly signer: SignatureV4;

  private readonly transport: NotificationTransport;

  constructor(private readonly options: NotificationStreamOptions) {
    this.signer = new SignatureV4({
      service: 's3',
      region: options.region,
      credentials: options.credentials,
      sha256: Hash.bind(null, 'sha256'),
    });
    this.transport = options.transport ?? nodeTransport(options.agent);
  }

  async sign(listen: Omit<ListenOptions, 'signal'>): Promise<SignedRequest> {
    const { endpoint } = this.options;
    const [hostname = endpoint.host, portText] = endpoint.host.split(':');
    const port = portText ? Number(portText) : undefined;
    const query: Record<string, string | string[]> = {
      prefix: listen.prefix,
      suffix: listen.suffix,
      events: listen.events,
    };
    const path = `/${encodeURIComponent(listen.bucket)}`;

    const headers: Record<string, string> = { host: endpoint.host };
    if (this.options.userAgent) {
      headers['user-agent'] = this.options.userAgent;
    }

    const signed = await this.signer.sign({
      method: 'GET',
      protocol: endpoint.isSecure ? 'https:' : 'http:',
      hostname,
      port,
      path,
      query,
      headers,
    });

    const search = new URLSearchParams();
    search.append('prefix', listen.prefix);
    search.append('suffix', listen.suffix);
    for (const event of listen.events) {
      search.append('events', event);
    }

    return {
      protocol: endpoint.isSecure ? 'https:' : 'http:',
      hostname,
      port,
      path: `${path}?${search.toString().replace(/\+/g, '%20')}`,
      headers: signed.headers,
    };
  }

  async *listen(listen: ListenOptions): AsyncGenerator<NotificationInfo, void, undefined> {
    const { signal } = listen;
    try {
      const request = await this.sign(listen);
      const response = await this.transport(request, signal);
      if (response.statusCode !== 200) {
        yield { ok: false, error: errorFromResponse(response.statusCode, await readAll(response.body)) };
        return;
      }
      yield* readNotifications(response.body);
    } catch (error) {
      if (signal.aborted) {
        return;
      }
      yield { ok: false, error };
    }
  }
}
