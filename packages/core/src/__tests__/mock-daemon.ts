/**
 * In-process stand-in for the RA daemon's control API.
 *
 * Listens on an ephemeral loopback port, answers /reload and /status with
 * whatever the test scripted, and records every request it sees.
 */

import Fastify, { type FastifyInstance, type FastifyReply } from 'fastify';

export interface ScriptedResponse {
  status: number;
  /** Objects are sent as JSON, strings as text/plain, undefined as an empty body */
  body?: string | object;
  /** Hold the response back this long */
  delayMs?: number;
}

export interface RecordedRequest {
  method: string;
  url: string;
  contentType: string | undefined;
  body: unknown;
}

export type Route = '/reload' | '/status';

export interface MockDaemon {
  host: string;
  requests: RecordedRequest[];
  respond(route: Route, response: ScriptedResponse): void;
  close(): Promise<void>;
}

async function send(reply: FastifyReply, response: ScriptedResponse): Promise<FastifyReply> {
  if (response.delayMs) {
    await new Promise((resolve) => setTimeout(resolve, response.delayMs));
  }
  reply.code(response.status);
  if (response.body === undefined) {
    return reply.send();
  }
  if (typeof response.body === 'string') {
    return reply.type('text/plain').send(response.body);
  }
  return reply.type('application/json').send(JSON.stringify(response.body));
}

export async function startMockDaemon(): Promise<MockDaemon> {
  const app: FastifyInstance = Fastify({ logger: false });
  const requests: RecordedRequest[] = [];
  const script = new Map<Route, ScriptedResponse>([
    ['/reload', { status: 200 }],
    ['/status', { status: 200, body: { interfaces: [] } }],
  ]);

  const byId = new Map<string, RecordedRequest>();

  app.addHook('onRequest', async (request) => {
    const recorded: RecordedRequest = {
      method: request.method,
      url: request.url,
      contentType: request.headers['content-type'],
      body: undefined,
    };
    requests.push(recorded);
    byId.set(request.id, recorded);
  });

  app.addHook('preHandler', async (request) => {
    const recorded = byId.get(request.id);
    if (recorded) recorded.body = request.body;
  });

  app.post('/reload', async (_request, reply) => send(reply, script.get('/reload') ?? { status: 200 }));
  app.get('/status', async (_request, reply) => send(reply, script.get('/status') ?? { status: 200 }));

  await app.listen({ port: 0, host: '127.0.0.1' });
  const address = app.server.address();
  if (address === null || typeof address === 'string') {
    throw new Error(`unexpected listen address: ${String(address)}`);
  }
  const { port } = address;

  return {
    host: `127.0.0.1:${port}`,
    requests,
    respond(route, response) {
      script.set(route, response);
    },
    close: async () => {
      await app.close();
    },
  };
}
