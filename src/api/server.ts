import Fastify, {
  type FastifyBaseLogger,
  type FastifyInstance,
  type RawReplyDefaultExpression,
  type RawRequestDefaultExpression,
  type RawServerDefault
} from 'fastify';
import cors from '@fastify/cors';
import { logger } from '../lib/logger.js';
import type { FleetScout } from '../services/scout.js';
import { MEMORY_FILTER_NOTE } from '../services/selector.js';

export interface ApiServerOptions {
  port?: number;
  host?: string;
  allowedOrigins?: string[];
  logRequests?: boolean;
}

const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

// browsers on the scouting box itself, plus whatever the config allows
export function isOriginAllowed(origin: string, allowedOrigins: string[]): boolean {
  if (allowedOrigins.includes(origin)) return true;
  try {
    return LOOPBACK_HOSTS.has(new URL(origin).hostname);
  } catch {
    return false;
  }
}

interface FreshQuery {
  fresh?: boolean;
}

interface SelectQuery extends FreshQuery {
  needGpu?: boolean;
  maxCpu?: number;
  minMemoryGb?: number;
}

const freshSchema = {
  type: 'object',
  properties: {
    fresh: { type: 'boolean', default: false }
  }
} as const;

const selectSchema = {
  type: 'object',
  properties: {
    fresh: { type: 'boolean', default: false },
    needGpu: { type: 'boolean', default: false },
    maxCpu: { type: 'number', minimum: 0 },
    minMemoryGb: { type: 'number', minimum: 0 }
  }
} as const;

export class ScoutApiServer {
  private app: FastifyInstance | null = null;
  private scout: FleetScout;
  private port: number;
  private host: string;
  private allowedOrigins: string[];
  private logRequests: boolean;

  constructor(scout: FleetScout, options: ApiServerOptions = {}) {
    this.scout = scout;
    this.port = options.port ?? 4100;
    this.host = options.host ?? '127.0.0.1';
    this.allowedOrigins = options.allowedOrigins ?? [];
    this.logRequests = options.logRequests ?? true;
  }

  // builds the app without listening, tests drive it through inject()
  async build(): Promise<FastifyInstance> {
    if (this.app) return this.app;

    const app = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({
      logger,
      disableRequestLogging: !this.logRequests
    });

    // disallowed origins get no cors headers, the browser does the blocking
    await app.register(cors, {
      origin: (origin, callback) => {
        callback(null, !origin || isOriginAllowed(origin, this.allowedOrigins));
      }
    });

    app.setErrorHandler((err, request, reply) => {
      if (err.validation) {
        return reply.code(400).send({ error: 'invalid request', message: err.message });
      }
      request.log.error({ err }, 'request failed');
      return reply.code(500).send({ error: 'internal error', message: err.message });
    });

    app.get('/health', async () => {
      return {
        status: 'ok',
        hosts: this.scout.hosts.length,
        gpuHosts: this.scout.gpuHosts().length
      };
    });

    app.get<{ Querystring: FreshQuery }>('/hosts', { schema: { querystring: freshSchema } }, async request => {
      return { hosts: await this.scout.checkAll(!request.query.fresh) };
    });

    app.get<{ Querystring: FreshQuery }>('/hosts/gpu', { schema: { querystring: freshSchema } }, async request => {
      return { hosts: await this.scout.checkGpuHosts(!request.query.fresh) };
    });

    app.get<{ Querystring: FreshQuery }>('/hosts/free', { schema: { querystring: freshSchema } }, async request => {
      return { hosts: await this.scout.findFree(!request.query.fresh) };
    });

    app.get<{ Params: { name: string }; Querystring: FreshQuery }>(
      '/hosts/:name',
      { schema: { querystring: freshSchema } },
      async (request, reply) => {
        const snapshot = await this.scout.checkHost(request.params.name, !request.query.fresh);
        if (!snapshot) {
          return reply.code(404).send({ error: 'unknown host', message: `${request.params.name} is not configured` });
        }
        return snapshot;
      }
    );

    app.get<{ Querystring: SelectQuery }>('/select', { schema: { querystring: selectSchema } }, async (request, reply) => {
      const { fresh, needGpu, maxCpu, minMemoryGb } = request.query;
      const result = await this.scout.findBest({ needGpu, maxCpu, minMemoryGb }, !fresh);

      const note = result.approximateMemory ? MEMORY_FILTER_NOTE : undefined;
      if (!result.best) {
        return reply.code(404).send({ error: 'no hosts match criteria', candidates: result.candidates, note });
      }
      return { host: result.best, candidates: result.candidates, note };
    });

    app.delete('/cache', async () => {
      this.scout.invalidateAll();
      return { cleared: true };
    });

    this.app = app;
    return app;
  }

  async start(): Promise<void> {
    const app = await this.build();
    await app.listen({ port: this.port, host: this.host });
    logger.info({ port: this.port, host: this.host }, 'scout api server started');
  }

  async stop(): Promise<void> {
    if (this.app) {
      await this.app.close();
      this.app = null;
      logger.info('scout api server stopped');
    }
  }
}
