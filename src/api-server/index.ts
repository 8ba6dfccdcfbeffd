// ================================================================================================
// API SERVER: read-only views and permissionless maintenance calls over HTTP
//
// Uses Hono served by @hono/node-server. Every handler runs synchronously against the
// in-process environment; rejected calls come back as 400 with the revert code.
// ================================================================================================

import { serve } from '@hono/node-server';
import { Hono, type Context } from 'hono';
import { cors } from 'hono/cors';
import { ZodError, z } from 'zod';
import { createLogger, safeStringify } from '@/utils';
import type { Environment } from '@/core/environment';
import { RevertError, isRevertError } from '@/core/errors';
import type { LedgerLog } from '@/core/types';

const log = createLogger('[ApiServer]');

const RECENT_LOG_LIMIT = 200;

export interface ApiServerInput {
  env: Environment;
}

const CategoryParamSchema = z.coerce.number().int().positive();
const TopQuerySchema = z.object({ size: z.coerce.number().int().positive() });
const SpotPriceQuerySchema = z.object({ tokenIn: z.string().min(1), tokenOut: z.string().min(1) });
const TokenBodySchema = z.object({ token: z.string().min(1) });
const LogsQuerySchema = z.object({ limit: z.coerce.number().int().positive().max(RECENT_LOG_LIMIT).default(50) });

type Status = 200 | 400 | 500;

/** JSON with BigInt support */
function json(c: Context, data: unknown, status: Status = 200): Response {
  return c.body(safeStringify(data), status, { 'Content-Type': 'application/json' });
}

async function readBody<T>(c: Context, schema: z.ZodType<T>): Promise<T> {
  const raw: unknown = await c.req.json().catch(() => undefined);
  return schema.parse(raw);
}

export function createApiServer(input: ApiServerInput): Hono {
  const { env } = input;
  const { controller, categories } = env;
  const app = new Hono();

  // ── Recent committed logs ──
  const recentLogs: LedgerLog[] = [];
  env.eventBus.onLog((entry) => {
    recentLogs.push(entry);
    if (recentLogs.length > RECENT_LOG_LIMIT) recentLogs.shift();
  });

  app.use('*', cors());

  app.onError((error, c) => {
    if (isRevertError(error)) {
      log.debug(`❌ ${c.req.method} ${c.req.path} rejected: ${error.message}`);
      return json(c, { error: error.code, message: error.message }, 400);
    }
    if (error instanceof ZodError) {
      return json(c, { error: 'ERR_BAD_REQUEST', message: error.issues.map((issue) => issue.message).join('; ') }, 400);
    }
    log.error(`${c.req.method} ${c.req.path} failed:`, error);
    return json(c, { error: 'ERR_INTERNAL', message: error.message }, 500);
  });

  // ════════════════════════════════════════════════════════════
  // HEALTH
  // ════════════════════════════════════════════════════════════

  app.get('/health', (c) =>
    json(c, {
      status: 'ok',
      uptime: process.uptime(),
      now: env.clock.now(),
      pools: controller.listPools().length,
      memoryMB: Math.round(process.memoryUsage().heapUsed / 1024 / 1024),
    }),
  );

  // ════════════════════════════════════════════════════════════
  // POOLS
  // ════════════════════════════════════════════════════════════

  app.get('/pools', (c) => {
    const pools = controller.listPools().map(({ address, meta }) => {
      const pool = controller.getPool(address);
      return { address, name: pool.name, symbol: pool.symbol, tokens: pool.getCurrentTokens(), meta };
    });
    return json(c, { count: pools.length, pools });
  });

  app.get('/pools/:address', (c) => json(c, controller.getPool(c.req.param('address')).snapshot()));

  app.get('/pools/:address/meta', (c) => json(c, controller.getPoolMeta(c.req.param('address'))));

  app.get('/pools/:address/spot-price', (c) => {
    const { tokenIn, tokenOut } = SpotPriceQuerySchema.parse(c.req.query());
    const spotPrice = controller.getPool(c.req.param('address')).getSpotPrice(tokenIn, tokenOut);
    return json(c, { tokenIn, tokenOut, spotPrice });
  });

  app.post('/pools/:address/reweigh', (c) => {
    const address = c.req.param('address');
    controller.reweighPool(address);
    log.info(`⚖️ reweigh of ${address} requested over HTTP`);
    return json(c, controller.getPoolMeta(address));
  });

  app.post('/pools/:address/reindex', (c) => {
    const address = c.req.param('address');
    controller.reindexPool(address);
    log.info(`🔁 reindex of ${address} requested over HTTP`);
    return json(c, controller.getPoolMeta(address));
  });

  app.post('/pools/:address/minimum-balance', async (c) => {
    const address = c.req.param('address');
    const { token } = await readBody(c, TokenBodySchema);
    controller.updateMinimumBalance(address, token);
    return json(c, { token, minimumBalance: controller.getPool(address).getMinimumBalance(token) });
  });

  app.post('/pools/:address/gulp', async (c) => {
    const { token } = await readBody(c, TokenBodySchema);
    const balance = controller.getPool(c.req.param('address')).gulp(token);
    return json(c, { token, balance });
  });

  // ════════════════════════════════════════════════════════════
  // TOKENS
  // ════════════════════════════════════════════════════════════

  app.get('/tokens', (c) =>
    json(
      c,
      env.tokens.getAllTokensArray().map((token) => ({ ...token, totalSupply: env.tokens.formatTotalSupply(token.address) })),
    ),
  );

  app.get('/tokens/:symbol', (c) => {
    const symbol = c.req.param('symbol');
    const token = env.tokens.findTokenBySymbol(symbol);
    if (!token) throw new RevertError('ERR_TOKEN_NOT_FOUND', symbol);
    return json(c, {
      ...token,
      totalSupply: env.tokens.formatTotalSupply(token.address),
      hasPrice: env.oracle.hasObservationInWindow(token.address, env.oracle.bucketKey(env.clock.now())),
    });
  });

  // ════════════════════════════════════════════════════════════
  // CATEGORIES
  // ════════════════════════════════════════════════════════════

  app.get('/categories', (c) => json(c, categories.listCategories()));

  app.get('/categories/:id', (c) => {
    const id = CategoryParamSchema.parse(c.req.param('id'));
    return json(c, { ...categories.getCategory(id), marketCaps: categories.getCategoryMarketCaps(id) });
  });

  app.get('/categories/:id/top', (c) => {
    const id = CategoryParamSchema.parse(c.req.param('id'));
    const { size } = TopQuerySchema.parse(c.req.query());
    return json(c, { categoryID: id, tokens: categories.getTopCategoryTokens(id, size) });
  });

  app.post('/categories/:id/sort', (c) => {
    const id = CategoryParamSchema.parse(c.req.param('id'));
    return json(c, { categoryID: id, tokens: categories.orderCategoryTokensByMarketCap(id) });
  });

  // ════════════════════════════════════════════════════════════
  // LOGS
  // ════════════════════════════════════════════════════════════

  app.get('/logs', (c) => {
    const { limit } = LogsQuerySchema.parse(c.req.query());
    return json(c, recentLogs.slice(-limit));
  });

  return app;
}

// ════════════════════════════════════════════════════════════════
// START API SERVER (Node HTTP via @hono/node-server)
// ════════════════════════════════════════════════════════════════

export function startApiServer(port: number, deps: ApiServerInput): { server: ReturnType<typeof serve>; app: Hono } {
  const app = createApiServer(deps);
  const server = serve({ fetch: app.fetch, port });
  log.info(`🖥️  API on http://localhost:${port}`);
  return { server, app };
}
