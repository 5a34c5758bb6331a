import { fileURLToPath } from 'node:url';
import { serve } from '@hono/node-server';
import { zValidator } from '@hono/zod-validator';
import {
  type Encoding,
  type EncodingRegistry,
  RanktokError,
  UnknownModelError,
  encodingNameForModel,
  getDefaultRegistry,
  listEncodingNames,
  loadConfig,
  setLogLevel,
} from '@ranktok/core';
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { HTTPException } from 'hono/http-exception';
import { z } from 'zod';

// ============================================================================
// @ranktok/server — REST API
// ============================================================================
//
// Encode, decode and count over HTTP. Encodings come from one registry and
// are loaded on first use; validation failures answer 400, ranktok errors
// 422, anything else 500.
// ============================================================================

const VERSION = '0.1.0';

export interface AppOptions {
  /** Registry to serve from; the process-wide one by default. */
  registry?: EncodingRegistry;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

// --- Schemas ---
const selectorSchema = {
  encoding: z.string().min(1).max(64).optional(),
  model: z.string().min(1).max(200).optional(),
};

const encodeSchema = z.object({
  text: z.string().max(4_000_000),
  ...selectorSchema,
  allowedSpecial: z.union([z.literal('all'), z.array(z.string().min(1)).max(1000)]).optional(),
});

const decodeSchema = z.object({
  tokens: z.array(z.number().int().min(0)).max(4_000_000),
  ...selectorSchema,
  strict: z.boolean().optional().default(false),
});

function validationError(error: z.ZodError) {
  const issue = error.issues[0];
  const where = issue?.path.length ? `${issue.path.join('.')}: ` : '';
  return { error: { code: 'VALIDATION_ERROR', message: `${where}${issue?.message ?? 'invalid body'}` } };
}

const encodeValidator = zValidator('json', encodeSchema, (result, c) => {
  if (!result.success) return c.json(validationError(result.error), 400);
});

const decodeValidator = zValidator('json', decodeSchema, (result, c) => {
  if (!result.success) return c.json(validationError(result.error), 400);
});

export function createApp(options: AppOptions = {}): Hono {
  const app = new Hono();
  const registry = (): EncodingRegistry => options.registry ?? getDefaultRegistry();

  function resolve(selector: { encoding?: string; model?: string }): Promise<Encoding> {
    if (selector.model !== undefined) {
      return registry().forModel(selector.model);
    }
    return registry().get(selector.encoding ?? registry().defaultEncoding);
  }

  // --- Middleware ---
  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    }),
  );

  // --- Error handling ---
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }
    if (err instanceof RanktokError) {
      return c.json({ error: { code: err.name, message: err.message } }, 422);
    }
    console.error(`[ranktok-api] ${c.req.method} ${c.req.path} — ${errorMessage(err)}`);
    return c.json({ error: { code: 'INTERNAL_ERROR', message: errorMessage(err) } }, 500);
  });

  // --- Routes ---
  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      service: 'ranktok-api',
      version: VERSION,
      loaded: registry().loaded(),
      cache: registry().stats(),
    }),
  );

  app.get('/v1/encodings', (c) =>
    c.json({
      encodings: listEncodingNames(),
      default: registry().defaultEncoding,
    }),
  );

  app.get('/v1/models/:model', (c) => {
    const model = c.req.param('model');
    try {
      return c.json({ model, encoding: encodingNameForModel(model) });
    } catch (err: unknown) {
      if (err instanceof UnknownModelError) {
        return c.json({ error: { code: err.name, message: err.message } }, 404);
      }
      throw err;
    }
  });

  app.post('/v1/encode', encodeValidator, async (c) => {
    const body = c.req.valid('json');
    const enc = await resolve(body);
    const tokens = enc.encode(body.text, { allowedSpecial: body.allowedSpecial });
    return c.json({ encoding: enc.name, tokens, count: tokens.length });
  });

  app.post('/v1/count', encodeValidator, async (c) => {
    const body = c.req.valid('json');
    const enc = await resolve(body);
    return c.json({ encoding: enc.name, count: enc.count(body.text, { allowedSpecial: body.allowedSpecial }) });
  });

  app.post('/v1/decode', decodeValidator, async (c) => {
    const body = c.req.valid('json');
    const enc = await resolve(body);
    const text = body.strict ? enc.decode(body.tokens) : enc.decodeLossy(body.tokens);
    return c.json({ encoding: enc.name, text });
  });

  return app;
}

export const app = createApp();

// --- Start ---
export function startServer(port?: number) {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const listenPort = port ?? config.port;
  console.log(`[ranktok-api] Server starting on port ${listenPort}`);
  serve({
    fetch: app.fetch,
    port: listenPort,
  });

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

// Graceful shutdown
function shutdown() {
  console.log('[ranktok-api] Shutting down...');
  getDefaultRegistry().dispose();
  process.exit(0);
}

const isDirectExecution = process.argv[1] ? fileURLToPath(import.meta.url) === process.argv[1] : false;

if (isDirectExecution) {
  startServer();
}
