/**
 * @module http/app
 *
 * The Fastify application: tile, health, viewport, stats and map page
 * routes. Request and response shapes are zod schemas checked by
 * `fastify-type-provider-zod`.
 *
 * | Method | Path                  |                                      |
 * | ------ | --------------------- | ------------------------------------ |
 * | GET    | `/tiles/:z/:x/:y.pbf` | MVT tile, possibly empty             |
 * | GET    | `/health`             | `OK`                                 |
 * | POST   | `/update-view`        | record the map viewport              |
 * | GET    | `/get-bounds`         | the recorded viewport                |
 * | GET    | `/stats`              | count and area of the viewport       |
 * | GET    | `/`                   | interactive map                      |
 *
 * Errors are answered as `{ status: 'error', message }`; anything that
 * is not a client error becomes a 500 without detail.
 */

import Fastify, { type FastifyError } from 'fastify';
import type { Logger } from 'pino';
import { z } from 'zod';
import {
  hasZodFastifySchemaValidationErrors,
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import type { TileService } from '../service.js';
import type { ViewState } from '../types.js';
import { isValidTile, MAX_SUPPORTED_ZOOM } from '../tiles.js';
import { renderMapPage } from './map-page.js';

export const MVT_CONTENT_TYPE = 'application/vnd.mapbox-vector-tile';

/** The map page requests tiles up to this zoom and overzooms beyond. */
const MAP_SOURCE_MAX_ZOOM = 16;

export interface HttpSettings {
  /** `max-age` of rendered tiles, in seconds. @defaultValue 3600 */
  cacheMaxAge?: number;
  /** `Access-Control-Allow-Origin` value. @defaultValue '*' */
  corsOrigin?: string;
}

export interface BuildAppOptions {
  service: TileService;
  logger: Logger;
  settings?: HttpSettings;
}

// ─── Schemas ────────────────────────────────────────────────────────────────

const tileParamsSchema = z.object({
  z: z.coerce.number().int().min(0),
  x: z.coerce.number().int().min(0),
  y: z.coerce.number().int().min(0),
});

const boundsSchema = z.object({
  north: z.number().finite(),
  south: z.number().finite(),
  east: z.number().finite(),
  west: z.number().finite(),
});

const updateViewBodySchema = z
  .object({
    bounds: boundsSchema.nullish(),
    zoom: z.number().finite().nullish(),
  })
  .nullish();

const viewResponseSchema = boundsSchema.extend({ zoom: z.number().nullable() }).nullable();

const statusResponseSchema = z.object({
  status: z.enum(['ok', 'error']),
  message: z.string().optional(),
});

const statsResponseSchema = z.object({
  count: z.number(),
  area: z.number(),
  bounds: viewResponseSchema,
});

function mapQuerySchema(minZoom: number) {
  return z.object({
    lng: z.coerce.number().min(-180).max(180).default(5.12),
    lat: z.coerce.number().min(-90).max(90).default(52.09),
    zoom: z.coerce.number().min(0).max(24).default(15),
    minzoom: z.coerce.number().int().min(0).max(24).default(minZoom),
    color: z.string().regex(/^#[0-9a-fA-F]{6}$/).default('#3388ff'),
    opacity: z.coerce.number().min(0).max(1).default(0.6),
  });
}

function viewBody(view: ViewState | null): z.infer<typeof viewResponseSchema> {
  return view === null ? null : { ...view.bounds, zoom: view.zoom };
}

// ─── App ────────────────────────────────────────────────────────────────────

/**
 * Build the application without listening.
 *
 * @example
 * ```typescript
 * const app = await buildApp({ service, logger });
 * await app.listen({ host: '127.0.0.1', port: 8080 });
 * ```
 */
export async function buildApp({ service, logger, settings }: BuildAppOptions) {
  const cacheMaxAge = settings?.cacheMaxAge ?? 3600;
  const corsOrigin = settings?.corsOrigin ?? '*';

  const app = Fastify({ loggerInstance: logger });
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  app.addHook('onSend', async (_request, reply, payload) => {
    reply.header('Access-Control-Allow-Origin', corsOrigin);
    return payload;
  });

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (hasZodFastifySchemaValidationErrors(err)) {
      return reply.code(400).send({ status: 'error', message: err.message });
    }
    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      return reply.code(statusCode).send({ status: 'error', message: err.message });
    }
    request.log.error({ err }, 'Request failed');
    return reply.code(500).send({ status: 'error', message: 'Internal Server Error' });
  });

  const typed = app.withTypeProvider<ZodTypeProvider>();

  typed.options('/*', async (_request, reply) => {
    return reply
      .header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS')
      .header('Access-Control-Allow-Headers', 'Content-Type')
      .code(204)
      .send();
  });

  typed.get(
    '/tiles/:z/:x/:y.pbf',
    { schema: { params: tileParamsSchema } },
    async (request, reply) => {
      const { z: zoom, x, y } = request.params;
      if (!isValidTile(zoom, x, y, MAX_SUPPORTED_ZOOM)) {
        return reply.code(400).send({ status: 'error', message: `Invalid tile ${zoom}/${x}/${y}` });
      }

      // Abort the store query when the client goes away before the reply.
      const controller = new AbortController();
      const onClose = (): void => {
        if (!reply.raw.writableFinished) controller.abort();
      };
      reply.raw.on('close', onClose);

      try {
        const outcome = await service.renderTile(zoom, x, y, controller.signal);
        const { tile } = outcome;
        return reply
          .header('Content-Type', MVT_CONTENT_TYPE)
          .header(
            'Cache-Control',
            outcome.status === 'degraded' ? 'no-store' : `public, max-age=${cacheMaxAge}`,
          )
          .header('X-Tile-Status', outcome.status)
          .send(Buffer.from(tile.buffer, tile.byteOffset, tile.byteLength));
      } finally {
        reply.raw.off('close', onClose);
      }
    },
  );

  typed.get('/health', async (_request, reply) => {
    return reply.type('text/plain').send('OK');
  });

  typed.post(
    '/update-view',
    {
      schema: {
        body: updateViewBodySchema,
        response: { 200: statusResponseSchema, 400: statusResponseSchema },
      },
    },
    async (request, reply) => {
      const bounds = request.body?.bounds;
      if (bounds === undefined || bounds === null) {
        return reply.code(400).send({ status: 'error', message: 'No bounds provided' });
      }
      service.updateView(bounds, request.body?.zoom ?? null);
      return { status: 'ok' as const };
    },
  );

  typed.get(
    '/get-bounds',
    { schema: { response: { 200: z.object({ bounds: viewResponseSchema }) } } },
    async () => ({ bounds: viewBody(service.currentView()) }),
  );

  typed.get(
    '/stats',
    { schema: { response: { 200: statsResponseSchema } } },
    async () => {
      const snapshot = service.stats();
      if (snapshot === null) return { count: 0, area: 0, bounds: null };
      return { count: snapshot.count, area: snapshot.area, bounds: viewBody(snapshot.view) };
    },
  );

  typed.get(
    '/',
    { schema: { querystring: mapQuerySchema(service.options.minZoom) } },
    async (request, reply) => {
      const q = request.query;
      const html = await renderMapPage({
        lng: q.lng,
        lat: q.lat,
        zoom: q.zoom,
        minZoom: q.minzoom,
        sourceMaxZoom: Math.min(MAP_SOURCE_MAX_ZOOM, service.options.maxZoom),
        layerName: service.options.layerName,
        color: q.color,
        opacity: q.opacity,
      });
      return reply.type('text/html; charset=utf-8').send(html);
    },
  );

  await app.ready();
  return app;
}
