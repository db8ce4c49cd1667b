import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { requireLogin, resolveUser } from '../auth/identity';
import { createRequestContext, type RequestContext } from '../contracts/context';
import type { LastVisitStorageBackend } from '../contracts/storage';
import { LastVisitError } from '../errors';
import { updateLastVisits } from '../lastVisit/batchVisitWriter';
import { toRecord, type FieldFilter } from '../lastVisit/projector';
import { getLastVisits } from '../lastVisit/visitReader';
import type { BugRef } from '../types';

// ---------- Schemas ----------
// blank segments are dropped, so `ids=` reads as an empty list
const splitList = (v: unknown) =>
  typeof v === 'string'
    ? v
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean)
    : v;

const bugRefSchema = z
  .union([z.number().int().positive(), z.string().trim().min(1)])
  .transform((ref): BugRef => (typeof ref === 'string' && /^[1-9]\d*$/.test(ref) ? Number(ref) : ref));

const idsSchema = z.preprocess(splitList, z.array(bugRefSchema));
const fieldListSchema = z.preprocess(splitList, z.array(z.string().trim().min(1)));

const paramsSchema = z.object({
  ids: idsSchema.optional(),
  include_fields: fieldListSchema.optional(),
  exclude_fields: fieldListSchema.optional(),
});

const pathSchema = z.object({
  id: z.coerce.number().int().positive(),
});

type LastVisitParams = z.infer<typeof paramsSchema>;

export interface LastVisitRouteOptions {
  storage: LastVisitStorageBackend;
  apiKeyHeader?: string;
  maxBatchSize?: number;
}

const RESOURCE = '/bug_user_last_visit';
const SINGLE = `${RESOURCE}/:id(^\\d+)`;

// ---------- Helpers ----------
function sendError(req: FastifyRequest, reply: FastifyReply, err: unknown) {
  if (err instanceof LastVisitError) {
    return reply.code(err.status).send({ error: err.code, message: err.message, ...err.details });
  }
  if (err instanceof z.ZodError) {
    return reply.code(400).send({ error: 'invalid_param', details: err.flatten() });
  }
  req.log.error({ err }, 'Unhandled error in last-visit route');
  return reply.code(500).send({ error: 'internal_error' });
}

function fieldFilter(params: LastVisitParams): FieldFilter {
  return { include: params.include_fields, exclude: params.exclude_fields };
}

/** Query and body are merged; the single-id route forces `ids` to the path id. */
function parseParams(req: FastifyRequest, source: unknown): LastVisitParams {
  const params = paramsSchema.parse(source ?? {});
  if (req.params && typeof req.params === 'object' && 'id' in req.params) {
    const { id } = pathSchema.parse(req.params);
    return { ...params, ids: [id] };
  }
  return params;
}

function mergeSources(req: FastifyRequest): Record<string, unknown> {
  const query = isRecord(req.query) ? req.query : {};
  const body = isRecord(req.body) ? req.body : {};
  return { ...query, ...body };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------- Routes ----------
export async function registerLastVisitRoutes(app: FastifyInstance, opts: LastVisitRouteOptions) {
  const { storage } = opts;

  async function withContext(req: FastifyRequest, reply: FastifyReply, run: (ctx: RequestContext) => Promise<unknown>) {
    try {
      const user = await resolveUser(req, storage, opts.apiKeyHeader);
      const ctx = createRequestContext(user, storage, req.log);
      return reply.send(await run(ctx));
    } catch (err) {
      return sendError(req, reply, err);
    }
  }

  // Record a visit
  const update = (req: FastifyRequest, reply: FastifyReply) =>
    withContext(req, reply, async (ctx) => {
      // login is checked before the params are looked at
      requireLogin(ctx.user);
      const params = parseParams(req, mergeSources(req));
      const written = await updateLastVisits(ctx, params.ids, { maxBatchSize: opts.maxBatchSize });
      const filter = fieldFilter(params);
      return written.map((record) => toRecord(record.bugId, record.lastVisitTs, filter));
    });

  // Read visits
  const get = (req: FastifyRequest, reply: FastifyReply) =>
    withContext(req, reply, async (ctx) => {
      requireLogin(ctx.user);
      const params = parseParams(req, mergeSources(req));
      const entries = await getLastVisits(ctx, params.ids);
      const filter = fieldFilter(params);
      return entries.map((entry) => toRecord(entry.bugId, entry.lastVisitTs, filter));
    });

  app.post(RESOURCE, update);
  app.post(SINGLE, update);
  app.get(RESOURCE, get);
  app.get(SINGLE, get);
}
