import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { HTTP_STATUS_BY_KIND, ValidationError, type InventoryError } from '../errors';
import { FIELD_BY_COLUMN } from '../sheets/columns';
import { TOOL_STATUSES, DEFAULT_TOOL_STATUS } from '../types';
import type { ToolInventory } from '../service/toolInventory';

// ---------- Schemas ----------
const requiredText = (field: string) => z.string({ required_error: `${field} required` }).trim().min(1, `${field} required`);

const optionalText = z
  .string()
  .nullish()
  .transform((v) => (v ? v : null));

// blank form input means "no date"
const purchaseDate = z
  .preprocess(
    (v) => (v === '' ? null : v),
    z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, 'purchaseDate must be YYYY-MM-DD')
      .refine(isCalendarDate, 'purchaseDate is not a calendar date')
      .nullish(),
  )
  .transform((v) => v ?? null);

const createSchema = z.preprocess(
  acceptColumnLabels,
  z.object({
    name: requiredText('name'),
    modelNumber: requiredText('modelNumber'),
    type: requiredText('type'),
    storageLocation: requiredText('storageLocation'),
    status: z.enum(TOOL_STATUSES).default(DEFAULT_TOOL_STATUS),
    purchaseDate,
    purchasePrice: z
      .number({ invalid_type_error: 'purchasePrice must be a number' })
      .nonnegative('purchasePrice must not be negative')
      .nullish()
      .transform((v) => v ?? null),
    recommendedReplacement: optionalText,
    remarks: optionalText,
    imageUrl: optionalText,
  }),
);

const idParamsSchema = z.object({
  id: z.string().min(1, 'id required'),
});

const statusSchema = z.object({
  status: z.enum(TOOL_STATUSES),
});

// ---------- Helpers ----------
function badRequest(reply: FastifyReply, error: z.ZodError) {
  const detail = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
  const invalid = new ValidationError(detail, { cause: error });
  return reply
    .code(HTTP_STATUS_BY_KIND[invalid.kind])
    .send({ error: invalid.kind, detail: invalid.message, issues: error.flatten() });
}

function failure(req: FastifyRequest, reply: FastifyReply, error: InventoryError) {
  const statusCode = HTTP_STATUS_BY_KIND[error.kind];
  if (statusCode >= 500) {
    req.log.error({ err: error }, 'Inventory request failed');
  }
  return reply.code(statusCode).send({ error: error.kind, detail: error.message });
}

/**
 * Request bodies may name fields by their sheet header label (名称, 状態, ...)
 * as well as by field name. The field name wins when both are given.
 */
function acceptColumnLabels(body: unknown): unknown {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return body;
  const normalized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    const field = FIELD_BY_COLUMN.get(key);
    if (field && field !== 'id') {
      if (!(field in body)) normalized[field] = value;
    } else {
      normalized[key] = value;
    }
  }
  return normalized;
}

function isCalendarDate(value: string): boolean {
  const date = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === value;
}

// ---------- Routes ----------
export async function registerToolRoutes(app: FastifyInstance, inventory: ToolInventory) {
  // Register
  app.post('/tools', async (req, reply) => {
    const parsed = createSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(reply, parsed.error);

    const result = await inventory.create(parsed.data);
    if (!result.ok) return failure(req, reply, result.error);
    return reply.code(201).send(result.value);
  });

  // List
  app.get('/tools', async (req, reply) => {
    const result = await inventory.list();
    if (!result.ok) return failure(req, reply, result.error);
    return reply.send(result.value);
  });

  // Status change
  app.put('/tools/:id/status', async (req, reply) => {
    const params = idParamsSchema.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = statusSchema.safeParse(req.body);
    if (!body.success) return badRequest(reply, body.error);

    const result = await inventory.updateStatus(params.data.id, body.data.status);
    if (!result.ok) return failure(req, reply, result.error);
    return reply.send(result.value);
  });
}
