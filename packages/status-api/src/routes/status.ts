import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { NotFoundError } from "@oficios/core/errors";
import type { BatchStatusView } from "@oficios/core/status/statusService";
import type { UnitRecord } from "@oficios/core/types";
import { parseUnitId } from "@oficios/core/utils/ids";

export interface StatusReader {
  getBatchStatus(batchId: string): Promise<BatchStatusView>;
  getUnitStatus(unitId: string): Promise<UnitRecord>;
}

export interface StatusRouteDependencies {
  status: StatusReader;
}

const ID_PATTERN = /^[A-Za-z0-9_-]+$/;

const batchParamsSchema = z.object({
  batch_id: z.string().trim().min(1).max(128).regex(ID_PATTERN),
});

const unitParamsSchema = z.object({
  unit_id: z
    .string()
    .trim()
    .min(1)
    .max(160)
    .regex(ID_PATTERN)
    .refine((value) => parseUnitId(value) !== null, "Not a unit id"),
});

export type UnitStatusResponse = Omit<UnitRecord, "claims">;

/** Claim tokens are worker bookkeeping and stay out of the public view. */
export function toUnitStatusResponse(unit: UnitRecord): UnitStatusResponse {
  const { claims: _claims, ...view } = unit;
  return view;
}

function badRequest(reply: FastifyReply, error: z.ZodError): FastifyReply {
  return reply.status(400).send({
    error: "BAD_REQUEST",
    message: error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; "),
  });
}

function failed(request: FastifyRequest, reply: FastifyReply, error: unknown, context: string): FastifyReply {
  if (error instanceof NotFoundError) {
    return reply.status(404).send({ error: "NOT_FOUND", message: error.message });
  }

  request.log.error({ err: error }, context);
  return reply.status(500).send({ error: "INTERNAL_ERROR" });
}

export async function registerStatusRoutes(
  app: FastifyInstance,
  dependencies: StatusRouteDependencies,
): Promise<void> {
  app.get("/batches/:batch_id/status", async (request, reply) => {
    const params = batchParamsSchema.safeParse(request.params);
    if (!params.success) {
      return badRequest(reply, params.error);
    }

    try {
      return reply.send(await dependencies.status.getBatchStatus(params.data.batch_id));
    } catch (error) {
      return failed(request, reply, error, "batch-status failed");
    }
  });

  app.get("/units/:unit_id/status", async (request, reply) => {
    const params = unitParamsSchema.safeParse(request.params);
    if (!params.success) {
      return badRequest(reply, params.error);
    }

    try {
      const unit = await dependencies.status.getUnitStatus(params.data.unit_id);
      return reply.send(toUnitStatusResponse(unit));
    } catch (error) {
      return failed(request, reply, error, "unit-status failed");
    }
  });
}
