/**
 * backend/src/modules/spond/spond.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for the search-and-link widget.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { SpondErrors } from './spond.errors';
import { linkBodySchema, playerParamsSchema, searchQuerySchema, unlinkParamsSchema } from './spond.schemas';
import type { SpondService } from './spond.service';

export class SpondController {
  constructor(private readonly spondService: SpondService) {}

  async search(req: FastifyRequest, reply: FastifyReply) {
    const parsed = searchQuerySchema.safeParse(req.query);
    const q = parsed.success ? parsed.data.q : '';

    const result = await this.spondService.searchMembers({ q, ip: req.ip });
    return reply.status(200).send(result);
  }

  async link(req: FastifyRequest, reply: FastifyReply) {
    const params = playerParamsSchema.safeParse(req.params);
    if (!params.success) throw SpondErrors.invalidPlayer({ issues: params.error.issues });

    const body = linkBodySchema.safeParse(req.body ?? {});
    if (!body.success) throw SpondErrors.invalidMember({ issues: body.error.issues });

    const result = await this.spondService.linkPlayer({
      playerId: params.data.playerId,
      spondMemberPk: body.data.spond_member_pk,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }

  async unlink(req: FastifyRequest, reply: FastifyReply) {
    const params = unlinkParamsSchema.safeParse(req.params);
    if (!params.success) throw SpondErrors.invalidLink({ issues: params.error.issues });

    const result = await this.spondService.unlinkPlayer({
      playerId: params.data.playerId,
      linkId: params.data.linkId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }
}
