import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { ZodIssue } from 'zod';
import { answerSchema, likertSchema, nicknameSchema } from '../../application/index.js';
import { createEnvelope } from '../../domain/index.js';
import { isUnavailable } from './stream-routes.js';

export const NICKNAME_CATEGORY = 'NICKNAME';

/** Category under which updates for one Likert scale or question are published. */
export function audienceCategory(id: string): string {
  return `A-${id}`;
}

function validationFailed(reply: FastifyReply, issues: ZodIssue[]) {
  return reply.status(400).send({ status: 'error', message: 'Validation error', issues });
}

/**
 * Audience interaction routes of a live presentation.
 *
 * POST /nickname         : anonymous login, broadcasts the nickname list
 * GET  /nickname/:uuid   : nickname for one uuid
 * GET  /nicknames        : all nicknames
 * POST /likert           : vote on a Likert scale, broadcasts the agreement %
 * GET  /likerts          : all votes
 * GET  /likert/:id       : agreement % of one scale
 * POST /answer           : free-text answer, broadcasts all answers to the question
 * GET  /answer/:qid      : answers to one question
 * GET  /answers          : all answers
 *
 * State is updated first, then the change is published. A publish that fails
 * because the engine is unreachable answers 503; the state change stays.
 */
async function audienceRoutes(fastify: FastifyInstance): Promise<void> {

  async function broadcast(
    request: FastifyRequest,
    reply: FastifyReply,
    category: string,
    data: unknown,
  ): Promise<boolean> {
    try {
      await fastify.fanout.publish(createEnvelope(JSON.stringify(data), category));
      return true;
    } catch (err: unknown) {
      if (!isUnavailable(err)) throw err;
      request.log.error({ err, category }, 'Failed to publish audience update');
      await reply.status(503).send({ status: 'error', message: 'Event stream unavailable' });
      return false;
    }
  }

  // --------------------------------------------------
  // Nicknames
  // --------------------------------------------------

  fastify.post('/nickname', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = nicknameSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error.issues);

    const nicknames = fastify.audience.setNickname(parsed.data.uuid, parsed.data.user);
    request.log.info({ count: nicknames.length }, 'Nickname registered');

    if (!(await broadcast(request, reply, NICKNAME_CATEGORY, { nicknames }))) return reply;
    return reply.status(200).send({ status: 'success', message: 'Data received' });
  });

  fastify.get(
    '/nickname/:uuid',
    async (request: FastifyRequest<{ Params: { uuid: string } }>, reply: FastifyReply) => {
      const { uuid } = request.params;
      const nickname = fastify.audience.getNickname(uuid);
      if (nickname === undefined) {
        return reply.status(200).send({ warning: `No name found for the given uuid: ${uuid}` });
      }
      return reply.status(200).send({ nickname });
    },
  );

  fastify.get('/nicknames', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ nicknames: fastify.audience.listNicknames() });
  });

  // --------------------------------------------------
  // Likert scales
  // --------------------------------------------------

  fastify.post('/likert', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = likertSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error.issues);

    const { likert, user, value } = parsed.data;
    if (!fastify.audience.isKnownUser(user)) {
      return reply.status(400).send({ status: 'error', message: 'Unknown user can not vote' });
    }

    const percentage = fastify.audience.vote(likert, user, value);
    if (!(await broadcast(request, reply, audienceCategory(likert), { percentage }))) return reply;
    return reply
      .status(200)
      .send({ status: 'success', message: `Data received for key ${likert}` });
  });

  fastify.get('/likerts', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ likert: fastify.audience.allVotes() });
  });

  fastify.get(
    '/likert/:likertId',
    async (request: FastifyRequest<{ Params: { likertId: string } }>, reply: FastifyReply) => {
      const { likertId } = request.params;
      const percentage = fastify.audience.percentage(likertId);
      if (percentage === null) {
        return reply
          .status(200)
          .send({ warning: `No likert scores found for the given likert id: ${likertId}` });
      }
      return reply.status(200).send({ likert: percentage });
    },
  );

  // --------------------------------------------------
  // Answers
  // --------------------------------------------------

  fastify.post('/answer', async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = answerSchema.safeParse(request.body);
    if (!parsed.success) return validationFailed(reply, parsed.error.issues);

    const { answer, qid, user } = parsed.data;
    if (!fastify.audience.isKnownUser(user)) {
      request.log.warn({ user }, 'Answer from unknown user');
      return reply.status(400).send({ status: 'error', message: 'Unknown uuid' });
    }

    const answers = fastify.audience.answer(qid, user, answer);
    if (!(await broadcast(request, reply, audienceCategory(qid), { qid, answers }))) return reply;
    return reply.status(200).send({ status: 'success', message: 'Data received' });
  });

  fastify.get(
    '/answer/:qid',
    async (request: FastifyRequest<{ Params: { qid: string } }>, reply: FastifyReply) => {
      const { qid } = request.params;
      const answers = fastify.audience.answersFor(qid);
      if (answers === null) {
        return reply
          .status(200)
          .send({ warning: `No answers found for the given question: ${qid}` });
      }
      return reply.status(200).send({ answers });
    },
  );

  fastify.get('/answers', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ answers: fastify.audience.allAnswers() });
  });
}

export default fp(audienceRoutes, {
  name: 'audience-routes',
  dependencies: ['fanout'],
  fastify: '5.x',
});
