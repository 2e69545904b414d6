import type { FastifyInstance } from 'fastify';
import { commentTargetTypeSchema, createCommentSchema } from '@smart-recipe/shared';
import { ApiError } from '../../http/errors';
import { protectedRoute, publicRoute, requireUser } from '../../http/procedures';
import { ok } from '../../http/response';
import { parseInput, queryParam } from '../../http/validate';
import { createComment, loadCommentTree } from './helpers';

export async function commentsRoutes(app: FastifyInstance) {
  // Threaded comments on a recipe or post
  app.get('/comment', publicRoute, async (request) => {
    const targetType = queryParam(request.query, 'targetType');
    const targetId = queryParam(request.query, 'targetId');
    if (!targetType || !targetId) {
      throw new ApiError({ code: 'BAD_REQUEST', message: 'Missing parameters' });
    }

    // An unknown target type has no comments
    const parsed = commentTargetTypeSchema.safeParse(targetType);
    if (!parsed.success) return ok([]);

    return ok(await loadCommentTree(app.db, parsed.data, targetId));
  });

  app.post('/comment/create', protectedRoute, async (request) => {
    const user = requireUser(request);
    const input = parseInput(createCommentSchema, request.body, 'Comment failed');
    const comment = await createComment(app.db, user, input);

    request.log.info({ commentId: comment.id, targetType: input.targetType }, 'comment created');
    return ok(comment, 'Comment posted');
  });
}
