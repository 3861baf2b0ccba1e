/**
 * Navigation Router
 *
 * `resolve` answers one navigation decision. The `rules` procedures manage
 * persisted rules and require the admin token.
 */

import { TRPCError } from '@trpc/server';
import { z } from 'zod';
import { router, publicProcedure, adminProcedure } from '../trpc';
import { NavigationRuleService } from '../services/NavigationRuleService';
import { paginationSchema, resolutionRequestSchema, ruleIdSchema } from '../lib/validators';
import { ErrorCodes, type ServiceResult } from '../types';

const ruleInput = z.object({
  fromLocation: z.string().max(255),
  toLocation: z.string().max(255),
  condition: z.string().max(255),
});

function unwrap<T>(result: ServiceResult<T>): T {
  if (result.success) {
    return result.data;
  }

  let code: 'BAD_REQUEST' | 'NOT_FOUND' | 'INTERNAL_SERVER_ERROR' = 'INTERNAL_SERVER_ERROR';
  if (result.error.code === ErrorCodes.NOT_FOUND) {
    code = 'NOT_FOUND';
  } else if (result.error.code === ErrorCodes.INVALID_INPUT) {
    code = 'BAD_REQUEST';
  }

  throw new TRPCError({ code, message: result.error.message });
}

const rulesRouter = router({
  list: adminProcedure
    .input(paginationSchema.optional())
    .query(async ({ input }) => unwrap(await NavigationRuleService.listRules(input ?? { limit: 100, offset: 0 }))),

  get: adminProcedure
    .input(z.object({ id: ruleIdSchema }))
    .query(async ({ input }) => unwrap(await NavigationRuleService.getRule(input.id))),

  create: adminProcedure
    .input(ruleInput)
    .mutation(async ({ input }) => unwrap(await NavigationRuleService.createRule(input))),

  update: adminProcedure
    .input(z.object({ id: ruleIdSchema, patch: ruleInput.partial() }))
    .mutation(async ({ input }) => unwrap(await NavigationRuleService.updateRule(input.id, input.patch))),

  delete: adminProcedure
    .input(z.object({ id: ruleIdSchema }))
    .mutation(async ({ input }) => unwrap(await NavigationRuleService.deleteRule(input.id))),
});

export const navigationRouter = router({
  /**
   * Decide the next location. `unresolved` is a normal answer: the caller
   * applies its own default. A failing rule source is an error instead.
   */
  resolve: publicProcedure
    .input(resolutionRequestSchema)
    .query(({ input, ctx }) => ctx.navigation.resolver.resolveRequest(input)),

  rules: rulesRouter,
});
