import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import { amountSchema, calendarDateSchema, idSchema } from "@/app/lib/validation/schemas";

export const sponsorshipsRouter = router({
  create: publicProcedure
    .input(
      z.object({
        donorId: idSchema,
        childId: idSchema,
        monthlyAmount: amountSchema,
        startDate: calendarDateSchema.optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return ctx.services.sponsorships.createSponsorship(input);
    }),

  end: publicProcedure
    .input(z.object({ id: idSchema, endDate: calendarDateSchema.optional() }))
    .mutation(async ({ ctx, input }) => {
      return ctx.services.sponsorships.endSponsorship(input.id, input.endDate);
    }),

  getById: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return ctx.services.sponsorships.getSponsorship(input.id);
  }),

  /**
   * Sponsorships of one donor or one child, oldest first
   */
  list: publicProcedure
    .input(z.union([z.object({ donorId: idSchema }), z.object({ childId: idSchema })]))
    .query(async ({ ctx, input }) => {
      return ctx.services.sponsorships.listSponsorships(input);
    }),
});
