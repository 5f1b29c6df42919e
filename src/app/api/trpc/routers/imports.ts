import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import { paymentRecordSchema } from "@/app/lib/validation/schemas";

export const importsRouter = router({
  /**
   * Upserts one payment keyed by its invoice (or charge) id and child
   */
  payment: publicProcedure.input(paymentRecordSchema).mutation(async ({ ctx, input }) => {
    return ctx.services.imports.importPayment(input);
  }),

  batch: publicProcedure
    .input(z.object({ records: z.array(paymentRecordSchema).min(1).max(1000) }))
    .mutation(async ({ ctx, input }) => {
      return ctx.services.imports.importBatch(input.records);
    }),
});
