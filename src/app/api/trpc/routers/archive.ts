import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import { archivableEntitySchema, idSchema } from "@/app/lib/validation/schemas";

const targetSchema = z.object({ entityType: archivableEntitySchema, id: idSchema });

/**
 * Soft delete, restore and hard delete for donors, children and projects
 */
export const archiveRouter = router({
  archive: publicProcedure.input(targetSchema).mutation(async ({ ctx, input }) => {
    return ctx.services.archive.archive(input.entityType, input.id);
  }),

  restore: publicProcedure.input(targetSchema).mutation(async ({ ctx, input }) => {
    return ctx.services.archive.restore(input.entityType, input.id);
  }),

  delete: publicProcedure.input(targetSchema).mutation(async ({ ctx, input }) => {
    await ctx.services.archive.hardDelete(input.entityType, input.id);
    return { success: true };
  }),
});
