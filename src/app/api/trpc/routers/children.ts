import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import { childGenderSchema, idSchema, listSchema } from "@/app/lib/validation/schemas";

const childInputSchema = z.object({
  name: z.string().min(1).max(255),
  gender: childGenderSchema.nullable().optional(),
});

export const childrenRouter = router({
  getById: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return ctx.services.children.getChild(input.id);
  }),

  list: publicProcedure.input(listSchema).query(async ({ ctx, input }) => {
    return ctx.services.children.listChildren(input);
  }),

  create: publicProcedure.input(childInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.services.children.createChild(input);
  }),

  update: publicProcedure
    .input(childInputSchema.partial().extend({ id: idSchema }))
    .mutation(async ({ ctx, input }) => {
      const { id, ...changes } = input;
      return ctx.services.children.updateChild(id, changes);
    }),
});
