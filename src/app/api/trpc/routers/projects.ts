import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import { idSchema, listSchema } from "@/app/lib/validation/schemas";

const projectInputSchema = z.object({
  title: z.string().min(1).max(255),
  description: z.string().nullable().optional(),
  // Sponsorship projects are provisioned with their sponsorship
  projectType: z.enum(["general", "campaign"]).optional(),
});

export const projectsRouter = router({
  getById: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return ctx.services.projects.getProject(input.id);
  }),

  list: publicProcedure.input(listSchema).query(async ({ ctx, input }) => {
    return ctx.services.projects.listProjects(input);
  }),

  create: publicProcedure.input(projectInputSchema).mutation(async ({ ctx, input }) => {
    return ctx.services.projects.createProject(input);
  }),

  update: publicProcedure
    .input(projectInputSchema.partial().extend({ id: idSchema }))
    .mutation(async ({ ctx, input }) => {
      const { id, ...changes } = input;
      return ctx.services.projects.updateProject(id, changes);
    }),

  generalFund: publicProcedure.query(async ({ ctx }) => {
    return ctx.services.projects.getGeneralFundProject();
  }),
});
