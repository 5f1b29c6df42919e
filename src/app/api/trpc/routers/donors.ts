import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import type { Donor } from "@/app/lib/repositories/types";
import { fullAddress } from "@/app/lib/utils/donor-identity";
import { donorHintsSchema, idSchema, listSchema, mergeSelectionsSchema } from "@/app/lib/validation/schemas";

const withAddress = (donor: Donor) => ({ ...donor, fullAddress: fullAddress(donor) });

export const donorsRouter = router({
  getById: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return withAddress(await ctx.services.donors.getDonor(input.id));
  }),

  /**
   * Donors merged into another donor never appear, whatever the visibility
   */
  list: publicProcedure.input(listSchema).query(async ({ ctx, input }) => {
    const result = await ctx.services.donors.listDonors(input);
    return { donors: result.donors.map(withAddress), totalCount: result.totalCount };
  }),

  create: publicProcedure.input(donorHintsSchema).mutation(async ({ ctx, input }) => {
    return withAddress(await ctx.services.donors.createDonor(input));
  }),

  update: publicProcedure
    .input(donorHintsSchema.extend({ id: idSchema }))
    .mutation(async ({ ctx, input }) => {
      const { id, ...hints } = input;
      return withAddress(await ctx.services.donors.updateDonor(id, hints));
    }),

  findOrUpdate: publicProcedure
    .input(z.object({ donor: donorHintsSchema, transactionDate: z.coerce.date().optional() }))
    .mutation(async ({ ctx, input }) => {
      const { donor, created } = await ctx.services.donors.findOrUpdateDonor(
        input.donor,
        input.transactionDate
      );
      return { donor: withAddress(donor), created };
    }),

  lastDonationDate: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return { date: await ctx.services.donors.lastDonationDate(input.id) };
  }),

  merge: publicProcedure
    .input(
      z.object({
        donorIds: z.array(idSchema).min(2),
        fieldSelections: mergeSelectionsSchema.default({}),
      })
    )
    .mutation(async ({ ctx, input }) => {
      const result = await ctx.services.donorMerge.mergeDonors(input.donorIds, input.fieldSelections);
      return { ...result, mergedDonor: withAddress(result.mergedDonor) };
    }),
});
