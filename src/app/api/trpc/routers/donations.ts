import { z } from "zod";
import { router, publicProcedure } from "@/app/api/trpc/trpc";
import type { Donation } from "@/app/lib/repositories/types";
import { needsReview } from "@/app/lib/utils/donation-status";
import {
  createDonationSchema,
  donationStatusSchema,
  idSchema,
  paginationSchema,
} from "@/app/lib/validation/schemas";

const withReviewFlag = (donation: Donation) => ({ ...donation, needsReview: needsReview(donation.status) });

const listDonationsSchema = paginationSchema.extend({
  view: z.enum(["all", "pending_review", "active"]).default("all"),
});

export const donationsRouter = router({
  /**
   * Create a donation, resolving the donor and matching a sponsorship when a child is named
   */
  create: publicProcedure.input(createDonationSchema).mutation(async ({ ctx, input }) => {
    return withReviewFlag(await ctx.services.donations.createDonation(input));
  }),

  getById: publicProcedure.input(z.object({ id: idSchema })).query(async ({ ctx, input }) => {
    return withReviewFlag(await ctx.services.donations.getDonation(input.id));
  }),

  list: publicProcedure.input(listDonationsSchema).query(async ({ ctx, input }) => {
    const { view, limit, offset } = input;
    const result = await ctx.services.donations.listDonations({ view }, { limit, offset });
    return { donations: result.donations.map(withReviewFlag), totalCount: result.totalCount };
  }),

  forSubscription: publicProcedure
    .input(paginationSchema.extend({ subscriptionId: z.string().min(1) }))
    .query(async ({ ctx, input }) => {
      const { subscriptionId, limit, offset } = input;
      const result = await ctx.services.donations.listDonations(
        { view: "for_subscription", subscriptionId },
        { limit, offset }
      );
      return { donations: result.donations.map(withReviewFlag), totalCount: result.totalCount };
    }),

  updateStatus: publicProcedure
    .input(
      z.object({
        id: idSchema,
        status: donationStatusSchema,
        reason: z.string().nullable().optional(),
      })
    )
    .mutation(async ({ ctx, input }) => {
      return withReviewFlag(
        await ctx.services.donations.updateDonationStatus(input.id, input.status, input.reason)
      );
    }),

  statusSummary: publicProcedure.query(async ({ ctx }) => {
    return ctx.services.donations.statusSummary();
  }),
});
