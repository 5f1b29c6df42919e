import { createTestChild, createTestDonor } from "@/__tests__/factories";
import { createTestCaller, expectTRPCError } from "@/__tests__/utils/trpc-router-test-utils";

describe("sponsorshipsRouter", () => {
  const setup = async () => {
    const context = createTestCaller();
    const donor = await createTestDonor(context.store, { name: "Jane Roe", email: "jane@example.com" });
    const child = await createTestChild(context.store, { name: "Maria" });
    return { ...context, donor, child };
  };

  it("should create, list and end sponsorships", async () => {
    const { caller, donor, child } = await setup();

    const sponsorship = await caller.sponsorships.create({
      donorId: donor.id,
      childId: child.id,
      monthlyAmount: 3000,
      startDate: "2025-01-01",
    });
    const ended = await caller.sponsorships.end({ id: sponsorship.id, endDate: "2025-04-30" });
    const listed = await caller.sponsorships.list({ childId: child.id });

    expect(ended.endDate).toBe("2025-04-30");
    expect(listed).toEqual([expect.objectContaining({ id: sponsorship.id, endDate: "2025-04-30" })]);
  });

  it("should refuse a duplicate active pledge", async () => {
    const { caller, donor, child } = await setup();
    const input = { donorId: donor.id, childId: child.id, monthlyAmount: 3000 };
    await caller.sponsorships.create(input);

    await expectTRPCError(
      caller.sponsorships.create(input),
      "BAD_REQUEST",
      "Maria is already actively sponsored by Jane Roe"
    );
  });

  it("should return NOT_FOUND for unknown sponsorships", async () => {
    const { caller } = await setup();

    await expectTRPCError(caller.sponsorships.getById({ id: 8 }), "NOT_FOUND", "Sponsorship with ID 8 not found");
  });
});
