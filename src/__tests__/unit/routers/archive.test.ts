import { createTestChild, createTestDonor } from "@/__tests__/factories";
import { createTestCaller, expectTRPCError } from "@/__tests__/utils/trpc-router-test-utils";

describe("archiveRouter", () => {
  it("should block archiving while a sponsorship is active", async () => {
    const { caller, store } = createTestCaller();
    const donor = await createTestDonor(store, { email: "jane@example.com" });
    const child = await createTestChild(store);
    await caller.sponsorships.create({ donorId: donor.id, childId: child.id, monthlyAmount: 3000 });

    await expectTRPCError(
      caller.archive.archive({ entityType: "donor", id: donor.id }),
      "BAD_REQUEST",
      "Cannot archive donor with active sponsorships"
    );
  });

  it("should archive, restore and delete", async () => {
    const { caller, store } = createTestCaller();
    const child = await createTestChild(store);

    const archived = await caller.archive.archive({ entityType: "child", id: child.id });
    const restored = await caller.archive.restore({ entityType: "child", id: child.id });
    const deleted = await caller.archive.delete({ entityType: "child", id: child.id });

    expect(archived.archivedAt).not.toBeNull();
    expect(restored.archivedAt).toBeNull();
    expect(deleted).toEqual({ success: true });
    expect(store.state.children).toHaveLength(0);
  });
});
