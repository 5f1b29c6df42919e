import { NotFoundError } from "@/app/lib/errors";
import {
  createTestChild,
  createTestDonor,
  createTestProject,
  createTestServices,
  TEST_NOW,
} from "@/__tests__/factories";

describe("ArchiveService", () => {
  const sponsoredSetup = async () => {
    const { store, services } = createTestServices();
    const donor = await createTestDonor(store, { email: "jane@example.com" });
    const child = await createTestChild(store);
    const sponsorship = await services.sponsorships.createSponsorship({
      donorId: donor.id,
      childId: child.id,
      monthlyAmount: 3000,
      startDate: "2025-01-01",
    });
    // Attaching the sponsorship locks its rows; start each case from a clean lock log
    store.locks.splice(0);
    return { store, services, donor, child, sponsorship };
  };

  describe("archive", () => {
    it("should refuse to archive records with active sponsorships", async () => {
      const { store, services, donor, child, sponsorship } = await sponsoredSetup();

      await expect(services.archive.archive("donor", donor.id)).rejects.toThrow(
        "Cannot archive donor with active sponsorships"
      );
      await expect(services.archive.archive("child", child.id)).rejects.toThrow(
        "Cannot archive child with active sponsorships"
      );
      await expect(services.archive.archive("project", sponsorship.projectId)).rejects.toThrow(
        "Cannot archive project with active sponsorships"
      );
      expect(store.locks).toEqual([
        `donors:${donor.id}`,
        `children:${child.id}`,
        `projects:${sponsorship.projectId}`,
      ]);
    });

    it("should archive once the sponsorship has ended", async () => {
      const { services, donor, sponsorship } = await sponsoredSetup();
      await services.sponsorships.endSponsorship(sponsorship.id, "2025-05-31");

      const archived = await services.archive.archive("donor", donor.id);

      expect(archived.archivedAt).toEqual(TEST_NOW);
    });

    it("should leave an archived record as it is", async () => {
      const { store, services } = createTestServices();
      const archivedAt = new Date(2024, 11, 1);
      const child = await createTestChild(store, { archivedAt });

      const result = await services.archive.archive("child", child.id);

      expect(result.archivedAt).toEqual(archivedAt);
    });

    it("should allow archiving the general fund", async () => {
      const { services } = createTestServices();
      const fund = await services.projects.getGeneralFundProject();

      const archived = await services.archive.archive("project", fund.id);

      expect(archived.archivedAt).toEqual(TEST_NOW);
    });
  });

  describe("restore", () => {
    it("should clear the archive timestamp", async () => {
      const { store, services } = createTestServices();
      const project = await createTestProject(store, { archivedAt: new Date(2025, 0, 1) });

      const restored = await services.archive.restore("project", project.id);

      expect(restored.archivedAt).toBeNull();
    });

    it("should refuse to restore a donor whose email is taken", async () => {
      const { store, services } = createTestServices();
      const archived = await createTestDonor(store, {
        email: "jane@example.com",
        archivedAt: new Date(2025, 0, 1),
      });
      await createTestDonor(store, { email: "JANE@example.com" });

      await expect(services.archive.restore("donor", archived.id)).rejects.toThrow(
        "email has already been taken"
      );
    });

    it("should refuse to restore a merged donor", async () => {
      const { store, services } = createTestServices();
      const survivor = await createTestDonor(store, { email: "keep@example.com" });
      const merged = await createTestDonor(store, {
        email: "gone@example.com",
        archivedAt: new Date(2025, 0, 1),
        mergedIntoId: survivor.id,
      });

      await expect(services.archive.restore("donor", merged.id)).rejects.toThrow(
        `Cannot restore donor merged into donor ${survivor.id}`
      );
    });
  });

  describe("hardDelete", () => {
    it("should refuse to delete records with donations or sponsorships", async () => {
      const { services, donor, child, sponsorship } = await sponsoredSetup();
      await services.sponsorships.endSponsorship(sponsorship.id, "2025-05-31");

      await expect(services.archive.hardDelete("donor", donor.id)).rejects.toThrow(
        "Cannot delete donor with existing donations or sponsorships"
      );
      await expect(services.archive.hardDelete("child", child.id)).rejects.toThrow(
        "Cannot delete child with existing donations or sponsorships"
      );
    });

    it("should refuse to delete a donor with donations", async () => {
      const { store, services } = createTestServices();
      const donor = await createTestDonor(store, { email: "jane@example.com" });
      await services.donations.createDonation({
        donorId: donor.id,
        amount: 1000,
        date: "2025-06-01",
        paymentMethod: "check",
      });

      await expect(services.archive.hardDelete("donor", donor.id)).rejects.toThrow(
        "Cannot delete donor with existing donations or sponsorships"
      );
    });

    it("should delete records without dependents", async () => {
      const { store, services } = createTestServices();
      const child = await createTestChild(store);

      await services.archive.hardDelete("child", child.id);

      expect(store.state.children).toHaveLength(0);
      expect(store.locks).toEqual([`children:${child.id}`]);
    });

    it("should refuse to delete system projects", async () => {
      const { services } = createTestServices();
      const fund = await services.projects.getGeneralFundProject();

      await expect(services.archive.hardDelete("project", fund.id)).rejects.toThrow(
        "Cannot delete system projects"
      );
    });

    it("should fail for missing records", async () => {
      const { services } = createTestServices();

      await expect(services.archive.hardDelete("child", 99)).rejects.toBeInstanceOf(NotFoundError);
      await expect(services.archive.archive("donor", 99)).rejects.toThrow("Donor with ID 99 not found");
    });
  });
});
