import { ValidationError } from "@/app/lib/errors";
import {
  createTestChild,
  createTestDonor,
  createTestProject,
  createTestServices,
  TEST_TODAY,
} from "@/__tests__/factories";
import { InMemorySponsorshipRepository } from "@/__tests__/utils/in-memory-unit-of-work";

describe("SponsorshipsService", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  const setup = async () => {
    const { store, services } = createTestServices();
    const donor = await createTestDonor(store, { name: "Jane Roe", email: "jane@example.com" });
    const child = await createTestChild(store, { name: "Maria" });
    return { store, services, donor, child };
  };

  const donationFor = (donorId: number, childId: number, amount: number, date: string) => ({
    donorId,
    childId,
    amount,
    date,
    paymentMethod: "stripe",
  });

  describe("matching through donations", () => {
    it("should reuse the active sponsorship for the same donor, child and amount", async () => {
      const { store, services, donor, child } = await setup();

      const first = await services.donations.createDonation(donationFor(donor.id, child.id, 3000, "2025-05-01"));
      const second = await services.donations.createDonation(donationFor(donor.id, child.id, 3000, "2025-06-01"));

      expect(first.sponsorshipId).not.toBeNull();
      expect(second.sponsorshipId).toBe(first.sponsorshipId);
      expect(second.projectId).toBe(first.projectId);
      expect(store.state.sponsorships).toHaveLength(1);
      expect(store.state.projects).toHaveLength(1);
    });

    it("should provision a sponsorship project named after the child", async () => {
      const { store, services, donor, child } = await setup();

      const donation = await services.donations.createDonation(
        donationFor(donor.id, child.id, 3000, "2025-05-01")
      );

      expect(store.state.projects).toEqual([
        expect.objectContaining({
          id: donation.projectId,
          title: "Sponsor Maria",
          projectType: "sponsorship",
          system: false,
        }),
      ]);
      expect(store.state.sponsorships[0]).toMatchObject({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-05-01",
        endDate: null,
      });
    });

    it("should start a new sponsorship when the amount changes", async () => {
      const { store, services, donor, child } = await setup();

      const first = await services.donations.createDonation(donationFor(donor.id, child.id, 3000, "2025-05-01"));
      const second = await services.donations.createDonation(donationFor(donor.id, child.id, 5000, "2025-06-01"));

      expect(second.sponsorshipId).not.toBe(first.sponsorshipId);
      expect(store.state.sponsorships.map((s) => [s.monthlyAmount, s.endDate])).toEqual([
        [3000, null],
        [5000, null],
      ]);
    });

    it("should never reuse an ended sponsorship", async () => {
      const { store, services, donor, child } = await setup();
      const original = await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-01-01",
      });
      await services.sponsorships.endSponsorship(original.id, "2025-05-31");

      const donation = await services.donations.createDonation(
        donationFor(donor.id, child.id, 3000, "2025-06-01")
      );

      expect(donation.sponsorshipId).not.toBe(original.id);
      expect(store.state.sponsorships).toHaveLength(2);
      expect(store.state.sponsorships[1]).toMatchObject({ startDate: "2025-06-01", endDate: null });
    });

    it("should reuse the winner when a concurrent writer inserts the same pledge first", async () => {
      const { store, services, donor, child } = await setup();
      const winnerProject = await createTestProject(store, { title: "Sponsor Maria", projectType: "sponsorship" });
      const winner = await store.repositories().sponsorships.insertActive({
        donorId: donor.id,
        childId: child.id,
        projectId: winnerProject.id,
        monthlyAmount: 3000,
        startDate: "2025-05-01",
      });
      // The first lookup misses, as it would before the other transaction commits
      jest.spyOn(InMemorySponsorshipRepository.prototype, "findActive").mockResolvedValueOnce(undefined);

      const donation = await services.donations.createDonation(
        donationFor(donor.id, child.id, 3000, "2025-06-01")
      );

      expect(donation.sponsorshipId).toBe(winner.id);
      expect(donation.projectId).toBe(winnerProject.id);
      expect(store.state.sponsorships).toHaveLength(1);
      expect(store.state.projects.map((p) => p.id)).toEqual([winnerProject.id]);
    });
  });

  describe("createSponsorship", () => {
    it("should create a sponsorship starting today by default", async () => {
      const { services, donor, child } = await setup();

      const sponsorship = await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
      });

      expect(sponsorship).toMatchObject({ startDate: TEST_TODAY, endDate: null, monthlyAmount: 3000 });
    });

    it("should refuse a second active sponsorship for the same pledge", async () => {
      const { store, services, donor, child } = await setup();
      const input = { donorId: donor.id, childId: child.id, monthlyAmount: 3000 };
      await services.sponsorships.createSponsorship(input);

      await expect(services.sponsorships.createSponsorship(input)).rejects.toThrow(
        "Maria is already actively sponsored by Jane Roe"
      );
      expect(store.state.sponsorships).toHaveLength(1);
      expect(store.state.projects).toHaveLength(1);
    });

    it("should report a lost race as already sponsored", async () => {
      const { store, services, donor, child } = await setup();
      const input = { donorId: donor.id, childId: child.id, monthlyAmount: 3000 };
      await services.sponsorships.createSponsorship(input);
      jest.spyOn(InMemorySponsorshipRepository.prototype, "findActive").mockResolvedValueOnce(undefined);

      await expect(services.sponsorships.createSponsorship(input)).rejects.toBeInstanceOf(ValidationError);
      expect(store.state.projects).toHaveLength(1);
    });

    it("should restore an archived donor and child", async () => {
      const { store, services, donor, child } = await setup();
      const repos = store.repositories();
      await repos.donors.update(donor.id, { archivedAt: new Date(2025, 0, 1) });
      await repos.children.update(child.id, { archivedAt: new Date(2025, 0, 1) });

      await services.sponsorships.createSponsorship({ donorId: donor.id, childId: child.id, monthlyAmount: 3000 });

      expect(store.state.donors[0]?.archivedAt).toBeNull();
      expect(store.state.children[0]?.archivedAt).toBeNull();
    });

    it("should lock the donor and child rows before attaching", async () => {
      const { store, services, donor, child } = await setup();

      await services.sponsorships.createSponsorship({ donorId: donor.id, childId: child.id, monthlyAmount: 3000 });

      expect(store.locks).toEqual([`donors:${donor.id}`, `children:${child.id}`]);
    });

    it("should restore a donor archived after it was read", async () => {
      const { store, services, donor, child } = await setup();
      await store.repositories().donors.update(donor.id, { archivedAt: new Date(2025, 0, 1) });

      const { sponsorship } = await store.transaction((repos) =>
        services.sponsorships.findOrCreateIn(repos, { donor, child, monthlyAmount: 3000, startDate: TEST_TODAY })
      );

      expect(sponsorship.donorId).toBe(donor.id);
      expect(store.state.donors[0]?.archivedAt).toBeNull();
    });

    it("should reject amounts that are not positive whole cents", async () => {
      const { services, donor, child } = await setup();

      await expect(
        services.sponsorships.createSponsorship({ donorId: donor.id, childId: child.id, monthlyAmount: 0 })
      ).rejects.toThrow("monthly_amount must be a positive whole number of cents");
      await expect(
        services.sponsorships.createSponsorship({ donorId: donor.id, childId: child.id, monthlyAmount: 12.5 })
      ).rejects.toThrow("monthly_amount must be a positive whole number of cents");
    });

    it("should reject monthly amounts beyond the integer column range", async () => {
      const { services, donor, child } = await setup();

      await expect(
        services.sponsorships.createSponsorship({ donorId: donor.id, childId: child.id, monthlyAmount: 2147483648 })
      ).rejects.toThrow("monthly_amount must be at most 2147483647 cents");
    });

    it("should fail for a missing child", async () => {
      const { services, donor } = await setup();

      await expect(
        services.sponsorships.createSponsorship({ donorId: donor.id, childId: 999, monthlyAmount: 3000 })
      ).rejects.toThrow("Child with ID 999 not found");
    });
  });

  describe("endSponsorship", () => {
    it("should end today by default", async () => {
      const { services, donor, child } = await setup();
      const sponsorship = await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-01-01",
      });

      const ended = await services.sponsorships.endSponsorship(sponsorship.id);

      expect(ended.endDate).toBe(TEST_TODAY);
    });

    it("should refuse to end a sponsorship twice", async () => {
      const { services, donor, child } = await setup();
      const sponsorship = await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-01-01",
      });
      await services.sponsorships.endSponsorship(sponsorship.id, "2025-03-01");

      await expect(services.sponsorships.endSponsorship(sponsorship.id)).rejects.toThrow(
        "Sponsorship has already ended"
      );
    });

    it("should refuse an end date before the start date", async () => {
      const { services, donor, child } = await setup();
      const sponsorship = await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-03-01",
      });

      await expect(services.sponsorships.endSponsorship(sponsorship.id, "2025-02-28")).rejects.toThrow(
        "end_date must be on or after the start date"
      );
    });
  });

  describe("listSponsorships", () => {
    it("should list by donor or by child", async () => {
      const { store, services, donor, child } = await setup();
      const otherChild = await createTestChild(store, { name: "Ana" });
      await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: child.id,
        monthlyAmount: 3000,
        startDate: "2025-02-01",
      });
      await services.sponsorships.createSponsorship({
        donorId: donor.id,
        childId: otherChild.id,
        monthlyAmount: 3000,
        startDate: "2025-01-01",
      });

      const byDonor = await services.sponsorships.listSponsorships({ donorId: donor.id });
      const byChild = await services.sponsorships.listSponsorships({ childId: otherChild.id });

      expect(byDonor.map((s) => s.childId)).toEqual([otherChild.id, child.id]);
      expect(byChild).toHaveLength(1);
    });
  });
});
