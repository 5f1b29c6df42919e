import { ConflictError, NotFoundError, ValidationError, isDomainError } from "@/app/lib/errors";

describe("errors", () => {
  describe("ValidationError", () => {
    it("should summarize field and record messages", () => {
      const error = new ValidationError({
        base: ["Cannot archive donor with active sponsorships"],
        amount: ["must be a positive whole number of cents"],
      });

      expect(error.message).toBe(
        "Cannot archive donor with active sponsorships, amount must be a positive whole number of cents"
      );
    });

    it("should scope messages with the helpers", () => {
      expect(ValidationError.field("date", "cannot be in the future").errors).toEqual({
        date: ["cannot be in the future"],
      });
      expect(ValidationError.base("Sponsorship has already ended").errors).toEqual({
        base: ["Sponsorship has already ended"],
      });
    });
  });

  it("should name the missing resource", () => {
    const error = new NotFoundError("Sponsorship", 9);

    expect(error.message).toBe("Sponsorship with ID 9 not found");
    expect(error.resourceType).toBe("Sponsorship");
    expect(error.resourceId).toBe(9);
  });

  it("should recognize domain errors", () => {
    expect(isDomainError(new ConflictError("sponsorships_active_pledge_unique"))).toBe(true);
    expect(isDomainError(ValidationError.base("no"))).toBe(true);
    expect(isDomainError(new Error("no"))).toBe(false);
  });
});
