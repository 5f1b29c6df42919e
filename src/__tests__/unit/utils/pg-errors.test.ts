import { DatabaseError } from "pg";
import { ConflictError, ValidationError } from "@/app/lib/errors";
import {
  CONSTRAINTS,
  translateUniqueViolation,
  uniqueViolationConstraint,
  withConstraintTranslation,
} from "@/app/lib/repositories/pg-errors";

const uniqueViolation = (constraint: string): DatabaseError => {
  const error = new DatabaseError("duplicate key value violates unique constraint", 0, "error");
  error.code = "23505";
  error.constraint = constraint;
  return error;
};

describe("pg-errors", () => {
  describe("uniqueViolationConstraint", () => {
    it("should read the constraint of a unique violation", () => {
      expect(uniqueViolationConstraint(uniqueViolation(CONSTRAINTS.donorEmail))).toBe(
        "donors_email_kept_unique"
      );
    });

    it("should look through a wrapping error", () => {
      const wrapped = new Error("Failed query", { cause: uniqueViolation(CONSTRAINTS.invoiceExternalId) });

      expect(uniqueViolationConstraint(wrapped)).toBe("invoices_external_invoice_id_unique");
    });

    it("should ignore other database errors", () => {
      const error = new DatabaseError("null value in column", 0, "error");
      error.code = "23502";

      expect(uniqueViolationConstraint(error)).toBeNull();
      expect(uniqueViolationConstraint(new Error("boom"))).toBeNull();
    });
  });

  describe("translateUniqueViolation", () => {
    it("should turn a taken email into a field error", () => {
      const translated = translateUniqueViolation(uniqueViolation(CONSTRAINTS.donorEmail));

      expect(translated).toBeInstanceOf(ValidationError);
      expect(translated).toMatchObject({ errors: { email: ["has already been taken"] } });
    });

    it("should turn a repeated subscription and child into a record error", () => {
      const translated = translateUniqueViolation(uniqueViolation(CONSTRAINTS.donationSubscriptionChild));

      expect(translated).toMatchObject({
        errors: { base: ["A donation for this subscription and child already exists"] },
      });
    });

    it("should turn a lost sponsorship race into a conflict", () => {
      const translated = translateUniqueViolation(uniqueViolation(CONSTRAINTS.sponsorshipActivePledge));

      expect(translated).toBeInstanceOf(ConflictError);
      expect(translated).toMatchObject({ constraint: "sponsorships_active_pledge_unique" });
    });

    it("should return unrelated errors untouched", () => {
      const original = uniqueViolation("donors_pkey");

      expect(translateUniqueViolation(original)).toBe(original);
    });
  });

  describe("withConstraintTranslation", () => {
    it("should rethrow translated errors", async () => {
      const promise = withConstraintTranslation(async () => {
        throw uniqueViolation(CONSTRAINTS.donorEmail);
      });

      await expect(promise).rejects.toThrow("email has already been taken");
    });
  });
});
