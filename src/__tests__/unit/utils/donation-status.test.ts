import { ValidationError } from "@/app/lib/errors";
import {
  mapProviderStatus,
  needsReview,
  parseDonationStatus,
  parsePaymentMethod,
} from "@/app/lib/utils/donation-status";

describe("donation-status", () => {
  describe("parseDonationStatus", () => {
    it("should accept known statuses", () => {
      expect(parseDonationStatus("refunded")).toBe("refunded");
    });

    it("should reject unknown statuses under the status field", () => {
      expect(() => parseDonationStatus("pending")).toThrow(ValidationError);
      expect(() => parseDonationStatus("pending")).toThrow("status 'pending' is not a valid status");
    });
  });

  describe("parsePaymentMethod", () => {
    it("should require a payment method", () => {
      expect(() => parsePaymentMethod(undefined)).toThrow("payment_method can't be blank");
      expect(() => parsePaymentMethod(" ")).toThrow("payment_method can't be blank");
    });

    it("should reject unknown payment methods", () => {
      expect(() => parsePaymentMethod("bitcoin")).toThrow("payment_method 'bitcoin' is not a valid payment_method");
    });

    it("should accept known payment methods", () => {
      expect(parsePaymentMethod("check")).toBe("check");
    });
  });

  describe("mapProviderStatus", () => {
    it("should map provider spellings case-insensitively", () => {
      expect(mapProviderStatus(" Cancelled ")).toEqual({ status: "canceled", reason: null });
      expect(mapProviderStatus("SUCCEEDED")).toEqual({ status: "succeeded", reason: null });
    });

    it("should park unknown statuses for review with the raw value", () => {
      expect(mapProviderStatus("disputed")).toEqual({
        status: "needs_attention",
        reason: "Unrecognized payment status: disputed",
      });
    });

    it("should park missing statuses for review", () => {
      expect(mapProviderStatus(null)).toEqual({
        status: "needs_attention",
        reason: "Unrecognized payment status: none",
      });
    });
  });

  describe("needsReview", () => {
    it("should flag everything except succeeded", () => {
      expect(needsReview("succeeded")).toBe(false);
      expect(needsReview("failed")).toBe(true);
      expect(needsReview("needs_attention")).toBe(true);
    });
  });
});
