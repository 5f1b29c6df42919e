import { ValidationError } from "@/app/lib/errors";
import {
  fallbackEmail,
  fullAddress,
  normalizeZipCode,
  resolveDonorIdentity,
} from "@/app/lib/utils/donor-identity";

describe("donor-identity", () => {
  describe("resolveDonorIdentity", () => {
    it("should fill in a placeholder identity when nothing is given", () => {
      expect(resolveDonorIdentity({})).toEqual({
        name: "Anonymous",
        email: "Anonymous@mailinator.com",
        phone: null,
        addressLine1: null,
        addressLine2: null,
        city: null,
        state: null,
        zipCode: null,
        country: "US",
      });
    });

    it("should trim values and keep an explicit email", () => {
      const identity = resolveDonorIdentity({
        name: "  Jane Roe ",
        email: " jane@example.com ",
        city: " Springfield ",
        country: "CA",
      });

      expect(identity.name).toBe("Jane Roe");
      expect(identity.email).toBe("jane@example.com");
      expect(identity.city).toBe("Springfield");
      expect(identity.country).toBe("CA");
    });

    it("should derive the email from the name when the email is blank", () => {
      expect(resolveDonorIdentity({ name: "Jane Roe", email: "   " }).email).toBe("JaneRoe@mailinator.com");
    });

    it("should pad a four digit US zip code", () => {
      expect(resolveDonorIdentity({ zipCode: "6419" }).zipCode).toBe("06419");
    });

    it("should report every invalid field at once", () => {
      expect.assertions(3);
      try {
        resolveDonorIdentity({ email: "not-an-email", phone: "123", zipCode: "ABCDE" });
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.errors).toEqual({
            email: ["is invalid"],
            phone: ["is invalid"],
            zip_code: ["is invalid"],
          });
          expect(error.message).toBe("email is invalid, phone is invalid, zip_code is invalid");
        }
      }
    });

    it("should leave four digit zip codes outside the US unchanged", () => {
      expect(resolveDonorIdentity({ zipCode: "1234", country: "CA" }).zipCode).toBe("1234");
    });

    it("should not validate zip codes outside the US", () => {
      expect(resolveDonorIdentity({ zipCode: "SW1A 1AA", country: "GB" }).zipCode).toBe("SW1A 1AA");
    });
  });

  describe("fallbackEmail", () => {
    it("should use phone digits for anonymous donors", () => {
      expect(fallbackEmail({ name: "Anonymous", phone: "(555) 123-4567" })).toBe(
        "anonymous-5551234567@mailinator.com"
      );
    });

    it("should use the street and city when there is no name or phone", () => {
      expect(fallbackEmail({ addressLine1: "12 Elm St", city: "Spring Field" })).toBe(
        "anonymous-12elmst-springfield@mailinator.com"
      );
    });

    it("should fall back to the anonymous address", () => {
      expect(fallbackEmail({ name: " " })).toBe("Anonymous@mailinator.com");
    });
  });

  describe("normalizeZipCode", () => {
    it("should leave non-US zip codes alone", () => {
      expect(normalizeZipCode("6419", "CA")).toBe("6419");
    });

    it("should return null for blank zip codes", () => {
      expect(normalizeZipCode("  ", "US")).toBeNull();
    });
  });

  describe("fullAddress", () => {
    it("should join the street lines and locality", () => {
      expect(
        fullAddress({
          addressLine1: "12 Elm St",
          addressLine2: null,
          city: "Springfield",
          state: "IL",
          zipCode: "62701",
        })
      ).toBe("12 Elm St\nSpringfield IL 62701");
    });

    it("should return null when no address is on file", () => {
      expect(
        fullAddress({ addressLine1: null, addressLine2: null, city: null, state: null, zipCode: null })
      ).toBeNull();
    });
  });
});
