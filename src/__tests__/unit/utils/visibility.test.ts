import { isArchived, isDonorVisible, isVisible } from "@/app/lib/utils/visibility";

describe("visibility", () => {
  const kept = { archivedAt: null };
  const archived = { archivedAt: new Date(2025, 0, 1) };

  it("should tell archived records apart", () => {
    expect(isArchived(kept)).toBe(false);
    expect(isArchived(archived)).toBe(true);
  });

  it("should filter by visibility", () => {
    expect(isVisible(kept, "kept")).toBe(true);
    expect(isVisible(archived, "kept")).toBe(false);
    expect(isVisible(kept, "archived_only")).toBe(false);
    expect(isVisible(archived, "archived_only")).toBe(true);
    expect(isVisible(kept, "with_archived")).toBe(true);
    expect(isVisible(archived, "with_archived")).toBe(true);
  });

  it("should never show merged donors", () => {
    expect(isDonorVisible({ ...archived, mergedIntoId: 4 }, "with_archived")).toBe(false);
    expect(isDonorVisible({ ...archived, mergedIntoId: 4 }, "archived_only")).toBe(false);
    expect(isDonorVisible({ ...kept, mergedIntoId: null }, "kept")).toBe(true);
  });
});
