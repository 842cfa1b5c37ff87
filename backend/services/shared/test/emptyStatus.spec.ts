// backend/services/shared/test/emptyStatus.spec.ts
import { describe, it, expect } from "vitest";
import { statusOf } from "../src/middleware/emptyStatus";

describe("statusOf", () => {
  it("keeps a 4xx/5xx status", () => {
    expect(statusOf({ status: 404 })).toBe(404);
    expect(statusOf({ statusCode: 413 })).toBe(413);
  });

  it("falls back to 500", () => {
    expect(statusOf(new Error("boom"))).toBe(500);
    expect(statusOf({ status: 302 })).toBe(500);
    expect(statusOf("boom")).toBe(500);
    expect(statusOf(null)).toBe(500);
  });
});
