import { describe, expect, it, vi } from "vitest";
import { RefreshBudget } from "../../../src/auth/refresh-budget.js";

describe("RefreshBudget", () => {
  it("runs the first refresh and hands back its token", async () => {
    const budget = new RefreshBudget();
    const refresh = vi.fn(async () => "access-2");

    await expect(budget.spend("access-1", refresh)).resolves.toBe("access-2");
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it("shares the refresh between requests rejected with the same token", async () => {
    const budget = new RefreshBudget();
    const refresh = vi.fn(async () => "access-2");

    const [first, second] = await Promise.all([
      budget.spend("access-1", refresh),
      budget.spend("access-1", refresh),
    ]);

    expect(first).toBe("access-2");
    expect(second).toBe("access-2");
    expect(refresh).toHaveBeenCalledTimes(1);
  });

  it("refuses a second refresh for a different token", async () => {
    const budget = new RefreshBudget();
    const refresh = vi.fn(async () => "access-2");

    await budget.spend("access-1", refresh);

    expect(budget.spend("access-2", refresh)).toBeUndefined();
    expect(refresh).toHaveBeenCalledTimes(1);
  });
});
