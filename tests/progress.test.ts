import { describe, it, expect } from "vitest";
import { formatProgressMessage } from "../src/utils/progress.js";

describe("formatProgressMessage", () => {
  it("counts failed items as finished", () => {
    expect(
      formatProgressMessage({
        total: 10,
        pending: 4,
        inProgress: 2,
        completed: 3,
        failed: 1,
      }),
    ).toBe("4/10 items (2 in progress, 1 failed)");
  });

  it("omits the failure count when nothing failed", () => {
    expect(
      formatProgressMessage({
        total: 3,
        pending: 0,
        inProgress: 0,
        completed: 3,
        failed: 0,
      }),
    ).toBe("3/3 items (0 in progress)");
  });
});
