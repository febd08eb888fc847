import { describe, expect, it } from "vitest";
import { LaunchError } from "./errors.js";
import { expandHostlist } from "./hostlist.js";

function captureLaunchError(fn: () => unknown): LaunchError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LaunchError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a LaunchError");
}

describe("expandHostlist", () => {
  it("should pass plain host names through in order", () => {
    expect(expandHostlist("nodeB,nodeA")).toEqual(["nodeB", "nodeA"]);
  });

  it("should expand ranges and single values inside brackets", () => {
    expect(expandHostlist("nid[005001-005003,005010]")).toEqual([
      "nid005001",
      "nid005002",
      "nid005003",
      "nid005010",
    ]);
  });

  it("should keep the zero padding of the lower bound", () => {
    expect(expandHostlist("gpu[08-10]")).toEqual(["gpu08", "gpu09", "gpu10"]);
  });

  it("should expand several bracket groups as a product", () => {
    expect(expandHostlist("a[1-2]b[3-4]")).toEqual(["a1b3", "a1b4", "a2b3", "a2b4"]);
  });

  it("should keep literal suffixes and mixed items", () => {
    expect(expandHostlist("rack[1-2]-ib,login")).toEqual(["rack1-ib", "rack2-ib", "login"]);
  });

  it("should return nothing for an empty expression", () => {
    expect(expandHostlist("")).toEqual([]);
    expect(expandHostlist(" , ")).toEqual([]);
  });

  it.each(["nid[1-3", "nid]1[", "nid[[1]]", "nid[3-1]", "nid[a-b]", "nid[]", "nid[1-2-3]"])(
    "should reject malformed expression %s",
    (expr) => {
      const err = captureLaunchError(() => expandHostlist(expr, "SLURM_NODELIST"));
      expect(err.kind).toBe("MissingAllocationData");
      expect(err.message).toContain("SLURM_NODELIST is not a valid hostlist");
    },
  );
});
