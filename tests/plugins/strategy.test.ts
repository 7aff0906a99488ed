import { describe, it, expect } from "vitest";
import { failed, found, notApplicable, runChain, type Outcome, type Strategy } from "../../src/plugins/strategy.ts";

function step(name: string, run: () => Promise<Outcome<string>>): Strategy<null, string> {
  return { name, run };
}

describe("runChain", () => {
  it("stops at the first found outcome", async () => {
    const ran: string[] = [];
    const result = await runChain(
      [
        step("a", async () => {
          ran.push("a");
          return notApplicable("nothing here");
        }),
        step("b", async () => {
          ran.push("b");
          return found("from b");
        }),
        step("c", async () => {
          ran.push("c");
          return found("from c");
        }),
      ],
      null,
    );

    expect(ran).toEqual(["a", "b"]);
    expect(result.outcome).toEqual({ kind: "found", value: "from b" });
    expect(result.decidedBy).toBe("b");
    expect(result.trail.map((s) => s.name)).toEqual(["a", "b"]);
  });

  it("turns a thrown error into a failed step and keeps going", async () => {
    const result = await runChain(
      [
        step("boom", async () => {
          throw new Error("network down");
        }),
        step("ok", async () => found("fallback")),
      ],
      null,
    );

    expect(result.trail[0]?.outcome).toEqual({ kind: "failed", reason: "network down" });
    expect(result.outcome).toEqual({ kind: "found", value: "fallback" });
  });

  it("returns the last outcome when nothing decides", async () => {
    const result = await runChain(
      [step("a", async () => failed("bad")), step("b", async () => notApplicable("skip"))],
      null,
    );

    expect(result.decidedBy).toBeUndefined();
    expect(result.outcome).toEqual({ kind: "notApplicable", reason: "skip" });
  });

  it("reports an empty chain as not applicable", async () => {
    const result = await runChain<null, string>([], null);
    expect(result.outcome).toEqual({ kind: "notApplicable", reason: "no strategies" });
    expect(result.trail).toEqual([]);
  });
});
