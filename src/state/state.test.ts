import { describe, expect, it } from "vitest";

import { State, StateFormatError } from "./state.js";

describe("State", () => {
  it("serializes the empty state", () => {
    expect(State.empty().dumps()).toBe('{\n  "views": {},\n  "metrics": {}\n}\n');
  });

  it("round-trips views and metrics with sorted keys", () => {
    const state = new State({
      views: { nl: "/runs/r1/04-yosys-synthesis/counter.nl.v" },
      metrics: { design__lint_warning__count: 2, design__instance__count: null, area: "n/a" },
    });

    const loaded = State.loads(state.dumps());

    expect(loaded.equals(state)).toBe(true);
    expect(loaded.view("nl")).toBe("/runs/r1/04-yosys-synthesis/counter.nl.v");
    expect(Object.keys(JSON.parse(state.dumps()).metrics)).toEqual([
      "area",
      "design__instance__count",
      "design__lint_warning__count",
    ]);
  });

  it("fills missing sections with empty records", () => {
    expect(State.loads("{}").equals(State.empty())).toBe(true);
  });

  it("merges updates without touching the original", () => {
    const first = new State({ metrics: { design__lint_error__count: 0 } });
    const second = first.with({ metrics: { design__lint_warning__count: 3 } });

    expect(second.metric("design__lint_error__count")).toBe(0);
    expect(second.metric("design__lint_warning__count")).toBe(3);
    expect(first.metric("design__lint_warning__count")).toBeUndefined();
  });

  it("rejects text that is not JSON", () => {
    expect(() => State.loads("{")).toThrow(StateFormatError);
    expect(() => State.loads("{")).toThrow(/^invalid JSON \(/);
  });

  it("rejects unknown views and unknown top-level keys", () => {
    expect(() => State.loads('{"views":{"lef":"/x.lef"}}')).toThrow(/^views\.lef: /);
    expect(() => State.loads('{"views":{},"extra":1}')).toThrow(
      "<root>: Unrecognized key(s) in object: 'extra'",
    );
  });
});
