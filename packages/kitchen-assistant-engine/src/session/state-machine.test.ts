import { describe, expect, it } from "vitest";
import { InvalidStageTransitionError, SessionStateMachine, canTransition } from "./state-machine.js";

describe("SessionStateMachine", () => {
  it("walks a search turn through to awaiting selection", () => {
    const machine = new SessionStateMachine("INITIAL");
    machine.transition("COLLECTING_PREFS");
    machine.transition("PANTRY_OP");
    machine.transition("SEARCHING");
    machine.transition("PRESENTING_OPTIONS");

    expect(machine.settle(true)).toBe("AWAITING_SELECTION");
    expect(machine.path).toEqual([
      "INITIAL",
      "COLLECTING_PREFS",
      "PANTRY_OP",
      "SEARCHING",
      "PRESENTING_OPTIONS",
      "AWAITING_SELECTION",
    ]);
  });

  it("rejects transitions missing from the table", () => {
    const machine = new SessionStateMachine("COLLECTING_PREFS");

    expect(() => machine.transition("ADAPTING")).toThrow(InvalidStageTransitionError);
    expect(() => machine.transition("ADAPTING")).toThrow("invalid stage transition COLLECTING_PREFS -> ADAPTING");
    expect(machine.stage).toBe("COLLECTING_PREFS");
  });

  it("reaches ERROR from any stage and recovers to readiness", () => {
    expect(canTransition("PRESENTING_OPTIONS", "ERROR")).toBe(true);

    const machine = new SessionStateMachine("ADAPTING");
    machine.transition("ERROR");
    expect(machine.settle(false)).toBe("COLLECTING_PREFS");
  });

  it("resets a finished adaptation to collecting preferences", () => {
    const machine = new SessionStateMachine("AWAITING_SELECTION");
    machine.transition("ADAPTING");
    machine.transition("DONE");

    expect(machine.settle(false)).toBe("COLLECTING_PREFS");
  });

  it("returns to the pending selection after a side question", () => {
    const machine = new SessionStateMachine("AWAITING_SELECTION");
    machine.transition("GENERAL");

    expect(machine.settle(true)).toBe("AWAITING_SELECTION");
  });

  it("stops awaiting a selection once no options remain", () => {
    const machine = new SessionStateMachine("AWAITING_SELECTION");

    expect(machine.settle(false)).toBe("COLLECTING_PREFS");
    expect(machine.path).toEqual(["AWAITING_SELECTION", "COLLECTING_PREFS"]);
  });

  it("treats ensure as a no-op when already in the stage", () => {
    const machine = new SessionStateMachine("AWAITING_SELECTION");
    machine.ensure("AWAITING_SELECTION");
    expect(machine.path).toEqual(["AWAITING_SELECTION"]);
  });
});
