import { describe, it, expect, vi } from "vitest";
import {
  ListenerStateMachine,
  type ListenerState,
  type StateTransitionEvent,
} from "./state-machine.js";

function walk(sm: ListenerStateMachine, ...states: ListenerState[]) {
  for (const state of states) sm.transition(state);
}

describe("ListenerStateMachine", () => {
  it("starts in idle state", () => {
    const sm = new ListenerStateMachine();
    expect(sm.getState()).toBe("idle");
    expect(sm.isTerminal()).toBe(false);
  });

  it("walks the graceful close path", () => {
    const sm = new ListenerStateMachine();
    walk(sm, "resolving", "bound", "serving", "closing", "grace-wait", "terminated");
    expect(sm.getState()).toBe("terminated");
    expect(sm.isTerminal()).toBe(true);
  });

  it("walks the natural exit path", () => {
    const sm = new ListenerStateMachine();
    walk(sm, "resolving", "bound", "serving", "exited", "terminated");
    expect(sm.getState()).toBe("terminated");
  });

  it("allows failure only before serving", () => {
    const resolving = new ListenerStateMachine();
    walk(resolving, "resolving");
    expect(resolving.canTransition("failed")).toBe(true);

    const bound = new ListenerStateMachine();
    walk(bound, "resolving", "bound");
    expect(bound.canTransition("failed")).toBe(true);

    const serving = new ListenerStateMachine();
    walk(serving, "resolving", "bound", "serving");
    expect(serving.canTransition("failed")).toBe(false);
  });

  it("rejects invalid transitions", () => {
    const sm = new ListenerStateMachine();
    expect(() => sm.transition("serving")).toThrow(
      "Invalid state transition: idle -> serving",
    );
  });

  it("cannot close after a natural exit", () => {
    const sm = new ListenerStateMachine();
    walk(sm, "resolving", "bound", "serving", "exited");
    expect(sm.canTransition("closing")).toBe(false);
  });

  it("does not allow transitions from failed", () => {
    const sm = new ListenerStateMachine();
    walk(sm, "resolving", "failed");
    expect(sm.isTerminal()).toBe(true);
    expect(sm.canTransition("resolving")).toBe(false);
  });

  it("notifies listeners on state change", () => {
    const sm = new ListenerStateMachine();
    const events: StateTransitionEvent[] = [];
    sm.onStateChange((e) => events.push(e));

    sm.transition("resolving", "/ip4/127.0.0.1/tcp/0");
    sm.transition("bound");

    expect(events).toHaveLength(2);
    expect(events[0].from).toBe("idle");
    expect(events[0].to).toBe("resolving");
    expect(events[0].reason).toBe("/ip4/127.0.0.1/tcp/0");
    expect(events[1].from).toBe("resolving");
    expect(events[1].to).toBe("bound");
    expect(events[1].reason).toBeUndefined();
  });

  it("unsubscribes listener", () => {
    const sm = new ListenerStateMachine();
    const listener = vi.fn();
    const unsub = sm.onStateChange(listener);

    sm.transition("resolving");
    expect(listener).toHaveBeenCalledTimes(1);

    unsub();
    sm.transition("bound");
    expect(listener).toHaveBeenCalledTimes(1);
  });
});
