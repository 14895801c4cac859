import { describe, expect, it } from "vitest";

import { NegotiationSession, transition } from "../../src/relay/session.js";

const turn = (role: "proposer" | "evaluator", sequenceNumber: number) => ({
  sender: role === "proposer" ? "Acme" : "Fund",
  role,
  text: `${role} says ${sequenceNumber}`,
  sequenceNumber,
  timestamp: "2026-01-01T00:00:00.000Z"
});

describe("transition", () => {
  it("follows the relay lifecycle", () => {
    expect(transition("WAITING_FOR_AGENTS", "both_registered")).toBe("SESSION_ACTIVE");
    expect(transition("SESSION_ACTIVE", "turn_relayed")).toBe("SESSION_ACTIVE");
    expect(transition("SESSION_ACTIVE", "termination_decided")).toBe("ENDING");
    expect(transition("ENDING", "end_broadcast")).toBe("ENDED");
    expect(transition("ENDED", "reset")).toBe("WAITING_FOR_AGENTS");
  });

  it("returns null for transitions the lifecycle does not allow", () => {
    expect(transition("WAITING_FOR_AGENTS", "turn_relayed")).toBeNull();
    expect(transition("ENDING", "turn_relayed")).toBeNull();
    expect(transition("ENDED", "end_broadcast")).toBeNull();
    expect(transition("SESSION_ACTIVE", "reset")).toBeNull();
  });
});

describe("NegotiationSession", () => {
  it("rejects inconsistent turn limits", () => {
    expect(() => new NegotiationSession({ minTurns: 6, maxTurns: 6 })).toThrow(
      "Invalid turn limits: min 6 must be below max 6"
    );
    expect(() => new NegotiationSession({ minTurns: 1.5, maxTurns: 6 })).toThrow("Turn limits must be integers");
  });

  it("appends frozen turns and flips the speaker", () => {
    const session = new NegotiationSession({ minTurns: 2, maxTurns: 10 });
    session.start("Acme", "Fund");
    expect(session.nextSpeaker).toBe("proposer");

    const first = session.append(turn("proposer", 1));
    expect(Object.isFrozen(first)).toBe(true);
    expect(session.nextSpeaker).toBe("evaluator");

    session.append(turn("evaluator", 1));
    expect(session.turnCount).toBe(2);
    expect(session.recentTurns(1).map((entry) => entry.role)).toEqual(["evaluator"]);
    expect(session.meta()).toEqual({
      proposerName: "Acme",
      evaluatorName: "Fund",
      turnCount: 2,
      minTurns: 2,
      maxTurns: 10
    });
  });

  it("returns a copy of the history", () => {
    const session = new NegotiationSession({ minTurns: 2, maxTurns: 10 });
    session.start("Acme", "Fund");
    session.append(turn("proposer", 1));

    const snapshot = session.history;
    session.append(turn("evaluator", 1));

    expect(snapshot).toHaveLength(1);
    expect(session.history).toHaveLength(2);
  });

  it("refuses turns outside the active state", () => {
    const session = new NegotiationSession({ minTurns: 2, maxTurns: 10 });
    expect(() => session.append(turn("proposer", 1))).toThrow(
      "Relay cannot apply turn_relayed in state WAITING_FOR_AGENTS"
    );

    session.start("Acme", "Fund");
    session.beginEnding();
    expect(session.active).toBe(true);
    expect(session.acceptsTurns).toBe(false);
    expect(() => session.append(turn("proposer", 1))).toThrow("Relay cannot apply turn_relayed in state ENDING");
  });

  it("resets to a clean waiting state after ending", () => {
    const session = new NegotiationSession({ minTurns: 2, maxTurns: 10 });
    session.start("Acme", "Fund");
    session.append(turn("proposer", 1));
    session.beginEnding();
    session.markEnded();

    session.reset();

    expect(session.state).toBe("WAITING_FOR_AGENTS");
    expect(session.turnCount).toBe(0);
    expect(session.proposerName).toBeNull();
    expect(session.nextSpeaker).toBe("proposer");
  });
});
