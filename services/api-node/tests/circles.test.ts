import { MAX_MEMBERS } from "@roscaflow/shared";
import { describe, expect, it } from "vitest";
import type { Shuffler } from "../src/domain/ports.js";
import { isCircleError } from "../src/utils/errors.js";
import { ASSET, START, WEEK, codeOf, createHarness } from "./harness.js";

describe("circle registry", () => {
  it("creates circles with sequential ids and default settings", () => {
    const { engine, proof, topics } = createHarness();
    const first = engine.createCircle(proof("admin"), { contribution: 250, isRandomQueue: false, asset: ASSET });
    const second = engine.createCircle(proof("admin"), {
      contribution: 50,
      isRandomQueue: true,
      asset: ASSET,
      cycleDuration: 3_600,
      lateFeeBps: 500,
      insuranceFeeBps: 100,
    });

    expect([first, second]).toEqual([1, 2]);
    const circle = engine.getCircle(first);
    expect(circle.admin).toBe("admin");
    expect(circle.contribution).toBe(250);
    expect(circle.cycleNumber).toBe(1);
    expect(circle.cycleDuration).toBe(WEEK);
    expect(circle.deadline).toBe(START + WEEK);
    expect(circle.lateFeeBps).toBe(0);
    expect(engine.getCircle(second).deadline).toBe(START + 3_600);
    expect(engine.listCircles()).toHaveLength(2);
    expect(topics()).toEqual(["CircleCreated", "CircleCreated"]);
  });

  it("rejects invalid fee settings and unknown circles", () => {
    const { engine, proof, forged } = createHarness();
    expect(codeOf(() => engine.createCircle(proof("admin"), { contribution: 100, isRandomQueue: false, asset: ASSET, lateFeeBps: 10_001 }))).toBe("InvalidFeeConfig");
    expect(codeOf(() => engine.createCircle(proof("admin"), { contribution: 0, isRandomQueue: false, asset: ASSET }))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => engine.createCircle(forged("admin"), { contribution: 100, isRandomQueue: false, asset: ASSET }))).toBe("Unauthorized");
    expect(codeOf(() => engine.getCircle(42))).toBe("CircleNotFound");
  });

  it("returns copies that cannot mutate engine state", () => {
    const { engine, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    const view = engine.getCircle(circleId);
    view.members.push("mallory");
    expect(engine.getCircle(circleId).members).toEqual(["alice"]);
  });

  it("transfers circle administration", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    engine.transferCircleAdmin(proof("admin"), circleId, "alice");
    expect(engine.getCircle(circleId).admin).toBe("alice");
    expect(codeOf(() => engine.finalizeCircle(proof("admin"), circleId))).toBe("Unauthorized");
  });
});

describe("membership", () => {
  it("appends members in join order with parallel ledgers", () => {
    const { engine, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"]);
    const circle = engine.getCircle(circleId);

    expect(circle.members).toEqual(["alice", "bob", "carol"]);
    expect(circle.memberIndex).toEqual({ alice: 0, bob: 1, carol: 2 });
    expect(circle.hasReceivedPayout).toEqual([false, false, false]);
    expect(circle.contributionsPaid).toEqual([0, 0, 0]);
    expect(engine.listMembers(circleId).map((member) => member.index)).toEqual([0, 1, 2]);
  });

  it("rejects duplicate joins and forged proofs", () => {
    const { engine, proof, forged, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    expect(codeOf(() => engine.joinCircle(proof("alice"), circleId))).toBe("AlreadyJoined");
    expect(codeOf(() => engine.joinCircle(forged("bob"), circleId))).toBe("Unauthorized");
    expect(engine.getCircle(circleId).members).toEqual(["alice"]);
  });

  it("caps membership at the maximum", () => {
    const { engine, proof, circleWith } = createHarness();
    const members = Array.from({ length: MAX_MEMBERS }, (_value, index) => `member-${index}`);
    const circleId = circleWith("admin", members, {}, 100);

    let caught: unknown;
    try {
      engine.joinCircle(proof("late-comer"), circleId);
    } catch (error) {
      caught = error;
    }
    expect(isCircleError(caught, "MaxMembersReached")).toBe(true);
    expect(engine.getCircle(circleId).members).toHaveLength(MAX_MEMBERS);
  });

  it("closes the roster once the queue is finalized", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    engine.finalizeCircle(proof("admin"), circleId);
    expect(codeOf(() => engine.joinCircle(proof("bob"), circleId))).toBe("InvalidCircleState");
  });
});

describe("payout queue", () => {
  it("keeps join order for sequential circles", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"]);
    expect(engine.finalizeCircle(proof("admin"), circleId)).toEqual(["alice", "bob", "carol"]);
  });

  it("uses the shuffler for random circles and is idempotent", () => {
    const { engine, proof, circleWith, topics } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"], { isRandomQueue: true });

    expect(engine.finalizeCircle(proof("admin"), circleId)).toEqual(["carol", "bob", "alice"]);
    expect(engine.finalizeCircle(proof("admin"), circleId)).toEqual(["carol", "bob", "alice"]);
    expect(engine.getPayoutQueue(circleId)).toEqual(["carol", "bob", "alice"]);
    expect(topics().filter((topic) => topic === "QueueFinalized")).toHaveLength(1);
  });

  it("rejects a shuffle that is not a permutation of the roster", () => {
    const duplicating: Shuffler = {
      shuffle: <T>(items: readonly T[]) => items.map(() => items[0]),
    };
    const { engine, proof, circleWith } = createHarness({ shuffler: duplicating });
    const circleId = circleWith("admin", ["alice", "bob"], { isRandomQueue: true });

    expect(codeOf(() => engine.finalizeCircle(proof("admin"), circleId))).toBe("InvalidCircleState");
    expect(engine.getPayoutQueue(circleId)).toEqual([]);
  });

  it("requires the circle admin and at least one member", () => {
    const { engine, proof } = createHarness();
    const circleId = engine.createCircle(proof("admin"), { contribution: 100, isRandomQueue: false, asset: ASSET });
    expect(codeOf(() => engine.finalizeCircle(proof("admin"), circleId))).toBe("InvalidCircleState");
    engine.joinCircle(proof("alice"), circleId);
    expect(codeOf(() => engine.finalizeCircle(proof("alice"), circleId))).toBe("Unauthorized");
  });
});
