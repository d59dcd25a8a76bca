import { describe, expect, it } from "vitest";
import { ASSET, CUSTODY, START, WEEK, codeOf, createHarness } from "./harness.js";

describe("contributions", () => {
  it("collects the contribution into custody and credits the member ledger", () => {
    const { engine, ledger, proof, circleWith, events } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"]);

    const receipt = engine.contributeToCircle(proof("alice"), circleId);

    expect(receipt).toEqual({ member: "alice", amount: 100, lateFee: 0, insuranceFee: 0 });
    const circle = engine.getCircle(circleId);
    expect(circle.balance).toBe(100);
    expect(circle.contributionsPaid).toEqual([100, 0]);
    expect(circle.hasContributed).toEqual([true, false]);
    expect(circle.deadline).toBe(START + WEEK);
    expect(ledger.balanceOf(ASSET, "alice")).toBe(9_900);
    expect(ledger.balanceOf(ASSET, CUSTODY)).toBe(100);
    expect(engine.getMember(circleId, "alice").contributionCount).toBe(1);
    expect(events.list({ topic: "ContributionReceived" })[0].payload).toEqual({
      circleId,
      member: "alice",
      amount: 100,
      lateFee: 0,
      insuranceFee: 0,
    });
  });

  it("accepts one contribution per member per cycle", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    engine.contributeToCircle(proof("alice"), circleId);
    expect(codeOf(() => engine.contributeToCircle(proof("alice"), circleId))).toBe("InvalidCircleState");
    expect(codeOf(() => engine.contributeToCircle(proof("mallory"), circleId))).toBe("NotMember");
  });

  it("leaves no trace when the member cannot fund the transfer", () => {
    const { engine, ledger, proof, circleWith, events } = createHarness();
    const circleId = circleWith("admin", ["alice"], {}, 50);

    expect(codeOf(() => engine.contributeToCircle(proof("alice"), circleId))).toBe("InsufficientAllowance");

    const circle = engine.getCircle(circleId);
    expect(circle.balance).toBe(0);
    expect(circle.contributionsPaid).toEqual([0]);
    expect(circle.hasContributed).toEqual([false]);
    expect(ledger.balanceOf(ASSET, "alice")).toBe(50);
    expect(events.list({ topic: "ContributionReceived" })).toEqual([]);
  });

  it("charges the late fee into the group reserve after the deadline", () => {
    const { engine, ledger, clock, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"], { contribution: 1_000, lateFeeBps: 500 });

    engine.contributeToCircle(proof("alice"), circleId);
    clock.advance(WEEK + 1);
    const late = engine.contributeToCircle(proof("bob"), circleId);

    expect(late).toEqual({ member: "bob", amount: 1_050, lateFee: 50, insuranceFee: 0 });
    const circle = engine.getCircle(circleId);
    expect(circle.groupReserve).toBe(50);
    expect(circle.balance).toBe(2_050);
    expect(circle.contributionsPaid).toEqual([1_000, 1_000]);
    expect(circle.deadline).toBe(START + 2 * WEEK + 1);
    expect(ledger.balanceOf(ASSET, "bob")).toBe(8_950);
  });
});

describe("payouts", () => {
  it("settles a full sequential cycle and rolls over", () => {
    const { engine, ledger, proof, circleWith, topics } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"]);
    engine.finalizeCircle(proof("admin"), circleId);
    for (const member of ["alice", "bob", "carol"]) {
      engine.contributeToCircle(proof(member), circleId);
    }

    const first = engine.processPayout(proof("admin"), circleId, "alice");
    expect(first).toEqual({ recipient: "alice", gross: 100, net: 100, fee: 0, cycleCompleted: false });
    expect(engine.getCycleInfo(circleId)).toEqual({ cycle: 1, index: 1, total: 100 });
    expect(codeOf(() => engine.processPayout(proof("admin"), circleId, "alice"))).toBe("PayoutAlreadyReceived");
    expect(codeOf(() => engine.rolloverGroup(proof("admin"), circleId))).toBe("CycleNotComplete");

    engine.processPayout(proof("admin"), circleId, "bob");
    const last = engine.processPayout(proof("admin"), circleId, "carol");

    expect(last.cycleCompleted).toBe(true);
    expect(engine.getCycleInfo(circleId)).toEqual({ cycle: 1, index: 3, total: 300 });
    expect(engine.getPayoutStatus(circleId)).toEqual([true, true, true]);
    expect(engine.getCircle(circleId).balance).toBe(0);
    expect(ledger.balanceOf(ASSET, "alice")).toBe(10_000);
    expect(ledger.balanceOf(ASSET, CUSTODY)).toBe(0);
    expect(topics().filter((topic) => topic === "CycleCompleted")).toHaveLength(1);

    expect(engine.rolloverGroup(proof("admin"), circleId)).toEqual({ cycle: 2, index: 0, total: 0 });
    const circle = engine.getCircle(circleId);
    expect(circle.hasReceivedPayout).toEqual([false, false, false]);
    expect(circle.hasContributed).toEqual([false, false, false]);
    expect(circle.contributionsPaid).toEqual([0, 0, 0]);
    expect(engine.contributeToCircle(proof("alice"), circleId).amount).toBe(100);
  });

  it("checks admin, finalization and recipient before paying", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice"]);
    engine.contributeToCircle(proof("alice"), circleId);

    expect(codeOf(() => engine.processPayout(proof("admin"), circleId, "alice"))).toBe("CircleNotFinalized");
    engine.finalizeCircle(proof("admin"), circleId);
    expect(codeOf(() => engine.processPayout(proof("alice"), circleId, "alice"))).toBe("Unauthorized");
    expect(codeOf(() => engine.processPayout(proof("admin"), circleId, "mallory"))).toBe("NotMember");
  });

  it("refuses a payout custody cannot cover", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"]);
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.processPayout(proof("admin"), circleId, "alice");

    expect(codeOf(() => engine.processPayout(proof("admin"), circleId, "bob"))).toBe("InsufficientBalance");
    expect(engine.getPayoutStatus(circleId)).toEqual([true, false]);
    expect(engine.getCycleInfo(circleId)).toEqual({ cycle: 1, index: 1, total: 100 });
  });

  it("completes a cycle whose last payout lands after the deadline", () => {
    const { engine, clock, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"], { lateFeeBps: 1_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);
    engine.processPayout(proof("admin"), circleId, "alice");
    clock.advance(WEEK + 1);

    const last = engine.processPayout(proof("admin"), circleId, "bob");

    expect(last.cycleCompleted).toBe(true);
    expect(engine.getCircle(circleId).balance).toBe(0);
    expect(engine.rolloverGroup(proof("admin"), circleId)).toEqual({ cycle: 2, index: 0, total: 0 });
  });

  it("keeps a collected late fee in custody through the cycle", () => {
    const { engine, clock, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"], { lateFeeBps: 1_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    clock.advance(WEEK + 1);
    expect(engine.contributeToCircle(proof("bob"), circleId).lateFee).toBe(10);

    engine.processPayout(proof("admin"), circleId, "alice");
    engine.processPayout(proof("admin"), circleId, "bob");

    const circle = engine.getCircle(circleId);
    expect(circle.balance).toBe(10);
    expect(circle.groupReserve).toBe(10);
    expect(engine.rolloverGroup(proof("admin"), circleId).cycle).toBe(2);
  });

  it("splits the protocol fee to the treasury", () => {
    const { engine, ledger, proof, circleWith, events } = createHarness();
    engine.initialize(proof("protocol-admin"));
    engine.setProtocolFee(proof("protocol-admin"), 250, "treasury");
    const circleId = circleWith("admin", ["alice", "bob"], { contribution: 1_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);

    const receipt = engine.processPayout(proof("admin"), circleId, "alice");

    expect(receipt).toEqual({ recipient: "alice", gross: 1_000, net: 975, fee: 25, cycleCompleted: false });
    expect(ledger.balanceOf(ASSET, "alice")).toBe(9_975);
    expect(ledger.balanceOf(ASSET, "treasury")).toBe(25);
    expect(ledger.balanceOf(ASSET, CUSTODY)).toBe(1_000);
    expect(engine.getCircle(circleId).balance).toBe(1_000);
    expect(events.list({ topic: "PayoutProcessed" })[0].payload).toEqual({
      circleId,
      recipient: "alice",
      gross: 1_000,
      net: 975,
      fee: 25,
    });
  });

  it("pays every slot of an insured cycle from the custodied total", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob"], { insuranceFeeBps: 1_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);
    expect(engine.getCircle(circleId).balance).toBe(220);

    engine.processPayout(proof("admin"), circleId, "alice");
    const last = engine.processPayout(proof("admin"), circleId, "bob");

    expect(last.cycleCompleted).toBe(true);
    const circle = engine.getCircle(circleId);
    expect(circle.balance).toBe(20);
    expect(circle.insuranceBalance).toBe(20);
  });
});

describe("insurance coverage", () => {
  it("covers one defaulting member per cycle from the insurance pool", () => {
    const { engine, proof, circleWith, events } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"], { insuranceFeeBps: 5_000 });

    expect(codeOf(() => engine.triggerInsuranceCoverage(proof("admin"), circleId, "carol"))).toBe(
      "InsufficientBalance"
    );
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);

    const covered = engine.triggerInsuranceCoverage(proof("admin"), circleId, "carol");

    expect(covered.insuranceBalance).toBe(0);
    expect(covered.balance).toBe(300);
    expect(covered.hasContributed).toEqual([true, true, true]);
    expect(covered.contributionsPaid).toEqual([100, 100, 0]);
    expect(covered.isInsuranceUsed).toBe(true);
    expect(events.list({ topic: "InsuranceCoverage" })[0].payload).toEqual({ circleId, member: "carol", amount: 100 });
    expect(codeOf(() => engine.triggerInsuranceCoverage(proof("admin"), circleId, "carol"))).toBe(
      "InvalidCircleState"
    );
    expect(codeOf(() => engine.contributeToCircle(proof("carol"), circleId))).toBe("InvalidCircleState");
  });

  it("pays every slot once coverage has drawn down the insurance pool", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"], { insuranceFeeBps: 5_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);
    engine.triggerInsuranceCoverage(proof("admin"), circleId, "carol");
    engine.processPayout(proof("admin"), circleId, "alice");
    engine.processPayout(proof("admin"), circleId, "bob");

    const last = engine.processPayout(proof("admin"), circleId, "carol");

    expect(last.cycleCompleted).toBe(true);
    const circle = engine.getCircle(circleId);
    expect(circle.balance).toBe(0);
    expect(circle.insuranceBalance).toBe(0);
    expect(engine.rolloverGroup(proof("admin"), circleId)).toEqual({ cycle: 2, index: 0, total: 0 });
  });

  it("re-arms coverage on rollover", () => {
    const { engine, proof, circleWith } = createHarness();
    const circleId = circleWith("admin", ["alice", "bob", "carol"], { insuranceFeeBps: 10_000 });
    engine.finalizeCircle(proof("admin"), circleId);
    engine.contributeToCircle(proof("alice"), circleId);
    engine.contributeToCircle(proof("bob"), circleId);
    engine.triggerInsuranceCoverage(proof("admin"), circleId, "carol");
    for (const member of ["alice", "bob", "carol"]) {
      engine.processPayout(proof("admin"), circleId, member);
    }

    engine.rolloverGroup(proof("admin"), circleId);

    const circle = engine.getCircle(circleId);
    expect(circle.isInsuranceUsed).toBe(false);
    expect(circle.insuranceBalance).toBe(100);
    expect(circle.balance).toBe(100);
    expect(circle.contributionsPaid).toEqual([0, 0, 0]);
  });
});
