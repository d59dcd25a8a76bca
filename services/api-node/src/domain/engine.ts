import {
  EMERGENCY_WITHDRAWAL_DELAY_SECS,
  MAX_MEMBERS,
  type Address,
  type AssetId,
  type Circle,
  type CycleInfo,
  type EventPayloads,
  type EventTopic,
  type LedgerState,
  type MemberRecord,
  type MemberStatus,
  type ProtocolConfig,
} from "@roscaflow/shared";
import { assert, ensure } from "../utils/errors.js";
import {
  insuranceFeeFor,
  isValidBasisPoints,
  lateFeeFor,
  payoutTarget,
  saturatingSub,
  splitProtocolFee,
} from "./fees.js";
import { isCheckpointable, type AuthProof, type EnginePorts } from "./ports.js";

export interface EngineOptions {
  custodyAddress: Address;
  defaultCycleDuration: number;
}

export interface CreateCircleInput {
  contribution: number;
  isRandomQueue: boolean;
  asset: AssetId;
  cycleDuration?: number;
  lateFeeBps?: number;
  insuranceFeeBps?: number;
}

export interface PayoutReceipt {
  recipient: Address;
  gross: number;
  net: number;
  fee: number;
  cycleCompleted: boolean;
}

export interface ContributionReceipt {
  member: Address;
  amount: number;
  lateFee: number;
  insuranceFee: number;
}

export interface KickReceipt {
  member: Address;
  refund: number;
  penalty: number;
}

interface OperationContext {
  now: number;
  custody: Address;
  feeBasisPoints: number;
  treasury: Address | null;
}

export class CircleEngine {
  private state: LedgerState;
  private readonly ports: EnginePorts;
  private readonly options: EngineOptions;

  constructor(ports: EnginePorts, options: EngineOptions) {
    this.ports = ports;
    this.options = options;
    this.state = emptyState(ports.clock.now());
  }

  getStateSnapshot(): LedgerState {
    return structuredClone(this.state);
  }

  resetStateForTests(): void {
    this.state = emptyState(this.ports.clock.now());
  }

  initialize(adminProof: AuthProof): ProtocolConfig {
    return this.transact(() => {
      const admin = this.authorize(adminProof);
      ensure(!this.state.protocol, "Unauthorized", "Protocol is already initialized.");
      this.state.protocol = { admin, feeBasisPoints: 0, treasury: null };
      this.touchLastActive();
      return { ...this.state.protocol };
    });
  }

  setProtocolFee(adminProof: AuthProof, feeBasisPoints: number, treasury: Address): ProtocolConfig {
    return this.transact(() => {
      const protocol = this.requireProtocolAdmin(adminProof);
      ensure(isValidBasisPoints(feeBasisPoints), "InvalidFeeConfig", "Fee must be between 0 and 10000 basis points.");
      ensure(treasury.trim().length > 0, "InvalidFeeConfig", "Treasury address is required.");
      protocol.feeBasisPoints = feeBasisPoints;
      protocol.treasury = treasury;
      this.publish("ProtocolFeeUpdated", { feeBasisPoints, treasury });
      return { ...protocol };
    });
  }

  adminAction(adminProof: AuthProof): number {
    return this.transact(() => {
      this.requireProtocolAdmin(adminProof);
      return this.state.lastActiveAt;
    });
  }

  getProtocol(): ProtocolConfig | null {
    return this.state.protocol ? { ...this.state.protocol } : null;
  }

  feeBasisPoints(): number {
    return this.state.protocol?.feeBasisPoints ?? 0;
  }

  treasuryAddress(): Address | null {
    return this.state.protocol?.treasury ?? null;
  }

  getLastActiveTimestamp(): number {
    return this.state.lastActiveAt;
  }

  createCircle(creatorProof: AuthProof, input: CreateCircleInput): number {
    return this.transact(() => {
      const admin = this.authorize(creatorProof);
      assertAmount(input.contribution, "Contribution must be a positive integer.");
      const lateFeeBps = input.lateFeeBps ?? 0;
      const insuranceFeeBps = input.insuranceFeeBps ?? 0;
      ensure(isValidBasisPoints(lateFeeBps), "InvalidFeeConfig", "Late fee must be between 0 and 10000 basis points.");
      ensure(
        isValidBasisPoints(insuranceFeeBps),
        "InvalidFeeConfig",
        "Insurance fee must be between 0 and 10000 basis points."
      );
      const cycleDuration = input.cycleDuration ?? this.options.defaultCycleDuration;
      assertAmount(cycleDuration, "Cycle duration must be a positive number of seconds.");
      assert(input.asset.trim().length > 0, 400, "INVALID_ASSET", "Asset is required.");

      const now = this.ports.clock.now();
      const id = this.nextCircleId();
      this.state.circles.push({
        id,
        admin,
        asset: input.asset,
        contribution: input.contribution,
        members: [],
        memberIndex: {},
        isRandomQueue: input.isRandomQueue,
        payoutQueue: [],
        hasReceivedPayout: [],
        hasContributed: [],
        cycleNumber: 1,
        currentPayoutIndex: 0,
        totalVolumeDistributed: 0,
        contributionsPaid: [],
        isDissolved: false,
        dissolutionVotes: [],
        balance: 0,
        cycleDuration,
        deadline: now + cycleDuration,
        lateFeeBps,
        groupReserve: 0,
        insuranceFeeBps,
        insuranceBalance: 0,
        isInsuranceUsed: false,
        proposedLateFeeBps: null,
        proposalVotes: [],
        createdAt: now,
      });
      this.publish("CircleCreated", { circleId: id, admin, contribution: input.contribution });
      return id;
    });
  }

  getCircle(circleId: number): Circle {
    return structuredClone(this.requireCircle(circleId));
  }

  listCircles(): Circle[] {
    return structuredClone(this.state.circles);
  }

  transferCircleAdmin(adminProof: AuthProof, circleId: number, newAdmin: Address): Circle {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      assert(newAdmin.trim().length > 0, 400, "INVALID_ADDRESS", "New admin address is required.");
      circle.admin = newAdmin;
      return structuredClone(circle);
    });
  }

  joinCircle(memberProof: AuthProof, circleId: number): MemberRecord {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(positionOf(circle, member) === undefined, "AlreadyJoined");
      ensure(circle.members.length < MAX_MEMBERS, "MaxMembersReached");
      ensure(circle.payoutQueue.length === 0, "InvalidCircleState", "Payout queue is already finalized.");

      circle.members.push(member);
      circle.hasReceivedPayout.push(false);
      circle.hasContributed.push(false);
      circle.contributionsPaid.push(0);
      circle.memberIndex[member] = circle.members.length - 1;
      const record = this.upsertRecord(circle, member, circle.members.length - 1);
      this.publish("MemberJoined", { circleId, member });
      return { ...record };
    });
  }

  kickMember(adminProof: AuthProof, circleId: number, member: Address, penalty: number): KickReceipt {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      assert(Number.isSafeInteger(penalty) && penalty >= 0, 400, "INVALID_AMOUNT", "Penalty must be a non-negative integer.");
      const position = positionOf(circle, member);
      ensure(position !== undefined, "MemberNotFound");
      const contributed = circle.contributionsPaid[position];
      ensure(penalty <= contributed, "PenaltyExceedsContribution");
      ensure(
        !circle.hasReceivedPayout[position],
        "InvalidCircleState",
        "A member paid out this cycle cannot be removed until rollover."
      );
      const ctx = this.context();
      const refund = contributed - penalty;
      const penaltyToTreasury = penalty > 0 && ctx.treasury !== null;
      const outflow = penaltyToTreasury ? contributed : refund;
      ensure(circle.balance >= outflow, "InsufficientBalance");

      this.removeSlot(circle, position);
      this.state.memberRecords = this.state.memberRecords.filter(
        (record) => !(record.circleId === circleId && record.address === member)
      );
      circle.balance = saturatingSub(circle.balance, outflow);
      if (penalty > 0 && !penaltyToTreasury) {
        circle.groupReserve += penalty;
      }
      this.settleGovernance(circle);
      this.publish("Kicked", { circleId, member, refund, penalty });

      if (refund > 0) {
        this.ports.assets.transfer(circle.asset, ctx.custody, member, refund);
      }
      if (penaltyToTreasury && ctx.treasury) {
        this.ports.assets.transfer(circle.asset, ctx.custody, ctx.treasury, penalty);
      }
      return { member, refund, penalty };
    });
  }

  swapMember(oldProof: AuthProof, newProof: AuthProof, circleId: number): Circle {
    return this.transact(() => {
      const oldMember = this.authorize(oldProof);
      const newMember = this.authorize(newProof);
      const circle = this.requireCircle(circleId);
      this.applySwap(circle, oldMember, newMember);
      return structuredClone(circle);
    });
  }

  swapMemberByAdmin(adminProof: AuthProof, circleId: number, oldMember: Address, newMember: Address): Circle {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      this.applySwap(circle, oldMember, newMember);
      return structuredClone(circle);
    });
  }

  ejectMember(adminProof: AuthProof, circleId: number, member: Address): MemberRecord {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(positionOf(circle, member) !== undefined, "MemberNotFound");
      const record = this.requireRecord(circleId, member);
      ensure(record.status !== "ejected", "InvalidCircleState", "Member is already ejected.");
      record.status = "ejected";
      this.settleGovernance(circle);
      this.publish("MemberEjected", { circleId, member });
      return { ...record };
    });
  }

  requestExit(memberProof: AuthProof, circleId: number): MemberRecord {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(positionOf(circle, member) !== undefined, "NotMember");
      const record = this.requireRecord(circleId, member);
      ensure(record.status === "active", "InvalidCircleState", "Only active members can request an exit.");
      record.status = "awaiting_replacement";
      this.publish("ExitRequested", { circleId, member });
      return { ...record };
    });
  }

  fillVacancy(adminProof: AuthProof, newProof: AuthProof, circleId: number, exiting: Address): MemberRecord {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      const newMember = this.authorize(newProof);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      const position = positionOf(circle, exiting);
      ensure(position !== undefined, "MemberNotFound");
      const exitingRecord = this.requireRecord(circleId, exiting);
      ensure(
        exitingRecord.status === "awaiting_replacement",
        "InvalidCircleState",
        "Member has not requested an exit."
      );
      ensure(positionOf(circle, newMember) === undefined, "MemberAlreadyExists");
      const refund = netRefundable(circle, position);
      ensure(circle.balance >= refund, "InsufficientBalance");

      const ctx = this.context();
      circle.members = circle.members.map((address, index) => (index === position ? newMember : address));
      circle.payoutQueue = circle.payoutQueue.map((address) => (address === exiting ? newMember : address));
      circle.contributionsPaid = circle.contributionsPaid.map((paid, index) => (index === position ? 0 : paid));
      circle.hasContributed = circle.hasContributed.map((paid, index) => (index === position ? false : paid));
      circle.balance = saturatingSub(circle.balance, refund);
      exitingRecord.status = "ejected";
      this.reindex(circle);
      const record = this.upsertRecord(circle, newMember, position);
      this.settleGovernance(circle);
      this.publish("VacancyFilled", { circleId, exiting, newMember, refund });

      if (refund > 0) {
        this.ports.assets.transfer(circle.asset, ctx.custody, exiting, refund);
      }
      return { ...record };
    });
  }

  getMember(circleId: number, member: Address): MemberRecord {
    this.requireCircle(circleId);
    return { ...this.requireRecord(circleId, member) };
  }

  listMembers(circleId: number): MemberRecord[] {
    const circle = this.requireCircle(circleId);
    return circle.members.map((address) => ({ ...this.requireRecord(circleId, address) }));
  }

  getContributions(circleId: number, member: Address): number {
    const circle = this.requireCircle(circleId);
    const position = positionOf(circle, member);
    return position === undefined ? 0 : circle.contributionsPaid[position];
  }

  finalizeCircle(adminProof: AuthProof, circleId: number): Address[] {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      if (circle.payoutQueue.length > 0) {
        return [...circle.payoutQueue];
      }
      ensure(circle.members.length > 0, "InvalidCircleState", "Cannot finalize a circle without members.");

      const queue = circle.isRandomQueue ? this.ports.shuffler.shuffle(circle.members) : [...circle.members];
      ensure(isPermutationOf(queue, circle.members), "InvalidCircleState", "Shuffled queue is not a permutation.");
      circle.payoutQueue = queue;
      this.publish("QueueFinalized", { circleId, payoutQueue: [...queue] });
      return [...queue];
    });
  }

  getPayoutQueue(circleId: number): Address[] {
    return [...this.requireCircle(circleId).payoutQueue];
  }

  processPayout(adminProof: AuthProof, circleId: number, recipient: Address): PayoutReceipt {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(circle.payoutQueue.length > 0, "CircleNotFinalized");
      const position = positionOf(circle, recipient);
      ensure(position !== undefined && this.statusOf(circle, recipient) !== "ejected", "NotMember");
      ensure(!circle.hasReceivedPayout[position], "PayoutAlreadyReceived");

      const ctx = this.context();
      const target = payoutTarget(circle, ctx.now);
      ensure(
        circle.balance >= target,
        "InsufficientBalance",
        `Circle custody holds ${circle.balance}, payout requires ${target}.`
      );
      const gross = circle.contribution;
      const { fee, net } = splitProtocolFee(gross, ctx.feeBasisPoints);
      ensure(fee === 0 || ctx.treasury !== null, "InvalidFeeConfig", "A protocol fee is set without a treasury.");

      circle.hasReceivedPayout[position] = true;
      circle.currentPayoutIndex += 1;
      circle.totalVolumeDistributed += gross;
      circle.balance = saturatingSub(circle.balance, gross);
      this.publish("PayoutProcessed", { circleId, recipient, gross, net, fee });
      const cycleCompleted = this.isCycleComplete(circle);
      if (cycleCompleted) {
        this.publish("CycleCompleted", { circleId, totalVolumeDistributed: circle.totalVolumeDistributed });
      }

      this.ports.assets.transfer(circle.asset, ctx.custody, recipient, net);
      if (fee > 0 && ctx.treasury) {
        this.ports.assets.transfer(circle.asset, ctx.custody, ctx.treasury, fee);
      }
      return { recipient, gross, net, fee, cycleCompleted };
    });
  }

  rolloverGroup(adminProof: AuthProof, circleId: number): CycleInfo {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(this.isCycleComplete(circle), "CycleNotComplete");

      const { contribution, hasReceivedPayout } = circle;
      circle.contributionsPaid = circle.contributionsPaid.map((paid, index) =>
        hasReceivedPayout[index] ? saturatingSub(paid, contribution) : paid
      );
      circle.hasReceivedPayout = circle.members.map(() => false);
      circle.hasContributed = circle.members.map(() => false);
      circle.cycleNumber += 1;
      circle.currentPayoutIndex = 0;
      circle.totalVolumeDistributed = 0;
      circle.isInsuranceUsed = false;
      this.publish("GroupRollover", { circleId, newCycleNumber: circle.cycleNumber });
      return cycleInfoOf(circle);
    });
  }

  getCycleInfo(circleId: number): CycleInfo {
    return cycleInfoOf(this.requireCircle(circleId));
  }

  getPayoutStatus(circleId: number): boolean[] {
    return [...this.requireCircle(circleId).hasReceivedPayout];
  }

  contributeToCircle(memberProof: AuthProof, circleId: number): ContributionReceipt {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      const position = positionOf(circle, member);
      ensure(position !== undefined && this.statusOf(circle, member) !== "ejected", "NotMember");
      ensure(!circle.hasContributed[position], "InvalidCircleState", "Contribution for this cycle is already paid.");

      const ctx = this.context();
      const lateFee = lateFeeFor(circle.contribution, circle.lateFeeBps, ctx.now, circle.deadline);
      const insuranceFee = insuranceFeeFor(circle.contribution, circle.insuranceFeeBps);
      const amount = circle.contribution + lateFee + insuranceFee;

      circle.balance += amount;
      circle.groupReserve += lateFee;
      circle.insuranceBalance += insuranceFee;
      circle.contributionsPaid[position] += circle.contribution;
      circle.hasContributed[position] = true;
      circle.deadline = ctx.now + circle.cycleDuration;
      const record = this.requireRecord(circleId, member);
      record.contributionCount += 1;
      record.lastContributionAt = ctx.now;
      this.publish("ContributionReceived", { circleId, member, amount, lateFee, insuranceFee });

      this.ports.assets.transfer(circle.asset, member, ctx.custody, amount);
      return { member, amount, lateFee, insuranceFee };
    });
  }

  triggerInsuranceCoverage(adminProof: AuthProof, circleId: number, member: Address): Circle {
    return this.transact(() => {
      const circle = this.requireCircle(circleId);
      this.requireCircleAdmin(adminProof, circle);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      const position = positionOf(circle, member);
      ensure(position !== undefined && this.statusOf(circle, member) !== "ejected", "NotMember");
      ensure(!circle.isInsuranceUsed, "InvalidCircleState", "Insurance was already used this cycle.");
      ensure(!circle.hasContributed[position], "InvalidCircleState", "Member already contributed this cycle.");
      ensure(circle.insuranceBalance >= circle.contribution, "InsufficientBalance", "Insurance fund cannot cover it.");

      circle.insuranceBalance -= circle.contribution;
      circle.hasContributed[position] = true;
      circle.isInsuranceUsed = true;
      this.publish("InsuranceCoverage", { circleId, member, amount: circle.contribution });
      return structuredClone(circle);
    });
  }

  proposeDissolution(memberProof: AuthProof, circleId: number): boolean {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(this.isVoter(circle, member), "NotMember");
      if (!circle.dissolutionVotes.includes(member)) {
        circle.dissolutionVotes.push(member);
      }
      this.settleGovernance(circle);
      return circle.isDissolved;
    });
  }

  voteDissolve(memberProof: AuthProof, circleId: number): boolean {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(this.isVoter(circle, member), "NotMember");
      ensure(!circle.dissolutionVotes.includes(member), "AlreadyVoted");
      circle.dissolutionVotes.push(member);
      this.settleGovernance(circle);
      return circle.isDissolved;
    });
  }

  proposePenaltyChange(memberProof: AuthProof, circleId: number, newBps: number): Circle {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(this.isVoter(circle, member), "NotMember");
      ensure(isValidBasisPoints(newBps), "InvalidFeeConfig", "Late fee must be between 0 and 10000 basis points.");
      circle.proposedLateFeeBps = newBps;
      circle.proposalVotes = [member];
      this.settleGovernance(circle);
      return structuredClone(circle);
    });
  }

  votePenaltyChange(memberProof: AuthProof, circleId: number): Circle {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(!circle.isDissolved, "AlreadyDissolved");
      ensure(this.isVoter(circle, member), "NotMember");
      ensure(circle.proposedLateFeeBps !== null, "InvalidCircleState", "No late fee proposal is open.");
      ensure(!circle.proposalVotes.includes(member), "AlreadyVoted");
      circle.proposalVotes.push(member);
      this.settleGovernance(circle);
      return structuredClone(circle);
    });
  }

  withdrawProRata(memberProof: AuthProof, circleId: number): number {
    return this.transact(() => {
      const member = this.authorize(memberProof);
      const circle = this.requireCircle(circleId);
      ensure(circle.isDissolved, "NotDissolved");
      const position = positionOf(circle, member);
      ensure(position !== undefined, "NotMember");
      const refundable = netRefundable(circle, position);
      if (refundable === 0) {
        return 0;
      }
      ensure(circle.balance >= refundable, "InsufficientBalance");

      const ctx = this.context();
      circle.contributionsPaid[position] = 0;
      circle.balance = saturatingSub(circle.balance, refundable);
      this.publish("ProRataWithdrawn", { circleId, member, amount: refundable });

      this.ports.assets.transfer(circle.asset, ctx.custody, member, refundable);
      return refundable;
    });
  }

  deposit(userProof: AuthProof, asset: AssetId, amount: number): number {
    return this.transact(() => {
      const user = this.authorize(userProof);
      assertAmount(amount, "Deposit amount must be a positive integer.");
      const ctx = this.context();
      const entry = this.custodyEntry(user, asset);
      entry.amount += amount;

      this.ports.assets.transfer(asset, user, ctx.custody, amount);
      return entry.amount;
    });
  }

  emergencyWithdraw(userProof: AuthProof, asset: AssetId): number {
    return this.transact(() => {
      const user = this.authorize(userProof);
      const ctx = this.context();
      const unlockAt = this.state.lastActiveAt + EMERGENCY_WITHDRAWAL_DELAY_SECS;
      ensure(ctx.now > unlockAt, "EmergencyWithdrawalNotAvailable");
      const amount = this.getUserBalance(user, asset);
      this.state.custody = this.state.custody.filter((entry) => !(entry.user === user && entry.asset === asset));

      if (amount > 0) {
        this.ports.assets.transfer(asset, ctx.custody, user, amount);
      }
      return amount;
    });
  }

  getUserBalance(user: Address, asset: AssetId): number {
    return this.state.custody.find((entry) => entry.user === user && entry.asset === asset)?.amount ?? 0;
  }

  /**
   * Runs one public operation as an all-or-nothing unit: any thrown error
   * restores engine state and every checkpointable collaborator.
   */
  private transact<T>(operation: () => T): T {
    const saved = structuredClone(this.state);
    const restores = Object.values(this.ports)
      .filter(isCheckpointable)
      .map((port) => port.checkpoint());
    try {
      return operation();
    } catch (error) {
      this.state = saved;
      restores.reverse().forEach((restore) => restore());
      throw error;
    }
  }

  private context(): OperationContext {
    const protocol = this.state.protocol;
    return {
      now: this.ports.clock.now(),
      custody: this.options.custodyAddress,
      feeBasisPoints: protocol?.feeBasisPoints ?? 0,
      treasury: protocol?.treasury ?? null,
    };
  }

  private authorize(proof: AuthProof): Address {
    ensure(this.ports.authorizer.verify(proof), "Unauthorized", "Authorization proof was rejected.");
    return proof.principal;
  }

  private requireProtocolAdmin(proof: AuthProof): ProtocolConfig {
    const protocol = this.state.protocol;
    ensure(protocol, "Unauthorized", "Protocol is not initialized.");
    const caller = this.authorize(proof);
    ensure(caller === protocol.admin, "Unauthorized", "Protocol admin required.");
    this.touchLastActive();
    return protocol;
  }

  private requireCircleAdmin(proof: AuthProof, circle: Circle): Address {
    const caller = this.authorize(proof);
    ensure(caller === circle.admin, "Unauthorized", "Circle admin required.");
    this.touchLastActive();
    return caller;
  }

  private touchLastActive() {
    this.state.lastActiveAt = this.ports.clock.now();
  }

  private nextCircleId(): number {
    this.state.circleCount += 1;
    return this.state.circleCount;
  }

  private requireCircle(circleId: number): Circle {
    const circle = this.state.circles.find((candidate) => candidate.id === circleId);
    ensure(circle, "CircleNotFound");
    return circle;
  }

  private findRecord(circleId: number, address: Address): MemberRecord | undefined {
    return this.state.memberRecords.find((record) => record.circleId === circleId && record.address === address);
  }

  private requireRecord(circleId: number, address: Address): MemberRecord {
    const record = this.findRecord(circleId, address);
    ensure(record, "MemberNotFound");
    return record;
  }

  private upsertRecord(circle: Circle, address: Address, index: number): MemberRecord {
    const now = this.ports.clock.now();
    const existing = this.findRecord(circle.id, address);
    if (existing) {
      existing.index = index;
      existing.status = "active";
      existing.contributionCount = 0;
      existing.lastContributionAt = 0;
      existing.joinedAt = now;
      return existing;
    }
    const record: MemberRecord = {
      circleId: circle.id,
      address,
      index,
      contributionCount: 0,
      lastContributionAt: 0,
      status: "active",
      joinedAt: now,
    };
    this.state.memberRecords.push(record);
    return record;
  }

  private statusOf(circle: Circle, address: Address): MemberStatus {
    return this.findRecord(circle.id, address)?.status ?? "active";
  }

  private isVoter(circle: Circle, address: Address): boolean {
    return positionOf(circle, address) !== undefined && this.statusOf(circle, address) !== "ejected";
  }

  private voterCount(circle: Circle): number {
    return circle.members.filter((address) => this.statusOf(circle, address) !== "ejected").length;
  }

  private isCycleComplete(circle: Circle): boolean {
    return (
      circle.members.length > 0 &&
      circle.members.every(
        (address, index) => circle.hasReceivedPayout[index] || this.statusOf(circle, address) === "ejected"
      )
    );
  }

  /** Rebuilds every positional sequence without `position`. */
  private removeSlot(circle: Circle, position: number) {
    const removed = circle.members[position];
    const keep = (_value: unknown, index: number) => index !== position;
    circle.members = circle.members.filter(keep);
    circle.hasReceivedPayout = circle.hasReceivedPayout.filter(keep);
    circle.hasContributed = circle.hasContributed.filter(keep);
    circle.contributionsPaid = circle.contributionsPaid.filter(keep);
    circle.payoutQueue = circle.payoutQueue.filter((address) => address !== removed);
    this.reindex(circle);
  }

  private reindex(circle: Circle) {
    circle.memberIndex = Object.fromEntries(circle.members.map((address, index) => [address, index]));
    circle.members.forEach((address, index) => {
      const record = this.findRecord(circle.id, address);
      if (record) {
        record.index = index;
      }
    });
  }

  private applySwap(circle: Circle, oldMember: Address, newMember: Address) {
    ensure(!circle.isDissolved, "AlreadyDissolved");
    const position = positionOf(circle, oldMember);
    ensure(position !== undefined, "MemberNotFound");
    if (oldMember === newMember) {
      return;
    }
    ensure(positionOf(circle, newMember) === undefined, "MemberAlreadyExists");

    const rename = (address: Address) => (address === oldMember ? newMember : address);
    circle.members = circle.members.map(rename);
    circle.payoutQueue = circle.payoutQueue.map(rename);
    circle.dissolutionVotes = circle.dissolutionVotes.map(rename);
    circle.proposalVotes = circle.proposalVotes.map(rename);
    const oldRecord = this.requireRecord(circle.id, oldMember);
    this.state.memberRecords = this.state.memberRecords.filter((record) => record !== oldRecord);
    const replacement = this.upsertRecord(circle, newMember, position);
    replacement.contributionCount = oldRecord.contributionCount;
    replacement.lastContributionAt = oldRecord.lastContributionAt;
    replacement.status = oldRecord.status;
    this.reindex(circle);
    this.publish("MemberSwapped", { circleId: circle.id, oldMember, newMember });
  }

  /**
   * Drops votes from members who can no longer vote, then applies any quorum
   * that is now reached. Called after every vote and every roster change.
   */
  private settleGovernance(circle: Circle) {
    circle.dissolutionVotes = circle.dissolutionVotes.filter((address) => this.isVoter(circle, address));
    circle.proposalVotes = circle.proposalVotes.filter((address) => this.isVoter(circle, address));
    const voters = this.voterCount(circle);
    if (voters === 0) {
      return;
    }

    if (!circle.isDissolved && circle.dissolutionVotes.length * 2 > voters) {
      circle.isDissolved = true;
      this.publish("CircleDissolved", { circleId: circle.id, votes: circle.dissolutionVotes.length });
    }

    if (circle.proposedLateFeeBps !== null && circle.proposalVotes.length * 2 > voters) {
      circle.lateFeeBps = circle.proposedLateFeeBps;
      circle.proposedLateFeeBps = null;
      circle.proposalVotes = [];
      this.publish("PenaltyChanged", { circleId: circle.id, lateFeeBps: circle.lateFeeBps });
    }
  }

  private custodyEntry(user: Address, asset: AssetId) {
    let entry = this.state.custody.find((candidate) => candidate.user === user && candidate.asset === asset);
    if (!entry) {
      entry = { user, asset, amount: 0 };
      this.state.custody.push(entry);
    }
    return entry;
  }

  private publish<T extends EventTopic>(topic: T, payload: EventPayloads[T]) {
    this.ports.events.publish(topic, payload);
  }
}

function emptyState(now: number): LedgerState {
  return {
    protocol: null,
    lastActiveAt: now,
    circleCount: 0,
    circles: [],
    memberRecords: [],
    custody: [],
  };
}

function positionOf(circle: Circle, address: Address): number | undefined {
  return Object.hasOwn(circle.memberIndex, address) ? circle.memberIndex[address] : undefined;
}

function netRefundable(circle: Circle, position: number): number {
  const received = circle.hasReceivedPayout[position] ? circle.contribution : 0;
  return saturatingSub(circle.contributionsPaid[position], received);
}

function cycleInfoOf(circle: Circle): CycleInfo {
  return {
    cycle: circle.cycleNumber,
    index: circle.currentPayoutIndex,
    total: circle.totalVolumeDistributed,
  };
}

function isPermutationOf(candidate: readonly Address[], members: readonly Address[]): boolean {
  if (candidate.length !== members.length) {
    return false;
  }
  const sortedCandidate = [...candidate].sort();
  const sortedMembers = [...members].sort();
  return sortedCandidate.every((address, index) => address === sortedMembers[index]);
}

function assertAmount(value: number, message: string) {
  assert(Number.isSafeInteger(value) && value > 0, 400, "INVALID_AMOUNT", message);
}
