export const APP_NAME = "RoscaFlow";
export const TAGLINE = "Contribute together, get paid in turn";

export const MAX_MEMBERS = 50;
export const MAX_BASIS_POINTS = 10_000;
export const DAY_SECONDS = 24 * 60 * 60;
export const EMERGENCY_WITHDRAWAL_DELAY_SECS = 7 * DAY_SECONDS;
export const DEFAULT_CYCLE_DURATION_SECS = 7 * DAY_SECONDS;

export type Address = string;
export type AssetId = string;

export const MEMBER_STATUSES = ["active", "awaiting_replacement", "ejected"] as const;
export type MemberStatus = (typeof MEMBER_STATUSES)[number];

export const ERROR_KINDS = [
  "CircleNotFound",
  "Unauthorized",
  "AlreadyJoined",
  "MaxMembersReached",
  "AlreadyVoted",
  "NotMember",
  "AlreadyDissolved",
  "NotDissolved",
  "InvalidFeeConfig",
  "PenaltyExceedsContribution",
  "MemberAlreadyExists",
  "EmergencyWithdrawalNotAvailable",
  "CircleNotFinalized",
  "CycleNotComplete",
  "PayoutAlreadyReceived",
  "InvalidCircleState",
  "MemberNotFound",
  "InsufficientBalance",
  "InsufficientAllowance",
  "MemberLimitExceeded",
] as const;
export type ErrorKind = (typeof ERROR_KINDS)[number];

export interface ErrorDescriptor {
  code: number;
  status: number;
  message: string;
}

export const ERROR_CATALOG: Record<ErrorKind, ErrorDescriptor> = {
  CircleNotFound: { code: 1001, status: 404, message: "Circle not found." },
  Unauthorized: { code: 1002, status: 403, message: "Caller is not authorized for this action." },
  AlreadyJoined: { code: 1003, status: 409, message: "Already a member of this circle." },
  MaxMembersReached: { code: 1004, status: 409, message: "Circle has reached its member limit." },
  AlreadyVoted: { code: 1005, status: 409, message: "Vote already cast." },
  NotMember: { code: 1006, status: 403, message: "Caller is not an active member of this circle." },
  AlreadyDissolved: { code: 1007, status: 409, message: "Circle is dissolved." },
  NotDissolved: { code: 1008, status: 409, message: "Circle is not dissolved." },
  InvalidFeeConfig: { code: 1009, status: 400, message: "Invalid fee configuration." },
  PenaltyExceedsContribution: { code: 1010, status: 400, message: "Penalty exceeds the member's contributions." },
  MemberAlreadyExists: { code: 1011, status: 409, message: "Member already exists in this circle." },
  EmergencyWithdrawalNotAvailable: {
    code: 1012,
    status: 409,
    message: "Emergency withdrawal is not available yet.",
  },
  CircleNotFinalized: { code: 1013, status: 409, message: "Circle payout queue is not finalized." },
  CycleNotComplete: { code: 1014, status: 409, message: "Current cycle is not complete." },
  PayoutAlreadyReceived: { code: 1015, status: 409, message: "Member already received a payout this cycle." },
  InvalidCircleState: { code: 1016, status: 409, message: "Circle is not in a valid state for this action." },
  MemberNotFound: { code: 1017, status: 404, message: "Member not found." },
  InsufficientBalance: { code: 1018, status: 422, message: "Insufficient custodied balance." },
  InsufficientAllowance: { code: 1019, status: 422, message: "Insufficient funds for transfer." },
  MemberLimitExceeded: { code: 1020, status: 409, message: "Member limit exceeded." },
};

export interface ProtocolConfig {
  admin: Address;
  feeBasisPoints: number;
  treasury: Address | null;
}

export interface Circle {
  id: number;
  admin: Address;
  asset: AssetId;
  contribution: number;
  members: Address[];
  memberIndex: Record<Address, number>;
  isRandomQueue: boolean;
  payoutQueue: Address[];
  hasReceivedPayout: boolean[];
  hasContributed: boolean[];
  cycleNumber: number;
  currentPayoutIndex: number;
  totalVolumeDistributed: number;
  contributionsPaid: number[];
  isDissolved: boolean;
  dissolutionVotes: Address[];
  balance: number;
  cycleDuration: number;
  deadline: number;
  lateFeeBps: number;
  groupReserve: number;
  insuranceFeeBps: number;
  insuranceBalance: number;
  isInsuranceUsed: boolean;
  proposedLateFeeBps: number | null;
  proposalVotes: Address[];
  createdAt: number;
}

export interface MemberRecord {
  circleId: number;
  address: Address;
  index: number;
  contributionCount: number;
  lastContributionAt: number;
  status: MemberStatus;
  joinedAt: number;
}

export interface CustodyEntry {
  user: Address;
  asset: AssetId;
  amount: number;
}

export interface LedgerState {
  protocol: ProtocolConfig | null;
  lastActiveAt: number;
  circleCount: number;
  circles: Circle[];
  memberRecords: MemberRecord[];
  custody: CustodyEntry[];
}

export interface CycleInfo {
  cycle: number;
  index: number;
  total: number;
}

export interface CycleCompletedEvent {
  circleId: number;
  totalVolumeDistributed: number;
}

export interface GroupRolloverEvent {
  circleId: number;
  newCycleNumber: number;
}

export interface KickedEvent {
  circleId: number;
  member: Address;
  refund: number;
  penalty: number;
}

export const EVENT_TOPICS = [
  "CircleCreated",
  "MemberJoined",
  "QueueFinalized",
  "ContributionReceived",
  "PayoutProcessed",
  "CycleCompleted",
  "GroupRollover",
  "Kicked",
  "MemberSwapped",
  "MemberEjected",
  "ExitRequested",
  "VacancyFilled",
  "InsuranceCoverage",
  "CircleDissolved",
  "PenaltyChanged",
  "ProRataWithdrawn",
  "ProtocolFeeUpdated",
] as const;
export type EventTopic = (typeof EVENT_TOPICS)[number];

export interface EventPayloads extends Record<EventTopic, object> {
  CircleCreated: { circleId: number; admin: Address; contribution: number };
  MemberJoined: { circleId: number; member: Address };
  QueueFinalized: { circleId: number; payoutQueue: Address[] };
  ContributionReceived: { circleId: number; member: Address; amount: number; lateFee: number; insuranceFee: number };
  PayoutProcessed: { circleId: number; recipient: Address; gross: number; net: number; fee: number };
  CycleCompleted: CycleCompletedEvent;
  GroupRollover: GroupRolloverEvent;
  Kicked: KickedEvent;
  MemberSwapped: { circleId: number; oldMember: Address; newMember: Address };
  MemberEjected: { circleId: number; member: Address };
  ExitRequested: { circleId: number; member: Address };
  VacancyFilled: { circleId: number; exiting: Address; newMember: Address; refund: number };
  InsuranceCoverage: { circleId: number; member: Address; amount: number };
  CircleDissolved: { circleId: number; votes: number };
  PenaltyChanged: { circleId: number; lateFeeBps: number };
  ProRataWithdrawn: { circleId: number; member: Address; amount: number };
  ProtocolFeeUpdated: { feeBasisPoints: number; treasury: Address };
}

export interface AuditEntry {
  id: string;
  topic: EventTopic;
  circleId: number | null;
  payload: EventPayloads[EventTopic];
  timestamp: string;
  previousHash: string;
  entryHash: string;
}
