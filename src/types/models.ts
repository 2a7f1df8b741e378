// Domain model types

import type { Member } from '../models/member.js';

export type CellValue = string | number | boolean | null | undefined;
export type CellRow = readonly CellValue[];
export type Grid = CellRow[];

/** One tabular source (a CSV file or an uploaded sheet) */
export interface Sheet {
  name: string;
  rows: CellRow[];
}

export type SlipCategory = 'referral' | 'meeting' | 'thank_you';

export type MatrixKind = 'referral' | 'meeting' | 'combination';

export type WithinOrganizationRule = 'empty-detail' | 'always' | 'never';

export type WarningCode =
  | 'duplicate_member'
  | 'unrecognized_slip_type'
  | 'missing_member_name'
  | 'unresolved_member'
  | 'invalid_amount'
  | 'invalid_relation'
  | 'file_skipped';

export interface ProcessingWarning {
  code: WarningCode;
  message: string;
  source: string | null;
  row: number | null;
}

export interface Referral {
  readonly kind: 'referral';
  readonly giver: Member;
  readonly receiver: Member;
  readonly date: Date | null;
  readonly amount: number | null;
  readonly description: string | null;
}

export interface Meeting {
  readonly kind: 'meeting';
  readonly memberA: Member;
  readonly memberB: Member;
  readonly date: Date | null;
}

export interface ThankYou {
  readonly kind: 'thank_you';
  readonly receiver: Member;
  readonly giver: Member | null;
  readonly amount: number;
  readonly withinOrganization: boolean;
  readonly description: string | null;
  readonly date: Date | null;
}

export interface RelationSet {
  referrals: Referral[];
  meetings: Meeting[];
  thankYous: ThankYou[];
}

export interface MemberCountStats {
  member: Member;
  totalGiven: number;
  uniqueGiven: number;
  totalReceived: number;
  uniqueReceived: number;
}

export interface CombinationMemberStats {
  member: Member;
  neither: number;
  meetingOnly: number;
  referralOnly: number;
  both: number;
  /** meetingOnly + referralOnly + both */
  totalInteractions: number;
}

export type Trend = 'positive' | 'negative' | 'unchanged';

export interface ThankYouMemberStats {
  member: Member;
  givenWithin: number;
  givenOutside: number;
  receivedWithin: number;
  receivedOutside: number;
  countGivenWithin: number;
  countGivenOutside: number;
  countReceivedWithin: number;
  countReceivedOutside: number;
  totalGiven: number;
  totalReceived: number;
  countGiven: number;
  countReceived: number;
}

export interface ThankYouSummary {
  amountWithin: number;
  amountOutside: number;
  countWithin: number;
  countOutside: number;
  totalAmount: number;
  totalCount: number;
  /** 0-100; 0 when nothing was recorded */
  withinPercentage: number;
  members: ThankYouMemberStats[];
}
