import { RelationValidationError } from './errors.js';
import type { Member } from './member.js';
import type { Meeting, Referral, ThankYou } from '../types/models.js';

export interface ReferralDetails {
  date?: Date | null;
  amount?: number | null;
  description?: string | null;
}

export interface ThankYouParams {
  receiver: Member;
  giver?: Member | null;
  amount: number;
  withinOrganization: boolean;
  description?: string | null;
  date?: Date | null;
}

export function createReferral(
  giver: Member,
  receiver: Member,
  details: ReferralDetails = {}
): Referral {
  if (giver.equals(receiver)) {
    throw new RelationValidationError(`${giver.fullName} cannot refer to themselves`);
  }

  const referral: Referral = {
    kind: 'referral',
    giver,
    receiver,
    date: details.date ?? null,
    amount: details.amount ?? null,
    description: details.description ?? null,
  };
  return Object.freeze(referral);
}

/**
 * Meetings are undirected: the pair is stored ordered by normalized key,
 * so (A, B) and (B, A) produce the same record.
 */
export function createMeeting(first: Member, second: Member, date: Date | null = null): Meeting {
  if (first.equals(second)) {
    throw new RelationValidationError(`${first.fullName} cannot have a one-to-one with themselves`);
  }

  const [memberA, memberB] = first.key < second.key ? [first, second] : [second, first];

  const meeting: Meeting = { kind: 'meeting', memberA, memberB, date };
  return Object.freeze(meeting);
}

export function createThankYou(params: ThankYouParams): ThankYou {
  const giver = params.giver ?? null;

  if (!Number.isFinite(params.amount) || params.amount < 0) {
    throw new RelationValidationError(`Thank-you amount must be a non-negative number, got ${params.amount}`);
  }
  if (giver && giver.equals(params.receiver)) {
    throw new RelationValidationError(`${giver.fullName} cannot thank themselves for business`);
  }

  const thankYou: ThankYou = {
    kind: 'thank_you',
    receiver: params.receiver,
    giver,
    amount: params.amount,
    withinOrganization: params.withinOrganization,
    description: params.description ?? null,
    date: params.date ?? null,
  };
  return Object.freeze(thankYou);
}

