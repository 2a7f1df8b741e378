import { logger } from '../config/logger.js';
import { MemberMatrix } from '../models/matrix.js';
import type { Member } from '../models/member.js';
import type { Meeting, MemberCountStats, Referral } from '../types/models.js';

export interface CountMatrixResult {
  kind: 'referral' | 'meeting';
  matrix: MemberMatrix;
  stats: MemberCountStats[];
}

export class MatrixAggregatorService {
  /**
   * Directed referral counts: one increment of (giver, receiver) per record
   */
  static buildReferralMatrix(members: readonly Member[], referrals: readonly Referral[]): CountMatrixResult {
    const matrix = new MemberMatrix(members);
    let ignored = 0;

    for (const referral of referrals) {
      if (!matrix.increment(referral.giver, referral.receiver)) {
        ignored++;
      }
    }

    if (ignored > 0) {
      logger.debug(`Ignored ${ignored} referral(s) naming members outside the universe`);
    }

    return { kind: 'referral', matrix, stats: this.computeMemberStats(matrix) };
  }

  /**
   * Symmetric meeting counts: each record increments both (A, B) and (B, A)
   */
  static buildMeetingMatrix(members: readonly Member[], meetings: readonly Meeting[]): CountMatrixResult {
    const matrix = new MemberMatrix(members);
    let ignored = 0;

    for (const meeting of meetings) {
      if (!matrix.has(meeting.memberA) || !matrix.has(meeting.memberB)) {
        ignored++;
        continue;
      }
      matrix.increment(meeting.memberA, meeting.memberB);
      matrix.increment(meeting.memberB, meeting.memberA);
    }

    if (ignored > 0) {
      logger.debug(`Ignored ${ignored} meeting(s) naming members outside the universe`);
    }

    return { kind: 'meeting', matrix, stats: this.computeMemberStats(matrix) };
  }

  /**
   * Row sums are "given", column sums are "received"; unique counts are the
   * number of non-zero cells on that side.
   */
  static computeMemberStats(matrix: MemberMatrix): MemberCountStats[] {
    return matrix.members.map((member) => {
      const given = matrix.row(member);
      const received = matrix.column(member);

      return {
        member,
        totalGiven: sum(given),
        uniqueGiven: given.filter((count) => count > 0).length,
        totalReceived: sum(received),
        uniqueReceived: received.filter((count) => count > 0).length,
      };
    });
  }
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}
