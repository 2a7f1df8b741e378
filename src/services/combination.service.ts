import { MemberMatrix } from '../models/matrix.js';
import { MatrixConsistencyError } from '../models/errors.js';
import type { CombinationMemberStats } from '../types/models.js';

/** Ordinal encoding of a directed member pair */
export const COMBINATION_VALUES = {
  NEITHER: 0,
  MEETING_ONLY: 1,
  REFERRAL_ONLY: 2,
  BOTH: 3,
} as const;

export type CombinationValue = (typeof COMBINATION_VALUES)[keyof typeof COMBINATION_VALUES];

export interface CombinationMatrixResult {
  kind: 'combination';
  matrix: MemberMatrix;
  stats: CombinationMemberStats[];
}

export class CombinationService {
  static classifyPair(referralCount: number, meetingCount: number): CombinationValue {
    if (referralCount > 0 && meetingCount > 0) {
      return COMBINATION_VALUES.BOTH;
    }
    if (referralCount > 0) {
      return COMBINATION_VALUES.REFERRAL_ONLY;
    }
    if (meetingCount > 0) {
      return COMBINATION_VALUES.MEETING_ONLY;
    }
    return COMBINATION_VALUES.NEITHER;
  }

  /**
   * Derive the combination matrix cell by cell from the referral and meeting
   * matrices. Both must cover exactly the same members.
   *
   * @throws MatrixConsistencyError when the member universes differ
   */
  static deriveCombinationMatrix(referrals: MemberMatrix, meetings: MemberMatrix): CombinationMatrixResult {
    if (!referrals.sameUniverse(meetings)) {
      throw new MatrixConsistencyError(
        `Referral matrix (${referrals.size} members) and meeting matrix (${meetings.size} members) cover different members`
      );
    }

    const matrix = new MemberMatrix(referrals.members);
    for (const giver of referrals.members) {
      for (const receiver of referrals.members) {
        matrix.set(giver, receiver, this.classifyPair(referrals.get(giver, receiver), meetings.get(giver, receiver)));
      }
    }

    return { kind: 'combination', matrix, stats: this.computeMemberStats(matrix) };
  }

  /**
   * Count each combination value across every member's row
   */
  static computeMemberStats(matrix: MemberMatrix): CombinationMemberStats[] {
    return matrix.members.map((member) => {
      const row = matrix.row(member);
      const count = (value: CombinationValue) => row.filter((cell) => cell === value).length;

      const meetingOnly = count(COMBINATION_VALUES.MEETING_ONLY);
      const referralOnly = count(COMBINATION_VALUES.REFERRAL_ONLY);
      const both = count(COMBINATION_VALUES.BOTH);

      return {
        member,
        neither: count(COMBINATION_VALUES.NEITHER),
        meetingOnly,
        referralOnly,
        both,
        totalInteractions: meetingOnly + referralOnly + both,
      };
    });
  }
}
