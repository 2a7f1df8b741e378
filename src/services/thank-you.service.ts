import { MemberMatrix } from '../models/matrix.js';
import type { Member } from '../models/member.js';
import type { ThankYou, ThankYouMemberStats, ThankYouSummary } from '../types/models.js';

export interface ThankYouPairMatrices {
  within: MemberMatrix;
  outside: MemberMatrix;
}

export interface ThankYouPerformer {
  member: Member;
  amount: number;
}

export class ThankYouService {
  /**
   * Per-member amounts and counts, split by within/outside the organization.
   * Records without a giver only count on the receiving side.
   */
  static computeMemberStats(members: readonly Member[], thankYous: readonly ThankYou[]): ThankYouMemberStats[] {
    const stats = new Map(members.map((member) => [member.key, emptyStats(member)]));

    for (const thankYou of thankYous) {
      const giverStats = thankYou.giver ? stats.get(thankYou.giver.key) : undefined;
      if (giverStats) {
        if (thankYou.withinOrganization) {
          giverStats.givenWithin += thankYou.amount;
          giverStats.countGivenWithin++;
        } else {
          giverStats.givenOutside += thankYou.amount;
          giverStats.countGivenOutside++;
        }
      }

      const receiverStats = stats.get(thankYou.receiver.key);
      if (receiverStats) {
        if (thankYou.withinOrganization) {
          receiverStats.receivedWithin += thankYou.amount;
          receiverStats.countReceivedWithin++;
        } else {
          receiverStats.receivedOutside += thankYou.amount;
          receiverStats.countReceivedOutside++;
        }
      }
    }

    return [...stats.values()].map((entry) => ({
      ...entry,
      totalGiven: entry.givenWithin + entry.givenOutside,
      totalReceived: entry.receivedWithin + entry.receivedOutside,
      countGiven: entry.countGivenWithin + entry.countGivenOutside,
      countReceived: entry.countReceivedWithin + entry.countReceivedOutside,
    }));
  }

  static summarize(members: readonly Member[], thankYous: readonly ThankYou[]): ThankYouSummary {
    let amountWithin = 0;
    let amountOutside = 0;
    let countWithin = 0;
    let countOutside = 0;

    for (const thankYou of thankYous) {
      if (thankYou.withinOrganization) {
        amountWithin += thankYou.amount;
        countWithin++;
      } else {
        amountOutside += thankYou.amount;
        countOutside++;
      }
    }

    const totalAmount = amountWithin + amountOutside;

    return {
      amountWithin,
      amountOutside,
      countWithin,
      countOutside,
      totalAmount,
      totalCount: countWithin + countOutside,
      withinPercentage: totalAmount === 0 ? 0 : (amountWithin / totalAmount) * 100,
      members: this.computeMemberStats(members, thankYous),
    };
  }

  /**
   * Members with a non-zero amount, largest first
   */
  static topPerformers(
    stats: readonly ThankYouMemberStats[],
    by: 'given' | 'received',
    topN = 5
  ): ThankYouPerformer[] {
    return stats
      .map((entry) => ({ member: entry.member, amount: by === 'given' ? entry.totalGiven : entry.totalReceived }))
      .filter((entry) => entry.amount > 0)
      .sort((a, b) => b.amount - a.amount)
      .slice(0, topN);
  }

  /**
   * Giver → receiver amounts, one matrix per side of the organization
   * boundary. Records without a giver have no cell and are left out.
   */
  static buildPairMatrices(members: readonly Member[], thankYous: readonly ThankYou[]): ThankYouPairMatrices {
    const within = new MemberMatrix(members);
    const outside = new MemberMatrix(members);

    for (const thankYou of thankYous) {
      if (!thankYou.giver) {
        continue;
      }
      const target = thankYou.withinOrganization ? within : outside;
      target.increment(thankYou.giver, thankYou.receiver, thankYou.amount);
    }

    return { within, outside };
  }
}

type MutableStats = Omit<ThankYouMemberStats, 'totalGiven' | 'totalReceived' | 'countGiven' | 'countReceived'>;

function emptyStats(member: Member): MutableStats {
  return {
    member,
    givenWithin: 0,
    givenOutside: 0,
    receivedWithin: 0,
    receivedOutside: 0,
    countGivenWithin: 0,
    countGivenOutside: 0,
    countReceivedWithin: 0,
    countReceivedOutside: 0,
  };
}
