import type { Member } from '../models/member.js';
import type { CountMatrixResult } from './matrix-aggregator.service.js';
import type { CombinationMatrixResult } from './combination.service.js';
import type { MatrixKind, Meeting, Referral, RelationSet } from '../types/models.js';

const TOP_PERFORMERS = 5;

export interface PerformerEntry {
  member: string;
  total: number;
}

export interface MatrixSummary {
  kind: MatrixKind;
  totalMembers: number;
  totalInteractions: number;
  activeMembers: number;
  topPerformers: PerformerEntry[];
}

export interface ActivityOverview {
  total: number;
  activeMembers: number;
  participationRate: number;
  averagePerMember: number;
  topMembers: PerformerEntry[];
}

export interface ChapterOverview {
  chapterSize: number;
  referrals: ActivityOverview;
  meetings: ActivityOverview;
  engagement: {
    totalActiveMembers: number;
    overallParticipation: number;
    topOverallPerformers: PerformerEntry[];
  };
}

export interface MemberPerformance {
  member: string;
  referrals: { given: number; received: number; uniqueGiven: number; uniqueReceived: number };
  meetings: { total: number; unique: number };
  combinations: { neither: number; meetingOnly: number; referralOnly: number; both: number; totalInteractions: number };
  referralEfficiency: number;
  networkingScore: number;
  engagementRatio: number;
}

export interface DataQualityReport {
  members: { total: number; duplicates: number; incompleteNames: number; valid: number };
  referrals: { total: number; selfReferrals: number; valid: number };
  meetings: { total: number; selfMeetings: number; valid: number };
  /** 0-100 */
  qualityScore: number;
}

export interface RelationStatistics {
  totalReferrals: number;
  totalMeetings: number;
  totalThankYous: number;
  uniqueReferralGivers: number;
  uniqueReferralReceivers: number;
  uniqueReferralPairs: number;
  uniqueMeetingPairs: number;
}

export interface AnalysisMatrices {
  referral: CountMatrixResult;
  meeting: CountMatrixResult;
  combination: CombinationMatrixResult;
}

export class AnalysisSummaryService {
  /**
   * Totals and top performers for one matrix. Referral matrices count
   * referrals given, meeting matrices meetings held, combination matrices
   * the pairs with any interaction.
   */
  static summarizeMatrix(result: CountMatrixResult | CombinationMatrixResult): MatrixSummary {
    const totals: Array<{ member: Member; total: number }> =
      result.kind === 'combination'
        ? result.stats.map((entry) => ({ member: entry.member, total: entry.totalInteractions }))
        : result.stats.map((entry) => ({ member: entry.member, total: entry.totalGiven }));

    const active = totals.filter((entry) => entry.total > 0);

    return {
      kind: result.kind,
      totalMembers: result.matrix.size,
      totalInteractions: totals.reduce((sum, entry) => sum + entry.total, 0),
      activeMembers: active.length,
      topPerformers: [...active]
        .sort((a, b) => b.total - a.total)
        .slice(0, TOP_PERFORMERS)
        .map((entry) => ({ member: entry.member.fullName, total: entry.total })),
    };
  }

  static chapterOverview(matrices: AnalysisMatrices): ChapterOverview {
    const chapterSize = matrices.referral.matrix.size;
    const referralSummary = this.summarizeMatrix(matrices.referral);
    const meetingSummary = this.summarizeMatrix(matrices.meeting);
    const combinationSummary = this.summarizeMatrix(matrices.combination);

    const engaged = new Set<string>();
    for (const entry of matrices.referral.stats) {
      if (entry.totalGiven > 0) {
        engaged.add(entry.member.key);
      }
    }
    for (const entry of matrices.meeting.stats) {
      if (entry.totalGiven > 0) {
        engaged.add(entry.member.key);
      }
    }

    return {
      chapterSize,
      referrals: activity(referralSummary, chapterSize),
      meetings: activity(meetingSummary, chapterSize),
      engagement: {
        totalActiveMembers: engaged.size,
        overallParticipation: ratio(engaged.size, chapterSize),
        topOverallPerformers: combinationSummary.topPerformers,
      },
    };
  }

  /**
   * @returns null when the member is not part of the analysed universe
   */
  static memberPerformance(matrices: AnalysisMatrices, member: Member): MemberPerformance | null {
    const referral = matrices.referral.stats.find((entry) => entry.member.equals(member));
    const meeting = matrices.meeting.stats.find((entry) => entry.member.equals(member));
    const combination = matrices.combination.stats.find((entry) => entry.member.equals(member));
    if (!referral || !meeting || !combination) {
      return null;
    }

    const chapterSize = matrices.referral.matrix.size;

    return {
      member: member.fullName,
      referrals: {
        given: referral.totalGiven,
        received: referral.totalReceived,
        uniqueGiven: referral.uniqueGiven,
        uniqueReceived: referral.uniqueReceived,
      },
      meetings: { total: meeting.totalGiven, unique: meeting.uniqueGiven },
      combinations: {
        neither: combination.neither,
        meetingOnly: combination.meetingOnly,
        referralOnly: combination.referralOnly,
        both: combination.both,
        totalInteractions: combination.totalInteractions,
      },
      referralEfficiency: ratio(referral.uniqueGiven, chapterSize),
      networkingScore: ratio(meeting.uniqueGiven + referral.uniqueGiven, chapterSize * 2),
      engagementRatio: ratio(combination.totalInteractions, chapterSize),
    };
  }

  /**
   * @param duplicatesDropped duplicate member rows the registry discarded
   */
  static dataQuality(
    members: readonly Member[],
    relations: Pick<RelationSet, 'referrals' | 'meetings'>,
    duplicatesDropped = 0
  ): DataQualityReport {
    const incompleteNames = members.filter((member) => !member.firstName || !member.lastName).length;
    const selfReferrals = relations.referrals.filter((referral) => referral.giver.equals(referral.receiver)).length;
    const selfMeetings = relations.meetings.filter((meeting) => meeting.memberA.equals(meeting.memberB)).length;

    const totalRecords = members.length + relations.referrals.length + relations.meetings.length;
    const totalIssues = duplicatesDropped + incompleteNames + selfReferrals + selfMeetings;

    return {
      members: {
        total: members.length,
        duplicates: duplicatesDropped,
        incompleteNames,
        valid: members.length - incompleteNames,
      },
      referrals: {
        total: relations.referrals.length,
        selfReferrals,
        valid: relations.referrals.length - selfReferrals,
      },
      meetings: {
        total: relations.meetings.length,
        selfMeetings,
        valid: relations.meetings.length - selfMeetings,
      },
      qualityScore: totalRecords > 0 ? Math.max(0, ((totalRecords - totalIssues) / totalRecords) * 100) : 0,
    };
  }

  static relationStatistics(relations: RelationSet): RelationStatistics {
    return {
      totalReferrals: relations.referrals.length,
      totalMeetings: relations.meetings.length,
      totalThankYous: relations.thankYous.length,
      uniqueReferralGivers: new Set(relations.referrals.map((referral) => referral.giver.key)).size,
      uniqueReferralReceivers: new Set(relations.referrals.map((referral) => referral.receiver.key)).size,
      uniqueReferralPairs: new Set(relations.referrals.map(referralPairKey)).size,
      uniqueMeetingPairs: new Set(relations.meetings.map(meetingPairKey)).size,
    };
  }
}

function ratio(value: number, total: number): number {
  return total > 0 ? value / total : 0;
}

function activity(summary: MatrixSummary, chapterSize: number): ActivityOverview {
  return {
    total: summary.totalInteractions,
    activeMembers: summary.activeMembers,
    participationRate: ratio(summary.activeMembers, chapterSize),
    averagePerMember: ratio(summary.totalInteractions, chapterSize),
    topMembers: summary.topPerformers,
  };
}

function referralPairKey(referral: Referral): string {
  return `${referral.giver.key}->${referral.receiver.key}`;
}

// Meetings are stored with the pair already ordered by key
function meetingPairKey(meeting: Meeting): string {
  return `${meeting.memberA.key}<->${meeting.memberB.key}`;
}
