import type { CellValue, SlipCategory } from '../types/models.js';

export const SLIP_TYPE_LABELS: Record<SlipCategory, string> = {
  referral: 'Referral',
  meeting: 'One to One',
  thank_you: 'TYFCB',
};

// Upper-cased variants seen in hand-entered slip exports
const SLIP_TYPE_SYNONYMS: Record<SlipCategory, readonly string[]> = {
  thank_you: [
    'TYFCB',
    'TY FCB',
    'TY-FCB',
    'THANK YOU FCB',
    'THANK YOU FOR CLOSE BUSINESS',
    'THANK YOU FOR CLOSED BUSINESS',
  ],
  meeting: ['ONE TO ONE', 'ONE-TO-ONE', '1-TO-1', '1 TO 1', 'OTO', 'ONE2ONE', '1:1'],
  referral: ['REFERRAL', 'REF', 'REFERRALS'],
};

const CATEGORIES: readonly SlipCategory[] = ['referral', 'meeting', 'thank_you'];

export class SlipClassifierService {
  /**
   * Map a raw slip-type cell to its category.
   *
   * Tries the canonical labels exactly, then case-insensitively, then the
   * synonym tables. Returns null for empty, non-text and unrecognized values.
   */
  static classify(value: CellValue): SlipCategory | null {
    if (typeof value !== 'string') {
      return null;
    }

    const trimmed = value.trim();
    if (!trimmed) {
      return null;
    }

    const exact = CATEGORIES.find((category) => SLIP_TYPE_LABELS[category] === trimmed);
    if (exact) {
      return exact;
    }

    const upper = trimmed.replace(/\s+/g, ' ').toUpperCase();
    const caseInsensitive = CATEGORIES.find(
      (category) => SLIP_TYPE_LABELS[category].toUpperCase() === upper
    );
    if (caseInsensitive) {
      return caseInsensitive;
    }

    const synonym = CATEGORIES.find((category) => SLIP_TYPE_SYNONYMS[category].includes(upper));
    if (synonym) {
      return synonym;
    }

    return null;
  }

  static label(category: SlipCategory): string {
    return SLIP_TYPE_LABELS[category];
  }
}
