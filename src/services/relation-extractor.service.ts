import { logger } from '../config/logger.js';
import { createMeeting, createReferral, createThankYou } from '../models/relations.js';
import { errorMessage } from '../models/errors.js';
import { SlipClassifierService } from './slip-classifier.service.js';
import { cellAt, cellText, isEmptyRow } from '../utils/cells.js';
import type { MemberRegistry } from './member-registry.service.js';
import type {
  CellRow,
  CellValue,
  ProcessingWarning,
  RelationSet,
  Sheet,
  WarningCode,
  WithinOrganizationRule,
} from '../types/models.js';

/** Fixed column positions of a slip export (0-indexed) */
export const SLIP_COLUMNS = {
  GIVER_NAME: 0,
  RECEIVER_NAME: 1,
  SLIP_TYPE: 2,
  THANK_YOU_AMOUNT: 4,
  DETAIL: 6,
} as const;

export interface ExtractionOptions {
  withinOrganizationRule?: WithinOrganizationRule;
}

export interface ExtractionResult extends RelationSet {
  warnings: ProcessingWarning[];
  rowsRead: number;
}

export class RelationExtractorService {
  /**
   * Extract relation records from the rows of one slip sheet.
   *
   * Row 1 is the header. Every data-quality problem is recorded as a warning
   * and the row is skipped; nothing thrown while handling a row escapes.
   */
  static extractFromSheet(
    sheet: Sheet,
    registry: MemberRegistry,
    options: ExtractionOptions = {}
  ): ExtractionResult {
    const rule = options.withinOrganizationRule ?? 'empty-detail';
    const result: ExtractionResult = {
      referrals: [],
      meetings: [],
      thankYous: [],
      warnings: [],
      rowsRead: 0,
    };

    const warn = (code: WarningCode, message: string, row: number) => {
      logger.warn(message, { source: sheet.name, row });
      result.warnings.push({ code, message, source: sheet.name, row });
    };

    sheet.rows.forEach((row, index) => {
      if (index === 0 || isEmptyRow(row)) {
        return;
      }
      result.rowsRead++;

      const rowNumber = index + 1;
      try {
        this.extractRow(row, rowNumber, registry, rule, result, warn);
      } catch (error) {
        warn('invalid_relation', `Row ${rowNumber} skipped: ${errorMessage(error)}`, rowNumber);
      }
    });

    logger.info(`Extracted slips from ${sheet.name}`, {
      referrals: result.referrals.length,
      meetings: result.meetings.length,
      thankYous: result.thankYous.length,
      warnings: result.warnings.length,
      rowsRead: result.rowsRead,
    });

    return result;
  }

  /**
   * Extract from several sheets and concatenate the results. Bad rows are
   * already contained per sheet; unreadable files never get this far.
   */
  static extractFromSheets(
    sheets: readonly Sheet[],
    registry: MemberRegistry,
    options: ExtractionOptions = {}
  ): ExtractionResult {
    const combined: ExtractionResult = {
      referrals: [],
      meetings: [],
      thankYous: [],
      warnings: [],
      rowsRead: 0,
    };

    for (const sheet of sheets) {
      const result = this.extractFromSheet(sheet, registry, options);
      combined.referrals.push(...result.referrals);
      combined.meetings.push(...result.meetings);
      combined.thankYous.push(...result.thankYous);
      combined.warnings.push(...result.warnings);
      combined.rowsRead += result.rowsRead;
    }

    return combined;
  }

  /**
   * Parse a currency-formatted amount such as "$1,250.00".
   * Returns null when nothing numeric is left after stripping.
   */
  static parseAmount(value: CellValue): number | null {
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : null;
    }

    const text = cellText(value).replace(/[\p{Sc},\s]/gu, '');
    if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(text)) {
      return null;
    }
    return Number(text);
  }

  static isWithinOrganization(detail: CellValue, rule: WithinOrganizationRule): boolean {
    switch (rule) {
      case 'always':
        return true;
      case 'never':
        return false;
      case 'empty-detail':
        return cellText(detail) === '';
    }
  }

  private static extractRow(
    row: CellRow,
    rowNumber: number,
    registry: MemberRegistry,
    rule: WithinOrganizationRule,
    result: ExtractionResult,
    warn: (code: WarningCode, message: string, row: number) => void
  ): void {
    const giverName = cellText(cellAt(row, SLIP_COLUMNS.GIVER_NAME));
    const receiverName = cellText(cellAt(row, SLIP_COLUMNS.RECEIVER_NAME));
    const slipType = cellAt(row, SLIP_COLUMNS.SLIP_TYPE);

    if (cellText(slipType) === '') {
      return;
    }

    const category = SlipClassifierService.classify(slipType);
    if (category === null) {
      warn('unrecognized_slip_type', `Row ${rowNumber}: unrecognized slip type "${cellText(slipType)}"`, rowNumber);
      return;
    }

    if (category === 'thank_you') {
      // Only the receiver is mandatory; a blank giver is business from outside
      if (!receiverName) {
        warn('missing_member_name', `Row ${rowNumber}: thank-you slip without a receiver`, rowNumber);
        return;
      }
      const receiver = registry.find(receiverName);
      if (!receiver) {
        warn('unresolved_member', `Row ${rowNumber}: unknown receiver "${receiverName}"`, rowNumber);
        return;
      }

      const giver = giverName ? registry.find(giverName) : null;
      if (giverName && !giver) {
        logger.debug(`Row ${rowNumber}: unknown thank-you giver "${giverName}" treated as absent`);
      }

      const rawAmount = cellAt(row, SLIP_COLUMNS.THANK_YOU_AMOUNT);
      const amount = this.parseAmount(rawAmount) ?? 0;
      if (amount <= 0) {
        warn(
          'invalid_amount',
          `Row ${rowNumber}: thank-you amount "${cellText(rawAmount)}" is empty, zero or invalid`,
          rowNumber
        );
        return;
      }

      const detail = cellAt(row, SLIP_COLUMNS.DETAIL);
      result.thankYous.push(
        createThankYou({
          receiver,
          giver,
          amount,
          withinOrganization: this.isWithinOrganization(detail, rule),
          description: cellText(detail) || null,
        })
      );
      return;
    }

    if (!giverName || !receiverName) {
      warn('missing_member_name', `Row ${rowNumber}: slip needs both a giver and a receiver`, rowNumber);
      return;
    }

    const giver = registry.find(giverName);
    const receiver = registry.find(receiverName);
    if (!giver || !receiver) {
      const unknown = [!giver ? giverName : null, !receiver ? receiverName : null].filter(Boolean);
      warn('unresolved_member', `Row ${rowNumber}: unknown member(s) ${unknown.map((n) => `"${n}"`).join(', ')}`, rowNumber);
      return;
    }

    if (category === 'referral') {
      result.referrals.push(createReferral(giver, receiver));
    } else {
      result.meetings.push(createMeeting(giver, receiver));
    }
  }
}
