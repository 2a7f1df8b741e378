import { logger } from '../config/logger.js';
import { Member, normalizeName } from '../models/member.js';
import { cellAt, cellText } from '../utils/cells.js';
import type { CellRow, ProcessingWarning, Sheet } from '../types/models.js';

export interface RegistryBuildResult {
  registry: MemberRegistry;
  warnings: ProcessingWarning[];
}

/**
 * The member universe of one analysis run.
 *
 * Duplicate names (same normalized key) keep the first occurrence and report
 * the later ones as warnings. Members are exposed ordered by normalized key.
 */
export class MemberRegistry {
  private readonly byKey: Map<string, Member>;
  readonly members: readonly Member[];

  private constructor(members: Member[]) {
    this.members = [...members].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));
    this.byKey = new Map(this.members.map((member) => [member.key, member]));
  }

  /**
   * Build from (first name, last name) rows. Rows must not include a header.
   */
  static fromNameRows(rows: readonly CellRow[], source: string | null = null): RegistryBuildResult {
    const warnings: ProcessingWarning[] = [];
    const accepted = new Map<string, Member>();

    rows.forEach((row, index) => {
      const result = this.memberFromRow(row);
      if (result === null) {
        return;
      }

      const rowNumber = index + 1;
      const existing = accepted.get(result.key);
      if (existing) {
        // First occurrence wins
        const message = `Duplicate member "${result.fullName}" ignored; keeping "${existing.fullName}"`;
        logger.warn(message, { source, row: rowNumber });
        warnings.push({ code: 'duplicate_member', message, source, row: rowNumber });
        return;
      }

      accepted.set(result.key, result);
    });

    return { registry: new MemberRegistry([...accepted.values()]), warnings };
  }

  /**
   * Build from member list sheets, skipping the header row of each sheet.
   * Rows from later sheets lose to earlier ones on duplicate names.
   */
  static fromMemberSheets(sheets: readonly Sheet[]): RegistryBuildResult {
    const warnings: ProcessingWarning[] = [];
    const accepted = new Map<string, Member>();

    for (const sheet of sheets) {
      const { registry, warnings: sheetWarnings } = this.fromNameRows(sheet.rows.slice(1), sheet.name);
      warnings.push(...sheetWarnings.map((warning) => ({ ...warning, row: offsetRow(warning.row) })));

      for (const member of registry.members) {
        const existing = accepted.get(member.key);
        if (existing) {
          const message = `Duplicate member "${member.fullName}" in ${sheet.name} ignored; keeping "${existing.fullName}"`;
          logger.warn(message);
          warnings.push({ code: 'duplicate_member', message, source: sheet.name, row: null });
          continue;
        }
        accepted.set(member.key, member);
      }
    }

    logger.info(`Loaded ${accepted.size} members from ${sheets.length} member sheet(s)`);
    return { registry: new MemberRegistry([...accepted.values()]), warnings };
  }

  get size(): number {
    return this.members.length;
  }

  /**
   * Resolve a free-text name; the lookup key is normalized the same way as
   * member keys.
   */
  find(name: string): Member | null {
    const key = normalizeName(name);
    if (!key) {
      return null;
    }
    return this.byKey.get(key) ?? null;
  }

  has(member: Member): boolean {
    return this.byKey.has(member.key);
  }

  private static memberFromRow(row: CellRow): Member | null {
    const firstName = cellText(cellAt(row, 0));
    const lastName = cellText(cellAt(row, 1));

    // Rows with both name fields empty are dropped
    if (!firstName && !lastName) {
      return null;
    }
    return new Member(firstName, lastName);
  }
}

// Sheet rows are numbered from the header, which fromNameRows never sees
function offsetRow(row: number | null): number | null {
  return row === null ? null : row + 1;
}
