import { MatrixConsistencyError } from './errors.js';
import type { Member } from './member.js';

/**
 * Dense square table over a fixed member universe.
 *
 * Members are mapped to row/column indexes once at construction and every
 * cell starts at 0, self-pairs included. Lookups for members outside the
 * universe throw; increments for them are refused and reported back to the
 * caller instead.
 */
export class MemberMatrix {
  readonly members: readonly Member[];
  private readonly index: Map<string, number>;
  private readonly cells: number[][];

  constructor(members: readonly Member[]) {
    this.members = [...members];
    this.index = new Map();

    this.members.forEach((member, position) => {
      if (this.index.has(member.key)) {
        throw new MatrixConsistencyError(`Member ${member.fullName} appears twice in the matrix universe`);
      }
      this.index.set(member.key, position);
    });

    this.cells = this.members.map(() => new Array<number>(this.members.length).fill(0));
  }

  get size(): number {
    return this.members.length;
  }

  has(member: Member): boolean {
    return this.index.has(member.key);
  }

  get(giver: Member, receiver: Member): number {
    return this.cells[this.indexOf(giver)][this.indexOf(receiver)];
  }

  set(giver: Member, receiver: Member, value: number): void {
    this.cells[this.indexOf(giver)][this.indexOf(receiver)] = value;
  }

  /**
   * Add to a cell. Returns false (and changes nothing) when either member is
   * not part of the universe.
   */
  increment(giver: Member, receiver: Member, by = 1): boolean {
    const row = this.index.get(giver.key);
    const column = this.index.get(receiver.key);
    if (row === undefined || column === undefined) {
      return false;
    }
    this.cells[row][column] += by;
    return true;
  }

  row(member: Member): number[] {
    return [...this.cells[this.indexOf(member)]];
  }

  column(member: Member): number[] {
    const column = this.indexOf(member);
    return this.cells.map((row) => row[column]);
  }

  /**
   * Same member keys, regardless of order
   */
  sameUniverse(other: MemberMatrix): boolean {
    if (other.size !== this.size) {
      return false;
    }
    return other.members.every((member) => this.index.has(member.key));
  }

  toArray(): number[][] {
    return this.cells.map((row) => [...row]);
  }

  private indexOf(member: Member): number {
    const position = this.index.get(member.key);
    if (position === undefined) {
      throw new MatrixConsistencyError(`Member ${member.fullName} is not part of this matrix`);
    }
    return position;
  }
}
