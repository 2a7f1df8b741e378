import { RelationValidationError } from './errors.js';

/**
 * Normalized lookup key for a member name: lower-cased with every
 * whitespace character removed, so "Jane Doe", " jane  doe" and "JaneDoe"
 * all resolve to the same member.
 */
export function normalizeName(value: string): string {
  return value.replace(/\s+/g, '').toLowerCase();
}

export class Member {
  readonly firstName: string;
  readonly lastName: string;
  readonly key: string;

  constructor(firstName: string, lastName: string) {
    this.firstName = firstName.trim();
    this.lastName = lastName.trim();

    if (!this.firstName && !this.lastName) {
      throw new RelationValidationError('Member must have at least a first or last name');
    }

    this.key = normalizeName(`${this.firstName}${this.lastName}`);
    Object.freeze(this);
  }

  get fullName(): string {
    return `${this.firstName} ${this.lastName}`.trim();
  }

  equals(other: Member): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return this.fullName;
  }

  toJSON(): { firstName: string; lastName: string; fullName: string; key: string } {
    return {
      firstName: this.firstName,
      lastName: this.lastName,
      fullName: this.fullName,
      key: this.key,
    };
  }
}
