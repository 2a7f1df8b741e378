import { Member } from '../../src/models/member';
import { MemberMatrix } from '../../src/models/matrix';
import { createMeeting, createReferral } from '../../src/models/relations';
import { MatrixAggregatorService } from '../../src/services/matrix-aggregator.service';
import { MatrixConsistencyError } from '../../src/models/errors';

describe('MatrixAggregatorService', () => {
  const ann = new Member('Ann', 'Archer');
  const ben = new Member('Ben', 'Baker');
  const cal = new Member('Cal', 'Carter');
  const members = [ann, ben, cal];

  describe('buildReferralMatrix', () => {
    it('should count referrals per directed pair and leave the rest at zero', () => {
      const { matrix, stats } = MatrixAggregatorService.buildReferralMatrix(members, [
        createReferral(ann, ben),
        createReferral(ann, ben),
        createReferral(ann, cal),
      ]);

      expect(matrix.toArray()).toEqual([
        [0, 2, 1],
        [0, 0, 0],
        [0, 0, 0],
      ]);
      expect(stats[0]).toEqual({ member: ann, totalGiven: 3, uniqueGiven: 2, totalReceived: 0, uniqueReceived: 0 });
      expect(stats[1]).toEqual({ member: ben, totalGiven: 0, uniqueGiven: 0, totalReceived: 2, uniqueReceived: 1 });
    });

    it('should ignore referrals naming members outside the universe', () => {
      const outsider = new Member('Dee', 'Dunn');
      const { matrix } = MatrixAggregatorService.buildReferralMatrix(members, [createReferral(outsider, ann)]);

      expect(matrix.toArray().flat().every((cell) => cell === 0)).toBe(true);
    });

    it('should give the same matrix for one list of three as for three lists of one', () => {
      const referral = createReferral(ann, ben);
      const once = MatrixAggregatorService.buildReferralMatrix(members, [referral, referral, referral]).matrix;

      const summed = new MemberMatrix(members);
      for (let i = 0; i < 3; i++) {
        const single = MatrixAggregatorService.buildReferralMatrix(members, [referral]).matrix;
        for (const giver of members) {
          for (const receiver of members) {
            summed.increment(giver, receiver, single.get(giver, receiver));
          }
        }
      }

      expect(once.toArray()).toEqual(summed.toArray());
    });
  });

  describe('buildMeetingMatrix', () => {
    it('should be symmetric', () => {
      const { matrix, stats } = MatrixAggregatorService.buildMeetingMatrix(members, [
        createMeeting(ben, ann),
        createMeeting(cal, ann),
        createMeeting(ann, ben),
      ]);

      for (const a of members) {
        for (const b of members) {
          expect(matrix.get(a, b)).toBe(matrix.get(b, a));
        }
      }
      expect(matrix.get(ann, ben)).toBe(2);
      expect(stats[0]).toEqual({ member: ann, totalGiven: 3, uniqueGiven: 2, totalReceived: 3, uniqueReceived: 2 });
    });
  });
});

describe('MemberMatrix', () => {
  const ann = new Member('Ann', 'Archer');
  const ben = new Member('Ben', 'Baker');

  it('should throw for lookups outside the universe', () => {
    const matrix = new MemberMatrix([ann]);

    expect(() => matrix.get(ann, ben)).toThrow(MatrixConsistencyError);
    expect(matrix.increment(ann, ben)).toBe(false);
  });

  it('should reject duplicate members', () => {
    expect(() => new MemberMatrix([ann, new Member('ann', 'archer')])).toThrow(MatrixConsistencyError);
  });

  it('should compare universes regardless of order', () => {
    expect(new MemberMatrix([ann, ben]).sameUniverse(new MemberMatrix([ben, ann]))).toBe(true);
    expect(new MemberMatrix([ann, ben]).sameUniverse(new MemberMatrix([ann]))).toBe(false);
  });
});
