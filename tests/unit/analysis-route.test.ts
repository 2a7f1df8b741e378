import { presentAnalysis, runRequestedAnalysis } from '../../src/routes/analysis';
import { analysisRequestSchema, comparisonRequestSchema, formatIssues } from '../../src/routes/schemas';

describe('analysis route helpers', () => {
  const body = {
    members: [
      ['First Name', 'Last Name'],
      ['Jane', 'Doe'],
      ['John', 'Smith'],
    ],
    files: [
      {
        name: 'week1.csv',
        rows: [
          ['Giver', 'Receiver', 'Slip Type'],
          ['Jane Doe', 'John Smith', 'Referral'],
        ],
      },
    ],
  };

  it('should validate a well-formed analysis body', () => {
    expect(analysisRequestSchema.safeParse(body).success).toBe(true);
  });

  it('should explain what is wrong with a bad body', () => {
    const parsed = comparisonRequestSchema.safeParse({ newGrid: [] });

    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(formatIssues(parsed.error)).toEqual([
        'newGrid: Array must contain at least 1 element(s)',
        'oldGrid: Required',
      ]);
    }
  });

  it('should render matrices as export grids', () => {
    const payload = presentAnalysis(runRequestedAnalysis(body));

    expect(payload.success).toBe(true);
    expect(payload.members).toEqual(['Jane Doe', 'John Smith']);
    expect(payload.counts).toEqual({ referrals: 1, meetings: 0, thankYous: 0 });
    expect(payload.grids?.referral[1]).toEqual(['Jane Doe', 0, 1, 1, 1]);
    expect(payload.grids?.combination[2]).toEqual(['John Smith', 0, 0, 2, 0, 0, 0]);
  });

  it('should list thank-you leaders and per-member performance', () => {
    const payload = presentAnalysis(
      runRequestedAnalysis({
        ...body,
        files: [
          {
            name: 'week2.csv',
            rows: [
              ['Giver', 'Receiver', 'Slip Type', 'Date', 'Amount', 'Business Type', 'Detail'],
              ['John Smith', 'Jane Doe', 'TYFCB', '', '$40.00', '', ''],
            ],
          },
        ],
      })
    );

    expect(payload.thankYouLeaders).toEqual({
      givers: [{ member: 'John Smith', amount: 40 }],
      receivers: [{ member: 'Jane Doe', amount: 40 }],
    });
    expect(payload.grids?.thankYouWithin[2]).toEqual(['John Smith', 40, 0, 40]);
    expect(payload.memberPerformance?.map((entry) => entry.member)).toEqual(['Jane Doe', 'John Smith']);
  });

  it('should render a failed run without grids', () => {
    const payload = presentAnalysis(runRequestedAnalysis({ ...body, members: [['First Name', 'Last Name']] }));

    expect(payload.success).toBe(false);
    expect(payload.errors).toEqual(['No members found in the member files']);
    expect(payload.grids).toBeNull();
    expect(payload.thankYouLeaders).toBeNull();
  });
});
