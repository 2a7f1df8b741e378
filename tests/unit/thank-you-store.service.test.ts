import { query } from '../../src/db/client';
import { ThankYouStoreService } from '../../src/services/thank-you-store.service';
import { Member } from '../../src/models/member';
import { createThankYou } from '../../src/models/relations';

const mockClient = {
  query: jest.fn(),
  release: jest.fn(),
};

jest.mock('../../src/db/client', () => ({
  query: jest.fn(),
  getClient: jest.fn(async () => mockClient),
}));

const mockedQuery = jest.mocked(query);

describe('ThankYouStoreService', () => {
  const ann = new Member('Ann', 'Archer');
  const ben = new Member('Ben', 'Baker');

  const thankYous = [
    createThankYou({ receiver: ben, giver: ann, amount: 100, withinOrganization: true }),
    createThankYou({ receiver: ben, amount: 40, withinOrganization: false, description: 'Outside client' }),
  ];

  beforeEach(() => {
    jest.clearAllMocks();
    mockClient.query.mockResolvedValue({ rows: [], rowCount: 0 });
  });

  describe('saveAll', () => {
    it('should insert every record inside one transaction', async () => {
      await expect(ThankYouStoreService.saveAll('run-1', thankYous)).resolves.toBe(2);

      const statements = mockClient.query.mock.calls.map((call) => String(call[0]).trim().split(/\s+/)[0]);
      expect(statements).toEqual(['BEGIN', 'INSERT', 'INSERT', 'COMMIT']);
      expect(mockClient.query.mock.calls[1][1]).toEqual([
        'run-1',
        'benbaker',
        'Ben Baker',
        'annarcher',
        'Ann Archer',
        100,
        true,
        null,
        null,
      ]);
      expect(mockClient.query.mock.calls[2][1]).toEqual([
        'run-1',
        'benbaker',
        'Ben Baker',
        null,
        null,
        40,
        false,
        'Outside client',
        null,
      ]);
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should roll back and rethrow when an insert fails', async () => {
      mockClient.query.mockImplementation(async (sql: string) => {
        if (sql.includes('INSERT')) {
          throw new Error('insert failed');
        }
        return { rows: [], rowCount: 0 };
      });

      await expect(ThankYouStoreService.saveAll('run-1', thankYous)).rejects.toThrow('insert failed');
      expect(mockClient.query).toHaveBeenCalledWith('ROLLBACK');
      expect(mockClient.release).toHaveBeenCalledTimes(1);
    });

    it('should not open a transaction for nothing', async () => {
      await expect(ThankYouStoreService.saveAll('run-1', [])).resolves.toBe(0);
      expect(mockClient.query).not.toHaveBeenCalled();
    });
  });

  describe('listByReceiver', () => {
    it('should map rows to stored records', async () => {
      const createdAt = new Date('2024-03-01T10:00:00Z');
      mockedQuery.mockResolvedValueOnce({
        command: 'SELECT',
        rowCount: 1,
        oid: 0,
        fields: [],
        rows: [
          {
            id: 7,
            run_id: 'run-1',
            receiver_key: 'benbaker',
            receiver_name: 'Ben Baker',
            giver_key: null,
            giver_name: null,
            amount: '40.00',
            within_organization: false,
            description: 'Outside client',
            slip_date: null,
            created_at: createdAt,
          },
        ],
      });

      await expect(ThankYouStoreService.listByReceiver('benbaker')).resolves.toEqual([
        {
          id: 7,
          runId: 'run-1',
          receiverKey: 'benbaker',
          receiverName: 'Ben Baker',
          giverKey: null,
          giverName: null,
          amount: 40,
          withinOrganization: false,
          description: 'Outside client',
          slipDate: null,
          createdAt,
        },
      ]);
      expect(mockedQuery).toHaveBeenCalledWith(expect.stringContaining('WHERE receiver_key = $1'), ['benbaker']);
    });
  });

  describe('clear', () => {
    it('should delete the rows of one run', async () => {
      mockedQuery.mockResolvedValueOnce({ command: 'DELETE', rowCount: 3, oid: 0, fields: [], rows: [] });

      await expect(ThankYouStoreService.clear('run-1')).resolves.toBe(3);
      expect(mockedQuery).toHaveBeenCalledWith('DELETE FROM thank_you_slips WHERE run_id = $1', ['run-1']);
    });
  });
});
