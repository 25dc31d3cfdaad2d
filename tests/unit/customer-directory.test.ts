import * as path from 'path';
import {
  JsonCustomerDirectory,
  formatCustomerContext,
  loadCustomerSnapshot,
} from '../../src/customers/customer-directory';
import { CustomerDirectory } from '../../src/customers/types';
import { CollaboratorFailureError } from '../../src/orchestrator/errors';

const FIXTURE_DIR = path.resolve(__dirname, '..', 'fixtures', 'customers');

describe('JsonCustomerDirectory', () => {
  const directory = JsonCustomerDirectory.fromFile(path.join(FIXTURE_DIR, 'customers.json'));

  it('looks up accounts and subscriptions', async () => {
    expect((await directory.getAccount('u-100'))?.name).toBe('Ada Member');
    expect((await directory.getSubscription('u-100'))?.status).toBe('cancelled');
    expect(await directory.getAccount('nobody')).toBeNull();
    expect(await directory.getSubscription('nobody')).toBeNull();
  });

  it('joins reservations to their experience', async () => {
    const reservations = await directory.getReservations('u-100');

    expect(reservations.map((r) => r.reservationId)).toEqual(['res-9', 'res-10']);
    expect(reservations[0].experience?.title).toBe('Night kayak');
    expect(reservations[1].experience).toBeUndefined();
  });

  it('finds experiences by id', async () => {
    expect((await directory.getExperience('exp-9'))?.slotsAvailable).toBe(0);
    expect(await directory.getExperience('exp-missing')).toBeNull();
  });

  it('is empty when the data file is missing', async () => {
    const empty = JsonCustomerDirectory.fromFile(path.join(FIXTURE_DIR, 'missing.json'));
    expect(await empty.getAccount('u-100')).toBeNull();
  });

  it('rejects a data file that fails validation', () => {
    expect(() => JsonCustomerDirectory.fromFile(path.join(FIXTURE_DIR, 'invalid.json'))).toThrow(
      '/accounts/0/status must be equal to one of the allowed values',
    );
  });
});

describe('loadCustomerSnapshot', () => {
  const directory = JsonCustomerDirectory.fromFile(path.join(FIXTURE_DIR, 'customers.json'));

  it('is empty without a user id', async () => {
    expect(await loadCustomerSnapshot(directory, undefined)).toEqual({
      account: null,
      subscription: null,
      reservations: [],
    });
  });

  it('wraps directory errors as customers collaborator failures', async () => {
    const broken: CustomerDirectory = {
      getAccount: async () => {
        throw new Error('directory offline');
      },
      getSubscription: async () => null,
      getReservations: async () => [],
      getExperience: async () => null,
    };

    const load = loadCustomerSnapshot(broken, 'u-1');
    await expect(load).rejects.toBeInstanceOf(CollaboratorFailureError);
    await expect(load).rejects.toMatchObject({ kind: 'customers' });
  });
});

describe('formatCustomerContext', () => {
  it('renders a linked customer', async () => {
    const directory = JsonCustomerDirectory.fromFile(path.join(FIXTURE_DIR, 'customers.json'));
    const snapshot = await loadCustomerSnapshot(directory, 'u-100');

    expect(formatCustomerContext(snapshot)).toBe(
      [
        'Customer: Ada Member (u-100)',
        'Account status: ACTIVE',
        'Subscription: basic / cancelled (ended 2026-02-01)',
        'Reservations:',
        '  - res-9: Night kayak at 2026-12-01T20:00 [cancelled]',
        '  - res-10: exp-missing at unknown time [reserved]',
      ].join('\n'),
    );
  });

  it('renders an unknown customer', () => {
    expect(formatCustomerContext({ account: null, subscription: null, reservations: [] })).toBe(
      'Customer: unknown (no linked account)',
    );
  });
});
