import * as fs from 'fs';
import Ajv from 'ajv';
import {
  CustomerAccount,
  CustomerDirectory,
  CustomerSnapshot,
  Experience,
  Reservation,
  ReservationDetail,
  Subscription,
} from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';
import { asCollaboratorFailure } from '../orchestrator/errors';

interface CustomerDataFile {
  accounts: CustomerAccount[];
  subscriptions: Subscription[];
  experiences: Experience[];
  reservations: Reservation[];
}

const ajv = new Ajv({ allErrors: true });

const DATA_FILE_SCHEMA = {
  type: 'object',
  required: ['accounts', 'subscriptions', 'experiences', 'reservations'],
  properties: {
    accounts: {
      type: 'array',
      items: {
        type: 'object',
        required: ['userId', 'name', 'email', 'status'],
        properties: {
          userId: { type: 'string' },
          name: { type: 'string' },
          email: { type: 'string' },
          status: { type: 'string', enum: ['active', 'blocked'] },
        },
      },
    },
    subscriptions: {
      type: 'array',
      items: {
        type: 'object',
        required: ['userId', 'status', 'tier', 'startedAt'],
        properties: {
          userId: { type: 'string' },
          status: { type: 'string', enum: ['active', 'paused', 'cancelled'] },
          tier: { type: 'string', enum: ['basic', 'premium'] },
          startedAt: { type: 'string' },
          endedAt: { type: 'string' },
        },
      },
    },
    experiences: {
      type: 'array',
      items: {
        type: 'object',
        required: ['experienceId', 'title', 'location', 'when', 'isPremium', 'slotsAvailable'],
        properties: {
          experienceId: { type: 'string' },
          title: { type: 'string' },
          location: { type: 'string' },
          when: { type: 'string' },
          isPremium: { type: 'boolean' },
          slotsAvailable: { type: 'integer', minimum: 0 },
        },
      },
    },
    reservations: {
      type: 'array',
      items: {
        type: 'object',
        required: ['reservationId', 'userId', 'experienceId', 'status'],
        properties: {
          reservationId: { type: 'string' },
          userId: { type: 'string' },
          experienceId: { type: 'string' },
          status: { type: 'string', enum: ['reserved', 'cancelled', 'attended'] },
        },
      },
    },
  },
};

const validateDataFile = ajv.compile<CustomerDataFile>(DATA_FILE_SCHEMA);

/**
 * Customer directory backed by a JSON snapshot of the membership platform.
 */
export class JsonCustomerDirectory implements CustomerDirectory {
  private accounts = new Map<string, CustomerAccount>();
  private subscriptions = new Map<string, Subscription>();
  private experiences = new Map<string, Experience>();
  private reservations: Reservation[] = [];

  constructor(data: CustomerDataFile) {
    for (const a of data.accounts) this.accounts.set(a.userId, a);
    for (const s of data.subscriptions) this.subscriptions.set(s.userId, s);
    for (const e of data.experiences) this.experiences.set(e.experienceId, e);
    this.reservations = data.reservations;
  }

  static fromFile(filepath: string = env.customers.dataPath): JsonCustomerDirectory {
    if (!fs.existsSync(filepath)) {
      logger.warn({ filepath }, 'Customer data file not found; directory is empty');
      return new JsonCustomerDirectory({ accounts: [], subscriptions: [], experiences: [], reservations: [] });
    }
    const parsed: unknown = JSON.parse(fs.readFileSync(filepath, 'utf-8'));
    if (!validateDataFile(parsed)) {
      const errors = validateDataFile.errors?.map((e) => `${e.instancePath} ${e.message}`).join('; ');
      throw new Error(`Invalid customer data file ${filepath}: ${errors}`);
    }
    logger.info({ filepath, accounts: parsed.accounts.length }, 'Customer directory loaded');
    return new JsonCustomerDirectory(parsed);
  }

  async getAccount(userId: string): Promise<CustomerAccount | null> {
    return this.accounts.get(userId) ?? null;
  }

  async getSubscription(userId: string): Promise<Subscription | null> {
    return this.subscriptions.get(userId) ?? null;
  }

  async getReservations(userId: string): Promise<ReservationDetail[]> {
    return this.reservations
      .filter((r) => r.userId === userId)
      .map((r) => ({ ...r, experience: this.experiences.get(r.experienceId) }));
  }

  async getExperience(experienceId: string): Promise<Experience | null> {
    return this.experiences.get(experienceId) ?? null;
  }
}

/**
 * Load everything known about a customer. Misses come back as null / empty;
 * directory errors surface as a customers collaborator failure.
 */
export async function loadCustomerSnapshot(
  directory: CustomerDirectory,
  userId: string | undefined,
): Promise<CustomerSnapshot> {
  if (!userId) return { account: null, subscription: null, reservations: [] };
  try {
    const [account, subscription, reservations] = await Promise.all([
      directory.getAccount(userId),
      directory.getSubscription(userId),
      directory.getReservations(userId),
    ]);
    return { account, subscription, reservations };
  } catch (err) {
    throw asCollaboratorFailure('customers', err);
  }
}

/** Format a snapshot as prompt context */
export function formatCustomerContext(snapshot: CustomerSnapshot): string {
  const { account, subscription, reservations } = snapshot;
  if (!account) return 'Customer: unknown (no linked account)';

  const lines = [
    `Customer: ${account.name} (${account.userId})`,
    `Account status: ${account.status.toUpperCase()}`,
    subscription
      ? `Subscription: ${subscription.tier} / ${subscription.status}${subscription.endedAt ? ` (ended ${subscription.endedAt})` : ''}`
      : 'Subscription: none',
  ];

  if (reservations.length > 0) {
    lines.push('Reservations:');
    for (const r of reservations) {
      const title = r.experience?.title ?? r.experienceId;
      const when = r.experience?.when ?? 'unknown time';
      lines.push(`  - ${r.reservationId}: ${title} at ${when} [${r.status}]`);
    }
  }

  return lines.join('\n');
}
