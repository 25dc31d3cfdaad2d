/**
 * Customer directory types — the user / subscription / reservation data source
 */

export type AccountStatus = 'active' | 'blocked';

export interface CustomerAccount {
  userId: string;
  name: string;
  email: string;
  status: AccountStatus;
}

export interface Subscription {
  userId: string;
  status: 'active' | 'paused' | 'cancelled';
  tier: 'basic' | 'premium';
  startedAt: string;
  endedAt?: string;
}

export interface Experience {
  experienceId: string;
  title: string;
  location: string;
  when: string;
  isPremium: boolean;
  slotsAvailable: number;
}

export interface Reservation {
  reservationId: string;
  userId: string;
  experienceId: string;
  status: 'reserved' | 'cancelled' | 'attended';
}

export interface ReservationDetail extends Reservation {
  experience?: Experience;
}

/** Read-only lookups; null on miss */
export interface CustomerDirectory {
  getAccount(userId: string): Promise<CustomerAccount | null>;
  getSubscription(userId: string): Promise<Subscription | null>;
  getReservations(userId: string): Promise<ReservationDetail[]>;
  getExperience(experienceId: string): Promise<Experience | null>;
}

/** Everything the resolver and escalation stages know about a customer */
export interface CustomerSnapshot {
  account: CustomerAccount | null;
  subscription: Subscription | null;
  reservations: ReservationDetail[];
}
