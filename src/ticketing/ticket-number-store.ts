/**
 * Ticket Number Store
 *
 * Per-tenant uniqueness of ticket numbers.
 * Redis SET NX (no TTL: ticket numbers live as long as their conversation),
 * in-memory fallback.
 */

import Redis from 'ioredis';
import { TicketNumberStore } from './types';
import { env } from '../config/env';
import { logger } from '../observability/logger';

// ───── Redis Implementation ─────────────────────────────────────

export interface TicketRedis {
  set(key: string, value: string, mode: 'NX'): Promise<'OK' | null>;
}

export class RedisTicketNumberStore implements TicketNumberStore {
  constructor(
    private readonly redis: TicketRedis,
    private readonly prefix: string = `${env.redis.keyPrefix}ticket:`,
  ) {}

  async reserve(tenantId: string, ticketNumber: string): Promise<boolean> {
    // SET NX returns 'OK' if key was set (new), null if it already exists
    const result = await this.redis.set(`${this.prefix}${tenantId}:${ticketNumber}`, '1', 'NX');
    return result === 'OK';
  }
}

// ───── In-Memory Implementation ─────────────────────────────────

export class InMemoryTicketNumberStore implements TicketNumberStore {
  private readonly taken = new Set<string>();

  async reserve(tenantId: string, ticketNumber: string): Promise<boolean> {
    const key = `${tenantId}:${ticketNumber}`;
    if (this.taken.has(key)) return false;
    this.taken.add(key);
    return true;
  }
}

// ───── Factory ──────────────────────────────────────────────────

export function createTicketNumberStore(redis?: Redis): TicketNumberStore {
  if (redis) {
    logger.info('Ticket number store: Redis-backed (SET NX)');
    return new RedisTicketNumberStore(redis);
  }
  logger.info('Ticket number store: In-memory');
  return new InMemoryTicketNumberStore();
}
