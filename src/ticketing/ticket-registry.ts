import { randomInt } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { ResolutionMetadata, TicketAllocationError, TicketFormat, TicketNumberStore } from './types';
import { logger } from '../observability/logger';
import { ticketOperations } from '../observability/metrics';

/** No 0/O or 1/I/L: ticket numbers get read aloud and typed back in. */
export const TICKET_ALPHABET = 'ABCDEFGHJKMNPQRSTUVWXYZ23456789';

export const DEFAULT_TICKET_FORMAT: TicketFormat = {
  prefix: 'CHAT-',
  length: 8,
  maxAttempts: 10,
};

/**
 * Issues conversation ids and tenant-unique ticket numbers, and computes
 * resolution metadata. Ticket numbers are drawn at random from a fixed
 * alphabet and regenerated on collision.
 */
export class TicketRegistry {
  private readonly log = logger.child({ component: 'ticket-registry' });

  constructor(
    private readonly store: TicketNumberStore,
    private readonly format: TicketFormat = DEFAULT_TICKET_FORMAT,
    private readonly randomIndex: (max: number) => number = randomInt,
  ) {}

  newConversationId(): string {
    return uuidv4();
  }

  generate(): string {
    let code = '';
    for (let i = 0; i < this.format.length; i++) {
      code += TICKET_ALPHABET[this.randomIndex(TICKET_ALPHABET.length)];
    }
    return `${this.format.prefix}${code}`;
  }

  async issue(tenantId: string): Promise<string> {
    for (let attempt = 1; attempt <= this.format.maxAttempts; attempt++) {
      const candidate = this.generate();
      if (await this.store.reserve(tenantId, candidate)) {
        ticketOperations.inc({ operation: 'issue', outcome: 'success' });
        return candidate;
      }
      ticketOperations.inc({ operation: 'issue', outcome: 'collision' });
      this.log.warn({ tenantId, attempt }, 'Ticket number collision; regenerating');
    }

    ticketOperations.inc({ operation: 'issue', outcome: 'exhausted' });
    throw new TicketAllocationError(tenantId, this.format.maxAttempts);
  }

  resolution(startedAt: string, resolvedAt: Date, satisfactionScore?: number): ResolutionMetadata {
    ticketOperations.inc({ operation: 'resolve', outcome: 'success' });
    const elapsedMs = Math.max(0, resolvedAt.getTime() - Date.parse(startedAt));
    return {
      resolvedAt: resolvedAt.toISOString(),
      resolutionTimeSeconds: Math.round(elapsedMs / 1000),
      satisfactionScore: satisfactionScore ?? null,
    };
  }
}

export function isTicketNumber(value: string, format: TicketFormat = DEFAULT_TICKET_FORMAT): boolean {
  if (!value.startsWith(format.prefix)) return false;
  const code = value.slice(format.prefix.length);
  return code.length === format.length && [...code].every((ch) => TICKET_ALPHABET.includes(ch));
}
