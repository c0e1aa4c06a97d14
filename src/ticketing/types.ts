export interface TicketNumberStore {
  /** Claim `ticketNumber` for a tenant. Returns false when it is already taken. */
  reserve(tenantId: string, ticketNumber: string): Promise<boolean>;
}

export interface TicketFormat {
  prefix: string;
  /** Characters after the prefix */
  length: number;
  /** Collisions tolerated before allocation gives up */
  maxAttempts: number;
}

export interface ResolutionMetadata {
  resolvedAt: string;
  resolutionTimeSeconds: number;
  satisfactionScore: number | null;
}

export class TicketAllocationError extends Error {
  constructor(readonly tenantId: string, readonly attempts: number) {
    super(`Could not allocate a unique ticket number for tenant "${tenantId}" after ${attempts} attempts`);
    this.name = 'TicketAllocationError';
  }
}
