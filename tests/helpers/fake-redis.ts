import { ConversationRedis } from '../../src/memory/conversation-memory';
import { TicketRedis } from '../../src/ticketing/ticket-number-store';

/** In-process stand-in for the Redis string, list and sorted-set commands the stores use. */
export class FakeRedis implements ConversationRedis, TicketRedis {
  readonly strings = new Map<string, string>();
  readonly lists = new Map<string, string[]>();
  readonly zsets = new Map<string, Map<string, number>>();

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string, mode?: 'NX'): Promise<'OK' | null> {
    if (mode === 'NX' && this.strings.has(key)) return null;
    this.strings.set(key, value);
    return 'OK';
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    const added = zset.has(member) ? 0 : 1;
    zset.set(member, score);
    this.zsets.set(key, zset);
    return added;
  }

  async rpush(key: string, value: string): Promise<number> {
    const list = this.lists.get(key) ?? [];
    list.push(value);
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    const list = this.lists.get(key) ?? [];
    const from = Math.max(start < 0 ? list.length + start : start, 0);
    const to = Math.min(stop < 0 ? list.length + stop : stop, list.length - 1);
    return from > to ? [] : list.slice(from, to + 1);
  }

  async zrevrange(key: string, start: number, stop: number): Promise<string[]> {
    const members = Array.from(this.zsets.get(key) ?? new Map<string, number>())
      .sort(([a, sa], [b, sb]) => sb - sa || (a < b ? 1 : a > b ? -1 : 0))
      .map(([member]) => member);
    const to = stop < 0 ? members.length + stop : stop;
    return members.slice(Math.max(start, 0), to + 1);
  }
}
