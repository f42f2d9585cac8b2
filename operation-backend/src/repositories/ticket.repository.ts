import type { Queryable } from '../database/client.js';
import type { TicketPriority, TicketStats, TicketStatus, TicketWithCustomer } from '../types/operation.types.js';

const SELECT_WITH_CUSTOMER = `
  SELECT t.*, c.name AS customer_name, c.email AS customer_email,
         c.phone AS customer_phone, c.status AS customer_status
  FROM tickets t
  JOIN customers c ON t.customer_id = c.id`;

export interface TicketFilter {
  status?: TicketStatus;
  priority?: TicketPriority;
  customerId?: number;
}

export interface NewTicket {
  customerId: number;
  issue: string;
  priority: TicketPriority;
  status: TicketStatus;
}

export class TicketRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<TicketWithCustomer | null> {
    const result = await this.db.query<TicketWithCustomer>(`${SELECT_WITH_CUSTOMER} WHERE t.id = $1`, [id]);
    return result.rows[0] ?? null;
  }

  /** Highest priority first, newest first within a priority. */
  async list(filter: TicketFilter = {}): Promise<TicketWithCustomer[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];

    if (filter.status) {
      params.push(filter.status);
      conditions.push(`t.status = $${params.length}`);
    }
    if (filter.priority) {
      params.push(filter.priority);
      conditions.push(`t.priority = $${params.length}`);
    }
    if (filter.customerId !== undefined) {
      params.push(filter.customerId);
      conditions.push(`t.customer_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.db.query<TicketWithCustomer>(
      `${SELECT_WITH_CUSTOMER}${where}
       ORDER BY CASE t.priority WHEN 'high' THEN 1 WHEN 'medium' THEN 2 WHEN 'low' THEN 3 END, t.created_at DESC`,
      params
    );
    return result.rows;
  }

  /** Returns the new ticket's id. */
  async create(ticket: NewTicket): Promise<number> {
    const result = await this.db.query<{ id: number }>(
      'INSERT INTO tickets (customer_id, issue, priority, status) VALUES ($1, $2, $3, $4) RETURNING id',
      [ticket.customerId, ticket.issue, ticket.priority, ticket.status]
    );
    return result.rows[0].id;
  }

  async setStatus(id: number, status: TicketStatus): Promise<boolean> {
    const result = await this.db.query('UPDATE tickets SET status = $2 WHERE id = $1', [id, status]);
    return (result.rowCount ?? 0) > 0;
  }

  async setPriority(id: number, priority: TicketPriority): Promise<boolean> {
    const result = await this.db.query('UPDATE tickets SET priority = $2 WHERE id = $1', [id, priority]);
    return (result.rowCount ?? 0) > 0;
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query('DELETE FROM tickets WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async search(keyword: string): Promise<TicketWithCustomer[]> {
    const result = await this.db.query<TicketWithCustomer>(
      `${SELECT_WITH_CUSTOMER} WHERE t.issue ILIKE '%' || $1 || '%' ORDER BY t.created_at DESC`,
      [keyword]
    );
    return result.rows;
  }

  async stats(): Promise<TicketStats> {
    const byStatus = await this.db.query<{ status: string; count: number }>(
      'SELECT status, COUNT(*)::int AS count FROM tickets GROUP BY status'
    );
    const byPriority = await this.db.query<{ priority: string; count: number }>(
      'SELECT priority, COUNT(*)::int AS count FROM tickets GROUP BY priority'
    );
    const total = await this.db.query<{ total: number }>('SELECT COUNT(*)::int AS total FROM tickets');

    const by_status: Record<string, number> = {};
    for (const row of byStatus.rows) {
      by_status[row.status] = row.count;
    }
    const by_priority: Record<string, number> = {};
    for (const row of byPriority.rows) {
      by_priority[row.priority] = row.count;
    }
    return { total_tickets: total.rows[0]?.total ?? 0, by_status, by_priority };
  }
}
