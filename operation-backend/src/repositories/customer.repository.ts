import type { Queryable } from '../database/client.js';
import type { Customer, CustomerStats, CustomerStatus } from '../types/operation.types.js';

export interface NewCustomer {
  name: string;
  email?: string;
  phone?: string;
  status: CustomerStatus;
}

export interface CustomerChanges {
  name?: string;
  email?: string;
  phone?: string;
}

export class CustomerRepository {
  constructor(private readonly db: Queryable) {}

  async findById(id: number): Promise<Customer | null> {
    const result = await this.db.query<Customer>('SELECT * FROM customers WHERE id = $1', [id]);
    return result.rows[0] ?? null;
  }

  async list(status?: CustomerStatus): Promise<Customer[]> {
    if (status) {
      const result = await this.db.query<Customer>('SELECT * FROM customers WHERE status = $1 ORDER BY name', [status]);
      return result.rows;
    }
    const result = await this.db.query<Customer>('SELECT * FROM customers ORDER BY name');
    return result.rows;
  }

  async create(customer: NewCustomer): Promise<Customer> {
    const result = await this.db.query<Customer>(
      `INSERT INTO customers (name, email, phone, status)
       VALUES ($1, $2, $3, $4)
       RETURNING *`,
      [customer.name, customer.email ?? null, customer.phone ?? null, customer.status]
    );
    return result.rows[0];
  }

  /** Applies only the fields given; returns null when the customer does not exist. */
  async update(id: number, changes: CustomerChanges): Promise<Customer | null> {
    const assignments: string[] = [];
    const params: unknown[] = [];

    for (const column of ['name', 'email', 'phone'] as const) {
      const value = changes[column];
      if (value !== undefined) {
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
    }

    if (assignments.length === 0) {
      return this.findById(id);
    }

    params.push(id);
    const result = await this.db.query<Customer>(
      `UPDATE customers SET ${assignments.join(', ')} WHERE id = $${params.length} RETURNING *`,
      params
    );
    return result.rows[0] ?? null;
  }

  async setStatus(id: number, status: CustomerStatus): Promise<Customer | null> {
    const result = await this.db.query<Customer>('UPDATE customers SET status = $2 WHERE id = $1 RETURNING *', [id, status]);
    return result.rows[0] ?? null;
  }

  async stats(): Promise<CustomerStats> {
    const byStatus = await this.db.query<{ status: string; count: number }>(
      'SELECT status, COUNT(*)::int AS count FROM customers GROUP BY status'
    );
    const total = await this.db.query<{ total: number }>('SELECT COUNT(*)::int AS total FROM customers');

    const by_status: Record<string, number> = {};
    for (const row of byStatus.rows) {
      by_status[row.status] = row.count;
    }
    return { total_customers: total.rows[0]?.total ?? 0, by_status };
  }
}
