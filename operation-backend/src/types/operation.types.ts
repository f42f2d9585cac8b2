export const CUSTOMER_STATUSES = ['active', 'disabled'] as const;
export const TICKET_STATUSES = ['open', 'in_progress', 'resolved'] as const;
export const TICKET_PRIORITIES = ['low', 'medium', 'high'] as const;

export type CustomerStatus = (typeof CUSTOMER_STATUSES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export interface Customer {
  id: number;
  name: string;
  email: string | null;
  phone: string | null;
  status: CustomerStatus;
  created_at: Date;
  updated_at: Date;
}

export interface Ticket {
  id: number;
  customer_id: number;
  issue: string;
  status: TicketStatus;
  priority: TicketPriority;
  created_at: Date;
}

/** A ticket joined with the customer it belongs to. */
export interface TicketWithCustomer extends Ticket {
  customer_name: string;
  customer_email: string | null;
  customer_phone: string | null;
  customer_status: CustomerStatus;
}

export interface TicketStats {
  total_tickets: number;
  by_status: Record<string, number>;
  by_priority: Record<string, number>;
}

export interface CustomerStats {
  total_customers: number;
  by_status: Record<string, number>;
}

export type ParameterType = 'string' | 'integer' | 'number' | 'boolean';

export interface OperationParameter {
  type: ParameterType;
  required: boolean;
  description?: string;
  enum?: string[];
}

/** Catalog entry as published at GET /operations. */
export interface OperationDefinition {
  name: string;
  description: string;
  parameters: Record<string, OperationParameter>;
  returns: string;
  mutates: boolean;
}
