import {
  CUSTOMER_STATUSES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  type OperationDefinition,
} from '../types/operation.types.js';

const customerId = { type: 'integer', required: true, description: 'Customer id' } as const;
const ticketId = { type: 'integer', required: true, description: 'Ticket id' } as const;

export const OPERATION_CATALOG: OperationDefinition[] = [
  {
    name: 'get_customer',
    description: 'Retrieve a customer by id: name, email, phone, status and timestamps. Null when not found.',
    parameters: { customer_id: customerId },
    returns: 'Customer | null',
    mutates: false,
  },
  {
    name: 'list_customers',
    description: 'List customers sorted by name, optionally filtered by status.',
    parameters: { status: { type: 'string', required: false, enum: [...CUSTOMER_STATUSES] } },
    returns: 'Customer[]',
    mutates: false,
  },
  {
    name: 'add_customer',
    description: 'Create a customer.',
    parameters: {
      name: { type: 'string', required: true },
      email: { type: 'string', required: false },
      phone: { type: 'string', required: false },
      status: { type: 'string', required: false, enum: [...CUSTOMER_STATUSES] },
    },
    returns: 'Customer',
    mutates: true,
  },
  {
    name: 'update_customer',
    description: 'Change a customer\'s name, email or phone. Only the given fields change.',
    parameters: {
      customer_id: customerId,
      name: { type: 'string', required: false },
      email: { type: 'string', required: false },
      phone: { type: 'string', required: false },
    },
    returns: 'Customer',
    mutates: true,
  },
  {
    name: 'disable_customer',
    description: 'Disable a customer account.',
    parameters: { customer_id: customerId },
    returns: 'Customer',
    mutates: true,
  },
  {
    name: 'activate_customer',
    description: 'Re-activate a disabled customer account.',
    parameters: { customer_id: customerId },
    returns: 'Customer',
    mutates: true,
  },
  {
    name: 'get_ticket',
    description: 'Retrieve a ticket by id, with its customer\'s name, email, phone and status. Null when not found.',
    parameters: { ticket_id: ticketId },
    returns: 'TicketWithCustomer | null',
    mutates: false,
  },
  {
    name: 'list_tickets',
    description: 'List tickets, highest priority and newest first, optionally filtered by status, priority or customer.',
    parameters: {
      status: { type: 'string', required: false, enum: [...TICKET_STATUSES] },
      priority: { type: 'string', required: false, enum: [...TICKET_PRIORITIES] },
      customer_id: { type: 'integer', required: false, description: 'Customer id' },
    },
    returns: 'TicketWithCustomer[]',
    mutates: false,
  },
  {
    name: 'create_ticket',
    description: 'Open a ticket for an existing customer.',
    parameters: {
      customer_id: customerId,
      issue: { type: 'string', required: true, description: 'Description of the problem' },
      priority: { type: 'string', required: false, enum: [...TICKET_PRIORITIES] },
      status: { type: 'string', required: false, enum: [...TICKET_STATUSES] },
    },
    returns: 'TicketWithCustomer',
    mutates: true,
  },
  {
    name: 'update_ticket_status',
    description: 'Move a ticket to another status.',
    parameters: {
      ticket_id: ticketId,
      status: { type: 'string', required: true, enum: [...TICKET_STATUSES] },
    },
    returns: 'TicketWithCustomer',
    mutates: true,
  },
  {
    name: 'update_ticket_priority',
    description: 'Change a ticket\'s priority.',
    parameters: {
      ticket_id: ticketId,
      priority: { type: 'string', required: true, enum: [...TICKET_PRIORITIES] },
    },
    returns: 'TicketWithCustomer',
    mutates: true,
  },
  {
    name: 'delete_ticket',
    description: 'Delete a ticket.',
    parameters: { ticket_id: ticketId },
    returns: '{ deleted: boolean }',
    mutates: true,
  },
  {
    name: 'get_ticket_stats',
    description: 'Count tickets in total, by status and by priority.',
    parameters: {},
    returns: 'TicketStats',
    mutates: false,
  },
  {
    name: 'get_customer_stats',
    description: 'Count customers in total and by status.',
    parameters: {},
    returns: 'CustomerStats',
    mutates: false,
  },
  {
    name: 'search_tickets',
    description: 'Find tickets whose issue text contains a keyword, case-insensitively, newest first.',
    parameters: { keyword: { type: 'string', required: true } },
    returns: 'TicketWithCustomer[]',
    mutates: false,
  },
];
