import { z } from 'zod';
import { InvalidArgumentsError, OperationFailedError, UnknownOperationError } from '../errors.js';
import type { CustomerRepository } from '../repositories/customer.repository.js';
import type { TicketRepository } from '../repositories/ticket.repository.js';
import {
  CUSTOMER_STATUSES,
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  type OperationDefinition,
  type TicketWithCustomer,
} from '../types/operation.types.js';
import { OPERATION_CATALOG } from './operation-catalog.js';

const id = z.number().int().positive();
const customerStatus = z.enum(CUSTOMER_STATUSES);
const ticketStatus = z.enum(TICKET_STATUSES);
const ticketPriority = z.enum(TICKET_PRIORITIES);

const ArgumentSchemas = {
  get_customer: z.object({ customer_id: id }).strict(),
  list_customers: z.object({ status: customerStatus.optional() }).strict(),
  add_customer: z
    .object({
      name: z.string().min(1),
      email: z.string().optional(),
      phone: z.string().optional(),
      status: customerStatus.default('active'),
    })
    .strict(),
  update_customer: z
    .object({
      customer_id: id,
      name: z.string().min(1).optional(),
      email: z.string().optional(),
      phone: z.string().optional(),
    })
    .strict(),
  disable_customer: z.object({ customer_id: id }).strict(),
  activate_customer: z.object({ customer_id: id }).strict(),
  get_ticket: z.object({ ticket_id: id }).strict(),
  list_tickets: z
    .object({
      status: ticketStatus.optional(),
      priority: ticketPriority.optional(),
      customer_id: id.optional(),
    })
    .strict(),
  create_ticket: z
    .object({
      customer_id: id,
      issue: z.string().min(1),
      priority: ticketPriority.default('medium'),
      status: ticketStatus.default('open'),
    })
    .strict(),
  update_ticket_status: z.object({ ticket_id: id, status: ticketStatus }).strict(),
  update_ticket_priority: z.object({ ticket_id: id, priority: ticketPriority }).strict(),
  delete_ticket: z.object({ ticket_id: id }).strict(),
  get_ticket_stats: z.object({}).strict(),
  get_customer_stats: z.object({}).strict(),
  search_tickets: z.object({ keyword: z.string().min(1) }).strict(),
};

type OperationName = keyof typeof ArgumentSchemas;

function isOperationName(name: string): name is OperationName {
  return Object.prototype.hasOwnProperty.call(ArgumentSchemas, name);
}

function parseArgs<T extends z.ZodTypeAny>(name: OperationName, schema: T, args: unknown): z.infer<T> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    throw new InvalidArgumentsError(
      name,
      parsed.error.issues.map((issue) => {
        const path = issue.path.join('.');
        return path ? `${path}: ${issue.message}` : issue.message;
      })
    );
  }
  return parsed.data;
}

/** Runs catalog operations against the repositories. */
export class OperationService {
  constructor(
    private readonly customers: CustomerRepository,
    private readonly tickets: TicketRepository
  ) {}

  catalog(): OperationDefinition[] {
    return OPERATION_CATALOG;
  }

  async execute(name: string, args: unknown): Promise<unknown> {
    if (!isOperationName(name)) {
      throw new UnknownOperationError(name);
    }

    switch (name) {
      case 'get_customer':
        return this.customers.findById(parseArgs(name, ArgumentSchemas.get_customer, args).customer_id);

      case 'list_customers':
        return this.customers.list(parseArgs(name, ArgumentSchemas.list_customers, args).status);

      case 'add_customer': {
        const input = parseArgs(name, ArgumentSchemas.add_customer, args);
        return this.customers.create(input);
      }

      case 'update_customer': {
        const { customer_id, ...changes } = parseArgs(name, ArgumentSchemas.update_customer, args);
        const customer = await this.customers.update(customer_id, changes);
        if (!customer) throw new OperationFailedError(`Customer with ID ${customer_id} not found`);
        return customer;
      }

      case 'disable_customer':
      case 'activate_customer': {
        const { customer_id } = parseArgs(name, ArgumentSchemas[name], args);
        const customer = await this.customers.setStatus(customer_id, name === 'disable_customer' ? 'disabled' : 'active');
        if (!customer) throw new OperationFailedError(`Customer with ID ${customer_id} not found`);
        return customer;
      }

      case 'get_ticket':
        return this.tickets.findById(parseArgs(name, ArgumentSchemas.get_ticket, args).ticket_id);

      case 'list_tickets': {
        const { status, priority, customer_id } = parseArgs(name, ArgumentSchemas.list_tickets, args);
        return this.tickets.list({ status, priority, customerId: customer_id });
      }

      case 'create_ticket': {
        const input = parseArgs(name, ArgumentSchemas.create_ticket, args);
        const customer = await this.customers.findById(input.customer_id);
        if (!customer) throw new OperationFailedError(`Customer with ID ${input.customer_id} not found`);
        const ticketId = await this.tickets.create({
          customerId: input.customer_id,
          issue: input.issue,
          priority: input.priority,
          status: input.status,
        });
        return this.requireTicket(ticketId);
      }

      case 'update_ticket_status': {
        const { ticket_id, status } = parseArgs(name, ArgumentSchemas.update_ticket_status, args);
        if (!(await this.tickets.setStatus(ticket_id, status))) {
          throw new OperationFailedError(`Ticket with ID ${ticket_id} not found`);
        }
        return this.requireTicket(ticket_id);
      }

      case 'update_ticket_priority': {
        const { ticket_id, priority } = parseArgs(name, ArgumentSchemas.update_ticket_priority, args);
        if (!(await this.tickets.setPriority(ticket_id, priority))) {
          throw new OperationFailedError(`Ticket with ID ${ticket_id} not found`);
        }
        return this.requireTicket(ticket_id);
      }

      case 'delete_ticket':
        return { deleted: await this.tickets.delete(parseArgs(name, ArgumentSchemas.delete_ticket, args).ticket_id) };

      case 'get_ticket_stats':
        parseArgs(name, ArgumentSchemas.get_ticket_stats, args);
        return this.tickets.stats();

      case 'get_customer_stats':
        parseArgs(name, ArgumentSchemas.get_customer_stats, args);
        return this.customers.stats();

      case 'search_tickets':
        return this.tickets.search(parseArgs(name, ArgumentSchemas.search_tickets, args).keyword);
    }
  }

  private async requireTicket(ticketId: number): Promise<TicketWithCustomer> {
    const ticket = await this.tickets.findById(ticketId);
    if (!ticket) throw new OperationFailedError(`Ticket with ID ${ticketId} not found`);
    return ticket;
  }
}
