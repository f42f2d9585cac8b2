import type { AgentDefinition } from './types.js';

export const CUSTOMER_DATA_AGENT: AgentDefinition = {
  agentId: 'customer-data-agent',
  displayName: 'Customer Data Agent',
  role: 'data',
  defaultPort: 10020,
  instruction: `You are the Customer Data Agent, the specialist for customer and ticket records.

You can look up, list, create and update customers, manage tickets and report statistics.
- Parse the request for customer ids, ticket ids, statuses and priorities.
- Always use an operation to read data; never invent records.
- When asked to create a ticket, create it and report the new ticket id.
- Answer precisely: include ids, names, statuses and priorities you retrieved.`,
  allowedOperations: [
    'get_customer',
    'list_customers',
    'add_customer',
    'update_customer',
    'disable_customer',
    'activate_customer',
    'get_ticket',
    'list_tickets',
    'create_ticket',
    'update_ticket_status',
    'update_ticket_priority',
    'get_ticket_stats',
    'get_customer_stats',
    'search_tickets',
  ],
  skills: [
    {
      skillId: 'customer_lookup',
      description: 'Retrieve and manage customer records',
      examples: ['Get customer information for ID 5', 'List all active customers', 'Update the email of customer 3'],
    },
    {
      skillId: 'ticket_management',
      description: 'Create, list, search and update support tickets',
      examples: ['Show ticket history for customer 1', 'Create a high priority ticket for customer 2', 'Search tickets about login'],
    },
    {
      skillId: 'statistics',
      description: 'Report ticket and customer statistics',
      examples: ['How many open tickets are there?', 'Give me customer stats'],
    },
  ],
};

export const SUPPORT_AGENT: AgentDefinition = {
  agentId: 'support-agent',
  displayName: 'Support Agent',
  role: 'support',
  defaultPort: 10021,
  instruction: `You are the Support Agent, a customer-service specialist.

Knowledge base:
- Login issues: offer a password reset link; after 5 failed attempts accounts lock for 30 minutes.
- Payment issues: check the payment method on file, retry the charge, escalate billing errors as high priority.
- Performance problems: clear cache, try another browser, report persistent timeouts.
- Feature requests: thank the customer and record the request in a low priority ticket.
- Data export issues: exports over 10k rows are emailed; check spam folders.

When handling a request:
1. Use the customer and ticket data given in earlier stage results, or look it up.
2. Categorize the issue and give concrete steps.
3. Create or update a ticket when the issue needs follow-up; billing and account access problems are high priority.
Be professional and empathetic, and mention ticket ids you created or changed.`,
  allowedOperations: [
    'get_customer',
    'list_customers',
    'get_ticket',
    'list_tickets',
    'create_ticket',
    'update_ticket_status',
    'update_ticket_priority',
    'search_tickets',
    'get_ticket_stats',
    'get_customer_stats',
  ],
  skills: [
    {
      skillId: 'troubleshooting',
      description: 'Diagnose customer problems and suggest solutions',
      examples: ["I can't log in to my account", 'My payment failed', 'The app is very slow'],
    },
    {
      skillId: 'ticket_follow_up',
      description: 'Open and escalate tickets for customer issues',
      examples: ['I need help with my account, customer ID 12345', 'Escalate ticket 4, the customer was charged twice'],
    },
  ],
};

export const AGENT_DEFINITIONS = [CUSTOMER_DATA_AGENT, SUPPORT_AGENT];
