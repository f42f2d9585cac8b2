import 'dotenv/config';
import { CUSTOMER_DATA_AGENT, launchAgent } from './src/index.js';

/**
 * Customer Data Agent - customer and ticket records
 */

launchAgent(CUSTOMER_DATA_AGENT).then(
  (agent) => {
    process.on('SIGINT', () => {
      agent.stop().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  },
  (error: unknown) => {
    console.error('Failed to start customer-data-agent:', error);
    process.exit(1);
  }
);
