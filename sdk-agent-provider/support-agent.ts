import 'dotenv/config';
import { SUPPORT_AGENT, launchAgent } from './src/index.js';

/**
 * Support Agent - troubleshooting and ticket follow-up, no admin operations
 */

launchAgent(SUPPORT_AGENT).then(
  (agent) => {
    process.on('SIGINT', () => {
      agent.stop().then(
        () => process.exit(0),
        () => process.exit(1)
      );
    });
  },
  (error: unknown) => {
    console.error('Failed to start support-agent:', error);
    process.exit(1);
  }
);
