#!/usr/bin/env tsx
/**
 * Proofwire Agent CLI
 *
 * Main entry point that wires together CLI parsing, logging and the agent.
 */

import { createConsoleLogger } from '@proofwire/protocol';
import { parseArgs, USAGE, type AgentConfig } from './cli.js';
import { startAgent } from './agent.js';

async function main() {
  let config: AgentConfig;
  try {
    config = parseArgs(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : err);
    console.error('');
    console.error(USAGE);
    return process.exit(1);
  }

  const logger = createConsoleLogger({ level: config.logLevel, prefix: `[${config.role}]` });
  logger.info(`Role: ${config.role}`);
  logger.info(`Room: ${config.room}`);
  logger.info(`Relay: ${config.relay}`);

  const agent = startAgent(config, logger);
  try {
    const outcome = await agent.finished;
    agent.close();
    process.exit(outcome.succeeded ? 0 : 1);
  } catch (err) {
    logger.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    agent.close();
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal:', err);
  process.exit(1);
});
