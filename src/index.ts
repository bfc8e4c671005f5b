#!/usr/bin/env node
/**
 * Git LFS custom transfer agent entry point.
 *
 * git-lfs starts the agent with the repository root as working directory
 * and speaks the line protocol over stdin/stdout. Configuration comes from
 * the environment and is resolved once, before the first request.
 */

import { TransferAgent, type AgentExit } from './agent/TransferAgent.js';
import { ConfigService } from './services/ConfigService.js';
import { logger } from './utils/logger.js';

const EXIT_CODES: Record<AgentExit, number> = {
  terminated: 0,
  'input-closed': 0,
  'init-failed': 1,
  'decode-failed': 1,
};

async function main(): Promise<number> {
  const agent = new TransferAgent({
    input: process.stdin,
    output: process.stdout,
    configuration: ConfigService.resolve(process.env),
  });

  const exit = await agent.run();
  return EXIT_CODES[exit];
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.error('Unhandled error in transfer agent:', error);
    process.exitCode = 1;
  }
);
