/**
 * @fileoverview Basic usage example for the exploration engine.
 *
 * Run this example:
 *   npm run example -- [repository-path] [goal]
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import {
  // Core components
  LoopController,
  DocumentationAgent,
  LocalRepository,

  // Configuration
  applyProfile,
  loadConfigFromEnv,

  // Observability
  ConsoleTransport,
  createLogger,
  initDefaultTracer,
  shutdownDefaultTracer,

  // Errors
  toError,
} from '../src/index.js';

// ============ Configuration ============

const PROJECT_ROOT = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..');
const repositoryPath = process.argv[2] ?? PROJECT_ROOT;
const goal = process.argv[3] ?? 'Explain how to install and use this project';

const config = applyProfile(loadConfigFromEnv(), 'fast');

// ============ Setup Logger and Tracer ============

const logger = createLogger('example', {
  minLevel: config.logLevel,
  transports: [new ConsoleTransport(true)],
});

initDefaultTracer({
  traceDirectory: config.traceDirectory,
  logger: logger.child({ module: 'tracer' }),
});

// ============ Run ============

async function main(): Promise<void> {
  const agent = new DocumentationAgent({ logger: logger.child({ module: 'documentation-agent' }) });
  const controller = new LoopController({
    agent,
    repository: new LocalRepository(repositoryPath),
    config,
    logger,
  });

  controller.on('iteration:start', iteration => {
    logger.info(`Iteration ${iteration}`);
  });
  controller.on('loop:stuck', (pattern, outcome) => {
    logger.warn('Stuck loop detected', {
      pattern,
      strategy: outcome.escalated ? 'escalate' : outcome.strategy,
    });
  });

  const result = await controller.executeLoop(goal);

  console.log('\n' + '='.repeat(60));
  console.log(result.summary);
  console.log('='.repeat(60));
  console.log(`Iterations: ${result.iterations}, cache hits: ${result.cacheHits}, errors: ${result.errorCount}`);
  console.log('Documents:', agent.getAnalyzedDocuments().map(doc => doc.filePath).join(', ') || 'none');
}

main()
  .catch((error: unknown) => {
    logger.fatal('Example failed', {}, toError(error));
    process.exitCode = 1;
  })
  .finally(() => {
    shutdownDefaultTracer();
  });
