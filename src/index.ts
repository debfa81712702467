// Turn Orchestrator API
// Port: 8123 (localhost only)

// Load environment variables from .env file
import 'dotenv/config';

import { buildApp } from './app.js';
import { env, logConfiguration } from './env.js';
import { createRuntime } from './services/runtime.js';
import { loggerOptions } from './utils/logger.js';

const runtime = createRuntime();
const server = await buildApp(runtime, { logger: loggerOptions() });

try {
  await server.listen({ port: env.PORT, host: env.HOST });
  console.log(`Turn orchestrator listening on http://${env.HOST}:${env.PORT}`);
  console.log(`Health: http://${env.HOST}:${env.PORT}/v1/health`);
  console.log('');
  logConfiguration();
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
