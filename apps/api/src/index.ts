import { loadConfig } from '@pinrelay/config';
import { initLogger } from '@pinrelay/shared';

import { createServer } from './server';

const config = loadConfig(process.env);
initLogger({ environment: config.nodeEnv, level: config.logLevel });

const app = createServer({ config });

async function main() {
  await app.listen({ port: config.port, host: config.host });
}

main().catch((error) => {
  app.log.error({ error }, 'Failed to start server');
  process.exitCode = 1;
});
