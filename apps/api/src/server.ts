import 'dotenv/config';
import { ZodError } from 'zod';
import { buildApp, buildHttpServer, createAppContext } from './app.js';
import { loadConfig } from './config/env.js';
import type { AppConfig } from './config/env.js';

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.errors) {
        console.error(`[config] ${issue.path.join('.')}: ${issue.message}`);
      }
    }
    throw err;
  }
}

async function main() {
  const config = readConfig();
  const ctx = createAppContext(config);
  const app = buildApp(ctx);
  const { httpServer, wsGateway } = buildHttpServer(app, ctx);

  httpServer.listen(config.port, config.host, () => {
    console.log(`[server] listening on http://${config.host}:${config.port}`);
    console.log(`[server] query timeout ${config.queryTimeoutMs}ms`);
  });

  const shutdown = async () => {
    console.log('[server] shutting down...');
    ctx.ingestion.setPublisher(null);
    await wsGateway.close();
    httpServer.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      console.error('[server] shutdown error', err);
      process.exit(1);
    });
  };
  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err) => {
  console.error('[server] fatal startup error', err);
  process.exit(1);
});
