import 'dotenv/config';
import { ZodError } from 'zod';
import { loadEmitterConfig } from './config.js';
import type { EmitterConfig } from './config.js';
import { SeededRng, mathRandom } from './seeded-rng.js';
import { SensorEmitter, httpBatchSender } from './sensor-emitter.js';

/**
 * Simulated roadside sensor, one process per location.
 * See config.ts for arguments and env vars.
 */

function readConfig(): EmitterConfig {
  try {
    return loadEmitterConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.errors) {
        console.error(`[emitter] ${issue.path.join('.')}: ${issue.message}`);
      }
      console.error(
        '[emitter] usage: sensor-emitter <location> <carWeight> <motorcycleWeight> <busWeight> <vehiclesPerBatch> <periodSeconds>',
      );
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();
const { car, motorcycle, bus } = config.weights;
const rng = config.seed === undefined ? mathRandom : new SeededRng(config.seed);
const emitter = new SensorEmitter(config, httpBatchSender(config.apiBaseUrl), rng);

console.log(
  `[emitter] sensor started at ${config.location} with weights ${car}:${motorcycle}:${bus} (c:m:b). ` +
    `${config.vehiclesPerBatch} vehicles every ${config.periodSeconds} seconds.`,
);
console.log(`[emitter] sending data to ${config.apiBaseUrl}/sensorapi/data`);
emitter.start();

const shutdown = () => {
  emitter.stop();
  console.log(
    `[emitter] stopped after ${emitter.batchesSent} batch(es), ${emitter.batchesFailed} failed`,
  );
  process.exit(0);
};
process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
