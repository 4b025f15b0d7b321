import { z } from 'zod';

/**
 * Emitter settings. Positional arguments win over env vars:
 *
 *   sensor-emitter <location> <carWeight> <motorcycleWeight> <busWeight> <vehiclesPerBatch> <periodSeconds>
 *
 * Env vars:
 *   SENSOR_LOCATION     — location the sensor reports for (required)
 *   CAR_WEIGHT          — relative weight of cars (default: 3)
 *   MOTORCYCLE_WEIGHT   — relative weight of motorcycles (default: 1)
 *   BUS_WEIGHT          — relative weight of buses (default: 2)
 *   VEHICLES_PER_BATCH  — labels per batch (default: 10)
 *   EMIT_PERIOD_S       — seconds between batches (default: 1)
 *   API_BASE_URL        — base URL of the API (default: http://localhost:8080)
 *   SEED                — seeds the RNG for reproducible batches
 */

const weight = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const emitterSchema = z.object({
  location: z.string().min(1),
  weights: z
    .object({
      car: weight(3),
      motorcycle: weight(1),
      bus: weight(2),
    })
    .refine((w) => w.car + w.motorcycle + w.bus > 0, 'at least one vehicle weight must be positive'),
  vehiclesPerBatch: z.coerce.number().int().min(1).default(10),
  // setInterval delays above 2^31-1 ms overflow to 1 ms
  periodSeconds: z.coerce.number().positive().max(2_147_483).default(1),
  apiBaseUrl: z.string().url().default('http://localhost:8080'),
  seed: z.coerce.number().int().optional(),
});

export type EmitterConfig = z.infer<typeof emitterSchema>;

export function loadEmitterConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): EmitterConfig {
  const [location, car, motorcycle, bus, perBatch, period] = argv;
  return emitterSchema.parse({
    location: location ?? env['SENSOR_LOCATION'],
    weights: {
      car: car ?? env['CAR_WEIGHT'],
      motorcycle: motorcycle ?? env['MOTORCYCLE_WEIGHT'],
      bus: bus ?? env['BUS_WEIGHT'],
    },
    vehiclesPerBatch: perBatch ?? env['VEHICLES_PER_BATCH'],
    periodSeconds: period ?? env['EMIT_PERIOD_S'],
    apiBaseUrl: env['API_BASE_URL'],
    seed: env['SEED'],
  });
}
