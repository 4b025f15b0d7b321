import { fetch } from 'undici';
import type { VehicleType } from '@traffic-counter/domain';
import type { EmitterConfig } from './config.js';
import type { RandomSource } from './seeded-rng.js';
import { buildVehicleDistribution, sampleBatch } from './sensor-batch.js';

export interface SensorPayload {
  location: string;
  data: VehicleType[];
}

export type BatchSender = (payload: SensorPayload) => Promise<void>;

/** Posts batches to the API's sensor endpoint; rejects on any non-2xx reply. */
export function httpBatchSender(apiBaseUrl: string): BatchSender {
  return async (payload) => {
    const resp = await fetch(`${apiBaseUrl}/sensorapi/data`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });
    if (!resp.ok) {
      const text = await resp.text();
      throw new Error(`ingest failed ${resp.status}: ${text}`);
    }
  };
}

export class SensorEmitter {
  private readonly distribution: VehicleType[];
  private timer: ReturnType<typeof setInterval> | null = null;
  private sent = 0;
  private failed = 0;

  constructor(
    private readonly config: EmitterConfig,
    private readonly send: BatchSender,
    private readonly rng: RandomSource,
  ) {
    this.distribution = buildVehicleDistribution(config.weights);
  }

  get batchesSent(): number {
    return this.sent;
  }

  get batchesFailed(): number {
    return this.failed;
  }

  /** Sends one batch. Failures are logged and counted; the loop keeps going. */
  async emit(): Promise<void> {
    const data = sampleBatch(this.distribution, this.config.vehiclesPerBatch, this.rng);
    try {
      await this.send({ location: this.config.location, data });
      this.sent += 1;
    } catch (err) {
      this.failed += 1;
      console.error(
        `[emitter:${this.config.location}] send failed`,
        err instanceof Error ? err.message : err,
      );
    }
  }

  /** Sends the first batch right away, then one per period. */
  start(): void {
    if (this.timer) return;
    void this.emit();
    this.timer = setInterval(() => void this.emit(), this.config.periodSeconds * 1000);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
