// ---------------------------------------------------------------------------
// Inbound sensor batch (from a roadside sensor or the emitter)
// ---------------------------------------------------------------------------

export interface SensorBatch {
  location: string;
  vehicles: readonly string[];
}

export interface SensorIngestResult {
  location: string;
  /** Labels that matched a known vehicle type */
  counted: number;
  /** Unrecognized labels, dropped from the counts */
  ignored: number;
}

// ---------------------------------------------------------------------------
// Port
// ---------------------------------------------------------------------------

export interface SensorIngestionPort {
  ingestBatch(batch: SensorBatch): SensorIngestResult;
}
