// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/vehicle.js';
export * from './entities/location-counts.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/sensor-ingestion.port.js';
export * from './ports/inbound/traffic-query.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/location-aggregator.port.js';
export * from './ports/outbound/stream-publisher.port.js';
