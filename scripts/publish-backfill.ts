#!/usr/bin/env tsx
/**
 * Publishes a backfill file to the history topic.
 *
 * The file maps entity ids to their readings:
 *
 *   { "sensor.bedroom_temperature": [
 *       { "state": "21.5", "timestamp": "2024-03-01T06:00:00Z", "attributes": { "unit_of_measurement": "°C" } }
 *   ] }
 *
 * Usage:
 *   tsx scripts/publish-backfill.ts readings.json
 *   tsx scripts/publish-backfill.ts readings.json --broker mqtt://localhost:1883 --batch-size 50
 */

import { readFile } from 'node:fs/promises';
import { connectAsync } from 'mqtt';

function option(name: string, fallback: string): string {
  const at = process.argv.indexOf(name);
  return at === -1 ? fallback : (process.argv[at + 1] ?? fallback);
}

const BROKER = option('--broker', 'mqtt://localhost:1883');
const PREFIX = option('--prefix', 'homeassistant/history').replace(/\/+$/, '');
const BATCH_SIZE = Number(option('--batch-size', '100'));

interface Reading {
  state: string | number | boolean;
  timestamp: string | number;
  attributes?: Record<string, unknown>;
}

function isReading(value: unknown): value is Reading {
  return typeof value === 'object' && value !== null && 'state' in value && 'timestamp' in value;
}

async function readBackfill(path: string): Promise<Map<string, Reading[]>> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${path} must map entity ids to arrays of readings`);
  }
  const backfill = new Map<string, Reading[]>();
  for (const [entityId, readings] of Object.entries(parsed)) {
    if (!Array.isArray(readings) || !readings.every(isReading)) {
      throw new Error(`Readings for ${entityId} must be objects with state and timestamp`);
    }
    backfill.set(entityId, readings);
  }
  return backfill;
}

async function main(): Promise<void> {
  const file = process.argv[2];
  if (!file || file.startsWith('--')) {
    console.error('Usage: publish-backfill.ts <file.json> [--broker url] [--prefix topic] [--batch-size n]');
    process.exit(2);
  }
  if (!Number.isInteger(BATCH_SIZE) || BATCH_SIZE < 1) {
    throw new Error('--batch-size must be a positive integer');
  }

  const backfill = await readBackfill(file);
  const client = await connectAsync(BROKER);
  let published = 0;
  try {
    for (const [entityId, readings] of backfill) {
      const topic = `${PREFIX}/${entityId}`;
      for (let start = 0; start < readings.length; start += BATCH_SIZE) {
        const records = readings.slice(start, start + BATCH_SIZE);
        await client.publishAsync(topic, JSON.stringify({ records }), { qos: 1 });
        published += records.length;
      }
      console.log(`  ${entityId}: ${readings.length} reading(s)`);
    }
  } finally {
    await client.endAsync();
  }
  console.log(`Published ${published} reading(s) for ${backfill.size} entit${backfill.size === 1 ? 'y' : 'ies'} to ${BROKER}`);
}

main().catch((err: unknown) => {
  console.error('Backfill failed:', err);
  process.exit(1);
});
