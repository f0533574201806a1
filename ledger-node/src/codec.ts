// SPDX-License-Identifier: Apache-2.0

import { z } from 'zod';
import type { DataRecord, Device, EntityKind } from './types.js';
import { DATA_RECORD_STATUSES, DEVICE_STATUSES } from './types.js';
import { canonicalJson } from './canonical.js';
import { DeserializationError } from './errors.js';
import { describeKey } from './composite-key.js';

export const DeviceSchema = z.object({
  id: z.string(),
  owner: z.string(),
  location: z.string(),
  status: z.enum(DEVICE_STATUSES),
});

export const DataRecordSchema = z.object({
  deviceID: z.string(),
  timestamp: z.string(),
  data: z.string(),
  status: z.enum(DATA_RECORD_STATUSES),
  verifierID: z.string().optional(),
});

export function encodeDevice(device: Device): Uint8Array {
  return canonicalJson({
    id: device.id,
    owner: device.owner,
    location: device.location,
    status: device.status,
  });
}

export function encodeDataRecord(record: DataRecord): Uint8Array {
  return canonicalJson({
    deviceID: record.deviceID,
    timestamp: record.timestamp,
    data: record.data,
    status: record.status,
    verifierID: record.verifierID,
  });
}

function decode<T>(schema: z.ZodType<T>, entity: EntityKind, key: string, bytes: Uint8Array): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(Buffer.from(bytes).toString('utf-8'));
  } catch (err) {
    throw new DeserializationError(
      `failed to unmarshal ${entity} at ${describeKey(key)}: stored bytes are not JSON`,
      { entity, key, cause: err }
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DeserializationError(
      `failed to unmarshal ${entity} at ${describeKey(key)}: ${issues}`,
      { entity, key, cause: result.error }
    );
  }
  return result.data;
}

export function decodeDevice(key: string, bytes: Uint8Array): Device {
  return decode(DeviceSchema, 'Device', key, bytes);
}

export function decodeDataRecord(key: string, bytes: Uint8Array): DataRecord {
  return decode(DataRecordSchema, 'DataRecord', key, bytes);
}
