// SPDX-License-Identifier: Apache-2.0

import { describe, it, beforeEach } from 'node:test';
import * as assert from 'node:assert';
import { MemoryLedger } from '../memory.js';
import { deviceExists, getDevice, registerDevice } from '../devices.js';
import { dataRecordKey, getDataRecord, listDataRecords, submitData } from '../records.js';
import { verifyData } from '../verification.js';
import { encodeDevice } from '../codec.js';
import { LedgerIOError } from '../errors.js';

const TS = '2024-01-01T00:00:00Z';

class FlakyLedger extends MemoryLedger {
  failReads = false;
  failWrites = false;

  async get(key: string): Promise<Uint8Array | undefined> {
    if (this.failReads) throw new Error('peer unavailable');
    return super.get(key);
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    return super.put(key, value);
  }
}

describe('device registry', () => {
  let ledger: FlakyLedger;

  beforeEach(() => {
    ledger = new FlakyLedger();
  });

  it('registers an active device under its id', async () => {
    const device = await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');
    const expected = { id: 'dev-1', owner: 'alice', location: 'lab-A', status: 'active' };

    assert.deepStrictEqual(device, expected);
    assert.deepStrictEqual(await getDevice(ledger, 'dev-1'), expected);
    assert.deepStrictEqual(await ledger.get('dev-1'), Uint8Array.from(encodeDevice(device)));
  });

  it('rejects a second registration and keeps the first', async () => {
    await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');

    await assert.rejects(registerDevice(ledger, 'dev-1', 'bob', 'lab-B'), {
      name: 'AlreadyExistsError',
      code: 'ALREADY_EXISTS',
      entity: 'Device',
      key: 'dev-1',
      message: 'device dev-1 already registered',
    });
    assert.strictEqual((await getDevice(ledger, 'dev-1')).owner, 'alice');
    assert.strictEqual(ledger.size, 1);
  });

  it('reports existence', async () => {
    assert.strictEqual(await deviceExists(ledger, 'dev-1'), false);
    await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');
    assert.strictEqual(await deviceExists(ledger, 'dev-1'), true);
  });

  it('treats an empty stored value as absent', async () => {
    await ledger.put('dev-1', new Uint8Array(0));
    assert.strictEqual(await deviceExists(ledger, 'dev-1'), false);
  });

  it('fails a lookup of an unknown device', async () => {
    await assert.rejects(getDevice(ledger, 'dev-9'), {
      code: 'NOT_FOUND',
      message: 'device dev-9 does not exist',
    });
  });

  it('fails a lookup of a corrupt device', async () => {
    await ledger.put('dev-1', Buffer.from('{"id":"dev-1"'));
    await assert.rejects(getDevice(ledger, 'dev-1'), { code: 'DESERIALIZATION_ERROR', entity: 'Device' });
  });

  it('separates read failures from absence', async () => {
    ledger.failReads = true;
    await assert.rejects(
      deviceExists(ledger, 'dev-1'),
      (err: unknown) =>
        err instanceof LedgerIOError &&
        err.message === 'failed to read from world state at dev-1: peer unavailable' &&
        err.cause instanceof Error &&
        err.cause.message === 'peer unavailable'
    );
  });

  it('refuses ids that are empty or in the composite namespace', async () => {
    await assert.rejects(registerDevice(ledger, '', 'alice', 'lab-A'), { code: 'INVALID_ARGUMENT' });
    await assert.rejects(deviceExists(ledger, '\u0000DataRecord\u0000'), { code: 'INVALID_ARGUMENT' });
    assert.strictEqual(ledger.size, 0);
  });
});

describe('data records', () => {
  let ledger: FlakyLedger;

  beforeEach(async () => {
    ledger = new FlakyLedger();
    await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');
  });

  it('stores a pending record without a verifier', async () => {
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');

    const record = await getDataRecord(ledger, 'dev-1', TS);
    assert.deepStrictEqual(record, {
      deviceID: 'dev-1',
      timestamp: TS,
      data: 'temp=21.5',
      status: 'pending',
    });
    assert.strictEqual(record.verifierID, undefined);
  });

  it('stores the record under its composite key', async () => {
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');
    const stored = await ledger.get(`\u0000DataRecord\u0000dev-1\u0000${TS}\u0000`);
    assert.ok(stored);
  });

  it('rejects data from an unregistered device', async () => {
    await assert.rejects(submitData(ledger, 'dev-2', TS, 'temp=21.5'), {
      name: 'DeviceNotRegisteredError',
      code: 'DEVICE_NOT_REGISTERED',
      message: 'device dev-2 not registered',
    });
    await assert.rejects(getDataRecord(ledger, 'dev-2', TS), { code: 'NOT_FOUND' });
    assert.strictEqual(ledger.size, 1);
  });

  it('overwrites a resubmission with the same timestamp', async () => {
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');
    await verifyData(ledger, 'dev-1', TS, 'ver-1', true);
    await submitData(ledger, 'dev-1', TS, 'temp=22.0');

    assert.deepStrictEqual(await getDataRecord(ledger, 'dev-1', TS), {
      deviceID: 'dev-1',
      timestamp: TS,
      data: 'temp=22.0',
      status: 'pending',
    });
  });

  it('fails a lookup of an unknown record', async () => {
    await assert.rejects(getDataRecord(ledger, 'dev-1', TS), {
      code: 'NOT_FOUND',
      entity: 'DataRecord',
      key: dataRecordKey(ledger, 'dev-1', TS),
      message: `data record for device dev-1 at ${TS} does not exist`,
    });
  });

  it('fails a lookup of a corrupt record', async () => {
    const key = dataRecordKey(ledger, 'dev-1', TS);
    await ledger.put(key, Buffer.from('not json'));

    await assert.rejects(getDataRecord(ledger, 'dev-1', TS), {
      code: 'DESERIALIZATION_ERROR',
      entity: 'DataRecord',
      key,
      message: `failed to unmarshal DataRecord at DataRecord(dev-1, ${TS}): stored bytes are not JSON`,
    });
  });

  it('rejects a timestamp containing the key delimiter', async () => {
    await assert.rejects(submitData(ledger, 'dev-1', 'bad\u0000ts', 'x'), { code: 'INVALID_ARGUMENT' });
  });

  it('lists the records of one device in key order', async () => {
    await registerDevice(ledger, 'dev-10', 'bob', 'lab-B');
    await submitData(ledger, 'dev-1', '2024-01-01T00:05:00Z', 'temp=21.7');
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');
    await submitData(ledger, 'dev-10', TS, 'temp=19.0');

    const records = await listDataRecords(ledger, 'dev-1');
    assert.deepStrictEqual(
      records.map(r => r.timestamp),
      [TS, '2024-01-01T00:05:00Z']
    );
    assert.ok(records.every(r => r.deviceID === 'dev-1'));
  });
});

describe('verification workflow', () => {
  let ledger: FlakyLedger;

  beforeEach(async () => {
    ledger = new FlakyLedger();
    await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');
  });

  it('marks a valid record verified', async () => {
    await verifyData(ledger, 'dev-1', TS, 'ver-1', true);

    assert.deepStrictEqual(await getDataRecord(ledger, 'dev-1', TS), {
      deviceID: 'dev-1',
      timestamp: TS,
      data: 'temp=21.5',
      status: 'verified',
      verifierID: 'ver-1',
    });
  });

  it('marks an invalid record rejected', async () => {
    const record = await verifyData(ledger, 'dev-1', TS, 'ver-2', false);
    assert.strictEqual(record.status, 'rejected');
    assert.strictEqual((await getDataRecord(ledger, 'dev-1', TS)).verifierID, 'ver-2');
  });

  it('lets a later verdict override an earlier one', async () => {
    await verifyData(ledger, 'dev-1', TS, 'ver-1', true);
    await verifyData(ledger, 'dev-1', TS, 'ver-2', false);

    const record = await getDataRecord(ledger, 'dev-1', TS);
    assert.strictEqual(record.status, 'rejected');
    assert.strictEqual(record.verifierID, 'ver-2');
  });

  it('fails for a record that was never submitted', async () => {
    await assert.rejects(verifyData(ledger, 'dev-1', '2024-01-02T00:00:00Z', 'ver-1', true), {
      code: 'NOT_FOUND',
      message: 'data record for device dev-1 at 2024-01-02T00:00:00Z does not exist',
    });
  });

  it('fails on a corrupt record and leaves it untouched', async () => {
    const key = dataRecordKey(ledger, 'dev-1', TS);
    await ledger.put(key, Buffer.from('{"deviceID":"dev-1","status":"approved"}'));

    await assert.rejects(verifyData(ledger, 'dev-1', TS, 'ver-1', true), { code: 'DESERIALIZATION_ERROR' });
    const stored = await ledger.get(key);
    assert.ok(stored);
    assert.strictEqual(Buffer.from(stored).toString('utf-8'), '{"deviceID":"dev-1","status":"approved"}');
  });

  it('keeps the pending record when the write fails', async () => {
    ledger.failWrites = true;

    await assert.rejects(verifyData(ledger, 'dev-1', TS, 'ver-1', true), {
      code: 'LEDGER_IO_ERROR',
      message: `failed to write to world state at DataRecord(dev-1, ${TS}): disk full`,
    });
    ledger.failWrites = false;
    assert.strictEqual((await getDataRecord(ledger, 'dev-1', TS)).status, 'pending');
  });
});

describe('device data lifecycle', () => {
  it('register, submit, verify, read back', async () => {
    const ledger = new MemoryLedger();

    await registerDevice(ledger, 'dev-1', 'alice', 'lab-A');
    await submitData(ledger, 'dev-1', TS, 'temp=21.5');
    await verifyData(ledger, 'dev-1', TS, 'ver-1', true);

    assert.deepStrictEqual(await getDataRecord(ledger, 'dev-1', TS), {
      deviceID: 'dev-1',
      timestamp: TS,
      data: 'temp=21.5',
      status: 'verified',
      verifierID: 'ver-1',
    });
  });
});
