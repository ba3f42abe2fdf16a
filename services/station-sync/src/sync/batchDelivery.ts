import { InvalidDeviceTokenError } from '../errors';
import type { SyncLogger } from '../logger';
import type { BatchResult, DeviceRecord, TelemetryPlatform, TelemetryRecord } from './types';
import { delay, errorMessage } from './utils';

export const DEFAULT_BATCH_SIZE = 100;
export const DEFAULT_INTER_CHUNK_DELAY_MS = 100;

export interface BatchDeliveryOptions {
  batchSize?: number;
  interChunkDelayMs?: number;
  onChunk?: (outcome: { delivered: boolean; size: number }) => void;
}

export function chunkRecords<T>(records: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`batch size must be a positive integer, received ${size}`);
  }
  const chunks: T[][] = [];
  for (let start = 0; start < records.length; start += size) {
    chunks.push(records.slice(start, start + size));
  }
  return chunks;
}

/**
 * Pushes records in consecutive chunks. A failed chunk is counted and skipped;
 * chunks already delivered stay delivered.
 */
export class BatchDeliveryEngine {
  private readonly batchSize: number;
  private readonly interChunkDelayMs: number;
  private readonly onChunk?: BatchDeliveryOptions['onChunk'];

  constructor(
    private readonly platform: TelemetryPlatform,
    private readonly logger: SyncLogger,
    options: BatchDeliveryOptions = {}
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.interChunkDelayMs = options.interChunkDelayMs ?? DEFAULT_INTER_CHUNK_DELAY_MS;
    this.onChunk = options.onChunk;
  }

  async deliver(device: DeviceRecord, records: readonly TelemetryRecord[], batchSize?: number): Promise<BatchResult> {
    if (!device.authToken || device.authToken.trim().length === 0) {
      throw new InvalidDeviceTokenError(device.deviceName);
    }
    const chunks = chunkRecords(records, batchSize ?? this.batchSize);
    const result: BatchResult = { success: 0, failed: 0, total: 0 };

    for (let index = 0; index < chunks.length; index += 1) {
      const chunk = chunks[index];
      try {
        await this.platform.pushTimeseries(device.authToken, chunk);
        result.success += chunk.length;
        this.onChunk?.({ delivered: true, size: chunk.length });
      } catch (error) {
        result.failed += chunk.length;
        this.onChunk?.({ delivered: false, size: chunk.length });
        this.logger.warn(
          { deviceName: device.deviceName, chunk: index + 1, chunks: chunks.length, size: chunk.length, error: errorMessage(error) },
          'telemetry chunk failed'
        );
      }
      result.total += chunk.length;
      if (index < chunks.length - 1) {
        await delay(this.interChunkDelayMs);
      }
    }

    this.logger.debug(
      { deviceName: device.deviceName, success: result.success, failed: result.failed, total: result.total },
      'telemetry delivery finished'
    );
    return result;
  }
}
