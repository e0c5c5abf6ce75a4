export const TELEMETRY_BUCKET_MS = 30_000;
export const PRICE_BUCKET_MS = 300_000;

/**
 * Snaps a timestamp onto the 30 s telemetry grid: seconds 0-14 round down to
 * :00, 15-44 go to :30 and 45-59 roll over to the next minute.
 */
export function toTelemetryBucket(timestamp: Date | number): number {
  const date = new Date(timestamp instanceof Date ? timestamp.getTime() : timestamp);
  if (Number.isNaN(date.getTime())) {
    throw new RangeError("Cannot bucket an invalid timestamp");
  }
  const seconds = date.getUTCSeconds();
  date.setUTCMilliseconds(0);
  if (seconds < 15) {
    date.setUTCSeconds(0);
  } else if (seconds < 45) {
    date.setUTCSeconds(30);
  } else {
    date.setUTCSeconds(0);
    date.setUTCMinutes(date.getUTCMinutes() + 1);
  }
  return date.getTime();
}

export function toPriceBucket(timestamp: Date | number): number {
  const ms = timestamp instanceof Date ? timestamp.getTime() : timestamp;
  if (!Number.isFinite(ms)) {
    throw new RangeError("Cannot bucket an invalid timestamp");
  }
  return Math.floor(ms / PRICE_BUCKET_MS) * PRICE_BUCKET_MS;
}

export function floorToBucket(timestamp: number, bucketMs: number): number {
  return Math.floor(timestamp / bucketMs) * bucketMs;
}
