export { Power } from "./power";
export { Energy } from "./energy";
export { Duration } from "./duration";
export { EnergyPrice } from "./price";
export {
  describeError,
  TransientIoError,
  MalformedFeedError,
  CapabilityFailureError,
  ConfigurationError,
  UnknownDeviceError,
} from "./errors";
export {
  TELEMETRY_BUCKET_MS,
  PRICE_BUCKET_MS,
  toTelemetryBucket,
  toPriceBucket,
  floorToBucket,
} from "./buckets";
export { MAX_SERIES_POINTS, usageRecordSchema } from "./telemetry";
export type { PowerState, Sample, Series, StatusChange, UsageRecord } from "./telemetry";
export {
  PRICE_TIERS,
  FORECAST_TIERS,
  GENERATION_ID_PATTERN,
  priceTierValueSchema,
  priceRecordSchema,
  compareGenerationIds,
  deriveEffectivePrice,
  deriveForecastPrice,
} from "./pricing";
export type {
  PriceTier,
  PriceTierValue,
  PriceRecord,
  UpsertOutcome,
  RetentionSweepResult,
  PriceSyncFailure,
  PriceSyncResult,
} from "./pricing";
export {
  RESTART_TIME_PATTERN,
  automationStateSchema,
  deriveAutomationPhase,
  createAutomationState,
} from "./automation";
export type { AutomationState, AutomationPhase, AutomationView } from "./automation";
export type {
  DeviceReading,
  ControlAction,
  ForecastMethod,
  ForecastPoint,
  ForecastProjection,
  RateSource,
  CostBucket,
  CostTotals,
  CostWindowTotal,
  CostSummary,
} from "./api";
