export interface PollingDefaults {
  /** How often should we poll, in ms, when the service does not send retry-after */
  pollingInterval: number;
}

const DEFAULT_POLLING_INTERVAL = 1000;

function parseMilliseconds(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : undefined;
}

/**
 * Default polling configuration from environment variables
 */
export const getDefaultPollingOptions = (): PollingDefaults => ({
  pollingInterval: parseMilliseconds(process.env.OPERATIONS_POLLING_INTERVAL_MS) ?? DEFAULT_POLLING_INTERVAL
});
