import { checkExists, load } from '../io/io';

export type VelocityThresholds = {
  underPace: number;
  onPace: number;
  slightlyOver: number;
};

export type InsightThresholds = {
  savingsTarget: number;
  smallPurchaseLimit: number;
  smallPurchaseMinCount: number;
  unusualSpendingIncrease: number;
  trendChange: number;
  incomeChange: number;
  maxRows: number;
};

export type MetricsConfig = {
  velocity: VelocityThresholds;
  insights: InsightThresholds;
  netWorthMonths: number;
};

export type MetricsConfigOverrides = {
  velocity?: Partial<VelocityThresholds>;
  insights?: Partial<InsightThresholds>;
  netWorthMonths?: number;
};

export const DEFAULT_VELOCITY_THRESHOLDS: VelocityThresholds = {
  underPace: 0.85,
  onPace: 1.15,
  slightlyOver: 1.3,
};

export const DEFAULT_INSIGHT_THRESHOLDS: InsightThresholds = {
  savingsTarget: 0.1,
  smallPurchaseLimit: 20,
  smallPurchaseMinCount: 15,
  unusualSpendingIncrease: 0.5,
  trendChange: 0.15,
  incomeChange: 0.1,
  maxRows: 4,
};

export const DEFAULT_METRICS_CONFIG: MetricsConfig = {
  velocity: DEFAULT_VELOCITY_THRESHOLDS,
  insights: DEFAULT_INSIGHT_THRESHOLDS,
  netWorthMonths: 12,
};

// Net worth history never spans more than a year
export const MAX_NET_WORTH_MONTHS = 12;

const FILE_NAME = 'metricsConfig.json';

export function mergeMetricsConfig(overrides: MetricsConfigOverrides): MetricsConfig {
  return {
    velocity: { ...DEFAULT_VELOCITY_THRESHOLDS, ...overrides.velocity },
    insights: { ...DEFAULT_INSIGHT_THRESHOLDS, ...overrides.insights },
    netWorthMonths: overrides.netWorthMonths ?? DEFAULT_METRICS_CONFIG.netWorthMonths,
  };
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/**
 * Validates a metrics configuration
 *
 * @returns Error messages; empty when the configuration is usable
 */
export function validateMetricsConfig(config: MetricsConfig): string[] {
  const errors: string[] = [];
  const { velocity, insights } = config;

  for (const [name, value] of Object.entries(velocity)) {
    if (typeof value !== 'number' || !isFinite(value) || value <= 0) {
      errors.push(`Velocity threshold ${name} must be a positive number`);
    }
  }
  if (!(velocity.underPace < velocity.onPace && velocity.onPace < velocity.slightlyOver)) {
    errors.push('Velocity thresholds must be increasing (underPace < onPace < slightlyOver)');
  }

  if (insights.savingsTarget < 0 || insights.savingsTarget > 1) {
    errors.push('Savings target must be between 0 and 1');
  }
  if (insights.smallPurchaseLimit <= 0) {
    errors.push('Small purchase limit must be positive');
  }
  if (!isPositiveInteger(insights.smallPurchaseMinCount)) {
    errors.push('Small purchase minimum count must be a positive integer');
  }
  for (const name of ['unusualSpendingIncrease', 'trendChange', 'incomeChange'] as const) {
    if (insights[name] < 0) {
      errors.push(`Insight threshold ${name} cannot be negative`);
    }
  }
  if (!isPositiveInteger(insights.maxRows)) {
    errors.push('Maximum insight rows must be a positive integer');
  }
  if (!isPositiveInteger(config.netWorthMonths) || config.netWorthMonths > MAX_NET_WORTH_MONTHS) {
    errors.push(`Net worth months must be an integer from 1 to ${MAX_NET_WORTH_MONTHS}`);
  }

  return errors;
}

/**
 * Loads threshold overrides from metricsConfig.json in the data directory,
 * falling back to the defaults when the file is absent
 *
 * @throws Error listing every invalid setting
 */
export function loadMetricsConfig(): MetricsConfig {
  const config = checkExists(FILE_NAME)
    ? mergeMetricsConfig(load<MetricsConfigOverrides>(FILE_NAME))
    : mergeMetricsConfig({});
  const errors = validateMetricsConfig(config);
  if (errors.length > 0) {
    throw new Error(`Invalid metrics configuration: ${errors.join('; ')}`);
  }
  return config;
}
