/**
 * Canonical Metric Vocabulary
 *
 * SINGLE SOURCE OF TRUTH for canonical metric type names and their storage units.
 * Provider field names are translated into these names by the canonical mapper;
 * nothing downstream of ingestion should see a provider-specific name.
 */

export const METRIC_TYPES = {
  // Heart
  HEART_RATE: 'heart_rate',
  RESTING_HEART_RATE: 'resting_heart_rate',
  HRV: 'hrv',
  SPO2: 'spo2',

  // Activity
  STEPS: 'steps',
  DISTANCE: 'distance',
  CALORIES: 'calories',
  ACTIVE_MINUTES: 'active_minutes',

  // Sleep (one metric per stage so stages sharing a start instant keep distinct keys)
  SLEEP_DURATION: 'sleep_duration',
  SLEEP_DEEP: 'sleep_deep',
  SLEEP_LIGHT: 'sleep_light',
  SLEEP_REM: 'sleep_rem',
  SLEEP_AWAKE: 'sleep_awake',
  SLEEP_ONSET: 'sleep_onset',
  SLEEP_END: 'sleep_end',
  SLEEP_SCORE: 'sleep_score',

  // Body
  WEIGHT: 'weight',

  // Nutrition (macro-nutrient family)
  PROTEIN: 'protein',
  CARBOHYDRATE: 'carbohydrate',
  FAT: 'fat',
  FIBER: 'fiber',
  SODIUM: 'sodium',
} as const;

export type MetricType = typeof METRIC_TYPES[keyof typeof METRIC_TYPES];

export const ALL_METRIC_TYPES: MetricType[] = Object.values(METRIC_TYPES);

export type MetricCategory = 'heart' | 'activity' | 'sleep' | 'body' | 'nutrition';

/**
 * How one provider's samples for a day collapse into one daily value.
 * Sleep stages arrive as segments, so they sum per day without being additive.
 */
export type DailyAggregation = 'sum' | 'mean';

export interface MetricDefinition {
  key: MetricType;
  displayName: string;
  category: MetricCategory;
  unit: string; // canonical storage unit
  aggregation: DailyAggregation;
  additive: boolean; // a day with no samples counts as zero inside a rolling window
}

export const METRIC_REGISTRY: Record<MetricType, MetricDefinition> = {
  heart_rate: { key: 'heart_rate', displayName: 'Heart Rate', category: 'heart', unit: 'bpm', aggregation: 'mean', additive: false },
  resting_heart_rate: { key: 'resting_heart_rate', displayName: 'Resting Heart Rate', category: 'heart', unit: 'bpm', aggregation: 'mean', additive: false },
  hrv: { key: 'hrv', displayName: 'HRV', category: 'heart', unit: 'ms', aggregation: 'mean', additive: false },
  spo2: { key: 'spo2', displayName: 'Blood Oxygen', category: 'heart', unit: '%', aggregation: 'mean', additive: false },

  steps: { key: 'steps', displayName: 'Steps', category: 'activity', unit: 'count', aggregation: 'sum', additive: true },
  distance: { key: 'distance', displayName: 'Distance', category: 'activity', unit: 'm', aggregation: 'sum', additive: true },
  calories: { key: 'calories', displayName: 'Calories', category: 'activity', unit: 'kcal', aggregation: 'sum', additive: true },
  active_minutes: { key: 'active_minutes', displayName: 'Active Time', category: 'activity', unit: 's', aggregation: 'sum', additive: true },

  sleep_duration: { key: 'sleep_duration', displayName: 'Sleep Duration', category: 'sleep', unit: 's', aggregation: 'sum', additive: false },
  sleep_deep: { key: 'sleep_deep', displayName: 'Deep Sleep', category: 'sleep', unit: 's', aggregation: 'sum', additive: false },
  sleep_light: { key: 'sleep_light', displayName: 'Light Sleep', category: 'sleep', unit: 's', aggregation: 'sum', additive: false },
  sleep_rem: { key: 'sleep_rem', displayName: 'REM Sleep', category: 'sleep', unit: 's', aggregation: 'sum', additive: false },
  sleep_awake: { key: 'sleep_awake', displayName: 'Time Awake', category: 'sleep', unit: 's', aggregation: 'sum', additive: false },
  sleep_onset: { key: 'sleep_onset', displayName: 'Bedtime', category: 'sleep', unit: 'clock_s', aggregation: 'mean', additive: false },
  sleep_end: { key: 'sleep_end', displayName: 'Wake Time', category: 'sleep', unit: 'clock_s', aggregation: 'mean', additive: false },
  sleep_score: { key: 'sleep_score', displayName: 'Sleep Score', category: 'sleep', unit: 'score', aggregation: 'mean', additive: false },

  weight: { key: 'weight', displayName: 'Weight', category: 'body', unit: 'kg', aggregation: 'mean', additive: false },

  protein: { key: 'protein', displayName: 'Protein', category: 'nutrition', unit: 'g', aggregation: 'sum', additive: true },
  carbohydrate: { key: 'carbohydrate', displayName: 'Carbohydrates', category: 'nutrition', unit: 'g', aggregation: 'sum', additive: true },
  fat: { key: 'fat', displayName: 'Fat', category: 'nutrition', unit: 'g', aggregation: 'sum', additive: true },
  fiber: { key: 'fiber', displayName: 'Fiber', category: 'nutrition', unit: 'g', aggregation: 'sum', additive: true },
  sodium: { key: 'sodium', displayName: 'Sodium', category: 'nutrition', unit: 'mg', aggregation: 'sum', additive: true },
};

export function isMetricType(value: string): value is MetricType {
  return Object.prototype.hasOwnProperty.call(METRIC_REGISTRY, value);
}

export function isAdditiveMetric(metricType: MetricType): boolean {
  return METRIC_REGISTRY[metricType].additive;
}

export function getCanonicalUnit(metricType: MetricType): string {
  return METRIC_REGISTRY[metricType].unit;
}

export function getMetricDisplayName(metricType: MetricType): string {
  return METRIC_REGISTRY[metricType].displayName;
}
