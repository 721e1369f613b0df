import dotenv from 'dotenv';
dotenv.config();

export type TrackedGranularity = 'span' | 'word';
export type AmbiguityHandling = 'first' | 'skip';

interface RedlineConfig {
  author: string;
  fuzzyThreshold: number;
  ignoreCase: boolean;
  skipIfSame: boolean;
  onAmbiguous: AmbiguityHandling;
  trackedGranularity: TrackedGranularity;
}

interface Config {
  nodeEnv: string;
  version: string;
  redline: RedlineConfig;
}

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value === '') return fallback;
  return value.toLowerCase() === 'true' || value === '1';
};

const parseThreshold = (value: string | undefined, fallback: number): number => {
  const parsed = parseFloat(value || '');
  if (Number.isNaN(parsed) || parsed <= 0 || parsed > 1) return fallback;
  return parsed;
};

export const config: Config = {
  nodeEnv: process.env.NODE_ENV || 'development',
  version: process.env.npm_package_version || '1.0.0',
  redline: {
    author: process.env.REDLINE_AUTHOR || 'AI Compliance Reviewer',
    fuzzyThreshold: parseThreshold(process.env.REDLINE_FUZZY_THRESHOLD, 0.8),
    ignoreCase: parseBoolean(process.env.REDLINE_IGNORE_CASE, false),
    skipIfSame: parseBoolean(process.env.REDLINE_SKIP_IF_SAME, true),
    onAmbiguous: process.env.REDLINE_ON_AMBIGUOUS === 'skip' ? 'skip' : 'first',
    trackedGranularity: process.env.REDLINE_TRACKED_GRANULARITY === 'word' ? 'word' : 'span',
  },
};

export default config;
