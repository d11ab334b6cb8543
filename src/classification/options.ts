import { ClassificationConfigError } from '../utils/errors';
import { ClassificationOptions, MissingEstimatePolicy, WindowDirection } from './types';

export const DEFAULT_WINDOW_SIZE = 50;
export const DEFAULT_VIRAL_MULTIPLIER = 1.15;
export const DEFAULT_MAX_POSTS_PER_ACCOUNT = 50;
export const DEFAULT_MIN_POSTS_PER_ACCOUNT = 1;
export const DEFAULT_TOP_FRACTION = 0.2;

export const WINDOW_DIRECTIONS: readonly WindowDirection[] = ['toward-recent', 'toward-older'];
export const MISSING_ESTIMATE_POLICIES: readonly MissingEstimatePolicy[] = [
  'non-viral',
  'percentile-fallback',
];

/**
 * A post whose look-ahead window is too short can never be marked viral by the rolling path.
 * With W posts of lookahead, that is always the W newest posts of every account.
 */
export const DEFAULT_MISSING_ESTIMATE_POLICY: MissingEstimatePolicy = 'non-viral';

export const DEFAULT_CLASSIFICATION_OPTIONS: Readonly<ClassificationOptions> = Object.freeze({
  windowSize: DEFAULT_WINDOW_SIZE,
  viralMultiplier: DEFAULT_VIRAL_MULTIPLIER,
  maxPostsPerAccount: DEFAULT_MAX_POSTS_PER_ACCOUNT,
  minPostsPerAccount: DEFAULT_MIN_POSTS_PER_ACCOUNT,
  topFraction: DEFAULT_TOP_FRACTION,
  windowDirection: 'toward-recent',
  missingEstimatePolicy: DEFAULT_MISSING_ESTIMATE_POLICY,
});

export function isWindowDirection(value: string): value is WindowDirection {
  return WINDOW_DIRECTIONS.some(direction => direction === value);
}

export function isMissingEstimatePolicy(value: string): value is MissingEstimatePolicy {
  return MISSING_ESTIMATE_POLICIES.some(policy => policy === value);
}

function requireInteger(option: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new ClassificationConfigError(option, `${option} must be an integer >= ${min}, got ${value}`);
  }
}

export function validateTopFraction(value: number): void {
  if (!Number.isFinite(value) || value <= 0 || value > 1) {
    throw new ClassificationConfigError('topFraction', `topFraction must be in (0, 1], got ${value}`);
  }
}

export function resolveClassificationOptions(
  overrides: Partial<ClassificationOptions> = {}
): ClassificationOptions {
  const options: ClassificationOptions = { ...DEFAULT_CLASSIFICATION_OPTIONS, ...overrides };

  requireInteger('windowSize', options.windowSize, 1);
  requireInteger('maxPostsPerAccount', options.maxPostsPerAccount, 1);
  requireInteger('minPostsPerAccount', options.minPostsPerAccount, 0);

  if (!Number.isFinite(options.viralMultiplier) || options.viralMultiplier < 0) {
    throw new ClassificationConfigError(
      'viralMultiplier',
      `viralMultiplier must be a finite number >= 0, got ${options.viralMultiplier}`
    );
  }

  validateTopFraction(options.topFraction);

  if (!isWindowDirection(options.windowDirection)) {
    throw new ClassificationConfigError(
      'windowDirection',
      `windowDirection must be one of ${WINDOW_DIRECTIONS.join(', ')}`
    );
  }

  if (!isMissingEstimatePolicy(options.missingEstimatePolicy)) {
    throw new ClassificationConfigError(
      'missingEstimatePolicy',
      `missingEstimatePolicy must be one of ${MISSING_ESTIMATE_POLICIES.join(', ')}`
    );
  }

  return options;
}
