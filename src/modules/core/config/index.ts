import * as yaml from 'js-yaml';
import { cloneDeep, isPlainObject } from 'lodash';
import { logger } from '../logger';
import { ProjectConfig, ReviewMode } from './interfaces/config.interface';
export * from './interfaces/config.interface';
export * from './invoker-config';

export const PROJECT_CONFIG_FILES = ['.codereview.yaml', '.codereview.yml'];

export const defaultProjectConfig: ProjectConfig = {
  version: '1.0',
  review: {
    mode: 'strict',
    language: 'English',
  },
  files: {
    exclude: [],
  },
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value);
}

function isReviewMode(value: unknown): value is ReviewMode {
  return value === 'light' || value === 'strict';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Parses `.codereview.yaml` content. Unknown keys are ignored; a field with
 * the wrong type keeps its default and an unparseable file yields the
 * defaults.
 */
export function parseConfig(yamlString: string | null | undefined): ProjectConfig {
  const config = cloneDeep(defaultProjectConfig);
  if (!yamlString || !yamlString.trim()) {
    return config;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(yamlString);
  } catch (error) {
    logger.warn(
      `Invalid YAML format: ${error instanceof Error ? error.message : String(error)}, use default config`,
      'ConfigParser',
    );
    return config;
  }

  if (!isRecord(parsed)) {
    logger.warn(
      'Invalid YAML format: configuration must be an object, use default config',
      'ConfigParser',
    );
    return config;
  }

  if (typeof parsed.version === 'string') {
    config.version = parsed.version;
  }

  const review = parsed.review;
  if (isRecord(review)) {
    if (isReviewMode(review.mode)) {
      config.review.mode = review.mode;
    }
    if (typeof review.language === 'string' && review.language.trim()) {
      config.review.language = review.language.trim();
    }
    if (
      typeof review.max_diff_chars === 'number' &&
      Number.isInteger(review.max_diff_chars) &&
      review.max_diff_chars > 0
    ) {
      config.review.max_diff_chars = review.max_diff_chars;
    }
  }

  const files = parsed.files;
  if (isRecord(files) && isStringArray(files.exclude)) {
    config.files.exclude = files.exclude;
  }

  if (typeof parsed.context === 'string' && parsed.context.trim()) {
    config.context = parsed.context.trim();
  }

  return config;
}
