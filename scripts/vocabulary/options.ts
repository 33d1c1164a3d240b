import { fileURLToPath } from 'node:url';
import { join, resolve } from 'node:path';

import { ValidationError } from './errors';
import { DEFAULT_TIMEOUT_MS } from './http';
import type { ErrorPolicy } from './types';

export interface BuildOptions {
  docsDir: string;
  outputPath: string;
  checkpointPath: string;
  policy: ErrorPolicy;
  retries: number;
  retryDelayMs: number;
  timeoutMs: number;
  sqlite: boolean;
  csv: boolean;
  buildOnly: boolean;
}

export const ROOT_DIR = fileURLToPath(new URL('../../', import.meta.url));

const POLICIES: ErrorPolicy[] = ['abort', 'skip', 'retry'];

const parseCount = (flag: string, raw: string): number => {
  const value = Number.parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 0 || String(value) !== raw.trim()) {
    throw new ValidationError(`${flag} expects a non-negative integer, got "${raw}".`);
  }
  return value;
};

const parsePositive = (flag: string, raw: string): number => {
  const value = parseCount(flag, raw);
  if (value === 0) {
    throw new ValidationError(`${flag} expects a positive integer, got "${raw}".`);
  }
  return value;
};

const isPolicy = (value: string): value is ErrorPolicy => POLICIES.some((policy) => policy === value);

export const defaultBuildOptions = (rootDir: string = ROOT_DIR): BuildOptions => ({
  docsDir: join(rootDir, 'data', 'raw'),
  outputPath: join(rootDir, 'data', 'processed', 'chinese_vocab.json'),
  checkpointPath: join(rootDir, 'data', 'interim', 'chinese_vocab_checkpoint.json'),
  policy: 'abort',
  retries: 3,
  retryDelayMs: 1000,
  timeoutMs: DEFAULT_TIMEOUT_MS,
  sqlite: false,
  csv: false,
  buildOnly: false
});

export const parseArgs = (args: string[], rootDir: string = ROOT_DIR): BuildOptions => {
  const options = defaultBuildOptions(rootDir);

  args.forEach((arg) => {
    if (arg === '--sqlite') {
      options.sqlite = true;
      return;
    }
    if (arg === '--csv') {
      options.csv = true;
      return;
    }
    if (arg === '--build-only') {
      options.buildOnly = true;
      return;
    }

    const separator = arg.indexOf('=');
    const flag = separator === -1 ? arg : arg.substring(0, separator);
    const value = separator === -1 ? '' : arg.substring(separator + 1);
    if (!value) {
      throw new ValidationError(`Unknown or incomplete option "${arg}".`);
    }

    switch (flag) {
      case '--docs':
        options.docsDir = resolve(rootDir, value);
        break;
      case '--output':
        options.outputPath = resolve(rootDir, value);
        break;
      case '--checkpoint':
        options.checkpointPath = resolve(rootDir, value);
        break;
      case '--policy':
        if (!isPolicy(value)) {
          throw new ValidationError(`--policy must be one of ${POLICIES.join(', ')}, got "${value}".`);
        }
        options.policy = value;
        break;
      case '--retries':
        options.retries = parseCount(flag, value);
        break;
      case '--retry-delay':
        options.retryDelayMs = parseCount(flag, value);
        break;
      case '--timeout':
        options.timeoutMs = parsePositive(flag, value);
        break;
      default:
        throw new ValidationError(`Unknown option "${arg}".`);
    }
  });

  return options;
};
