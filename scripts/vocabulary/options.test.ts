import { describe, expect, it } from 'vitest';

import { ValidationError } from './errors';
import { defaultBuildOptions, parseArgs } from './options';

describe('parseArgs', () => {
  it('defaults to the data folders under the project root', () => {
    expect(parseArgs([], '/project')).toEqual({
      docsDir: '/project/data/raw',
      outputPath: '/project/data/processed/chinese_vocab.json',
      checkpointPath: '/project/data/interim/chinese_vocab_checkpoint.json',
      policy: 'abort',
      retries: 3,
      retryDelayMs: 1000,
      timeoutMs: 3000,
      sqlite: false,
      csv: false,
      buildOnly: false
    });
  });

  it('resolves paths against the project root', () => {
    const options = parseArgs(['--docs=cours', '--output=/tmp/vocab.json', '--checkpoint=tmp/cp.json'], '/project');

    expect(options.docsDir).toBe('/project/cours');
    expect(options.outputPath).toBe('/tmp/vocab.json');
    expect(options.checkpointPath).toBe('/project/tmp/cp.json');
  });

  it('reads the error policy and numeric settings', () => {
    const options = parseArgs(
      ['--policy=retry', '--retries=5', '--retry-delay=250', '--timeout=8000', '--sqlite', '--csv', '--build-only'],
      '/project'
    );

    expect(options).toEqual({
      ...defaultBuildOptions('/project'),
      policy: 'retry',
      retries: 5,
      retryDelayMs: 250,
      timeoutMs: 8000,
      sqlite: true,
      csv: true,
      buildOnly: true
    });
  });

  it('rejects unknown policies', () => {
    expect(() => parseArgs(['--policy=ignore'], '/project')).toThrow(
      '--policy must be one of abort, skip, retry, got "ignore".'
    );
  });

  it('requires a positive request timeout', () => {
    expect(() => parseArgs(['--timeout=0'], '/project')).toThrow('--timeout expects a positive integer, got "0".');
    expect(parseArgs(['--retry-delay=0'], '/project').retryDelayMs).toBe(0);
  });

  it('rejects malformed numbers and unknown flags', () => {
    expect(() => parseArgs(['--retries=two'], '/project')).toThrow(ValidationError);
    expect(() => parseArgs(['--retries=-1'], '/project')).toThrow(ValidationError);
    expect(() => parseArgs(['--verbose'], '/project')).toThrow('Unknown or incomplete option "--verbose".');
    expect(() => parseArgs(['--colour=red'], '/project')).toThrow('Unknown option "--colour=red".');
  });
});
