/**
 * Tests for the interactive prompt over in-memory streams.
 */
import { describe, it, expect, beforeAll, afterEach } from 'vitest';
import { PassThrough } from 'node:stream';
import chalk from 'chalk';
import { ReadlinePrompt } from '../../../../src/cli/prompts/readline-prompt.js';
import type { EnumOption } from '../../../../src/core/store/types.js';
import type { ConflictReport } from '../../../../src/core/conflicts/types.js';

const provider: EnumOption = {
  name: 'provider',
  type: 'enum',
  values: ['noop', 'sentry', 'crashlytics'],
  default: 'noop',
  description: 'Backing provider',
};

const report: ConflictReport = {
  generatorId: 'error-monitoring',
  entries: [
    {
      pattern: 'ErrorMonitoringService',
      patternKind: 'symbol',
      matchedPath: 'App/Monitoring.swift',
      matchedSymbol: 'ErrorMonitoringService',
      severity: 'blocking',
      attribution: { kind: 'foreign' },
      reason: 'hand-written protocol occupies this name',
    },
  ],
};

describe('ReadlinePrompt', () => {
  let input: PassThrough;
  let output: PassThrough;
  let prompt: ReadlinePrompt;
  let written: string;

  beforeAll(() => {
    chalk.level = 0;
  });

  const open = (): void => {
    input = new PassThrough();
    output = new PassThrough();
    written = '';
    output.on('data', (chunk: Buffer) => {
      written += chunk.toString();
    });
    prompt = new ReadlinePrompt({ input, output });
  };

  afterEach(() => {
    prompt.close();
  });

  it('should accept an enum answer by number', async () => {
    open();
    const answer = prompt.requestValue(provider);
    input.write('2\n');

    expect(await answer).toEqual({ kind: 'value', value: 'sentry' });
    expect(written).toContain('  2) sentry\n');
  });

  it('should take the default on an empty answer', async () => {
    open();
    const answer = prompt.requestValue(provider);
    input.write('\n');

    expect(await answer).toEqual({ kind: 'value', value: 'noop' });
  });

  it('should coerce yes/no answers for bool options', async () => {
    open();
    const answer = prompt.requestValue({ name: 'debug_logging', type: 'bool' });
    input.write('yes\n');

    expect(await answer).toEqual({ kind: 'value', value: true });
  });

  it('should cancel when the input closes', async () => {
    open();
    const answer = prompt.requestValue(provider);
    input.end();

    expect(await answer).toEqual({ kind: 'cancel' });
  });

  it('should map conflict answers to resolutions', async () => {
    open();
    const choice = prompt.chooseResolution(report);
    input.write('e\n');

    expect(await choice).toBe('extend');
    expect(written).toContain('  ✗ ErrorMonitoringService in App/Monitoring.swift (hand-written protocol occupies this name)\n');
  });

  it('should abort when the input closes at conflict resolution', async () => {
    open();
    const choice = prompt.chooseResolution(report);
    input.end();

    expect(await choice).toBe('abort');
  });
});
