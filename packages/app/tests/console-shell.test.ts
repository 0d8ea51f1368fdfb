/**
 * Tests for the console shell
 */

import { describe, it, expect, vi } from 'vitest';
import { CommandProcessor } from '@tapline/core';
import { createLogger, getRequestId } from '@tapline/logger';
import { createCommandSet } from '../src/commands/command-set.js';
import { ConsoleShell, welcomeLine } from '../src/services/console/console-shell.js';
import { collectOutput, inputLines } from './helpers/streams.js';

const logger = createLogger({ level: 'error', silent: true });

describe('ConsoleShell', () => {
  it('should greet, then answer each line after a prompt', async () => {
    const processor = createCommandSet({ name: 'Demo', timezone: 'UTC' });
    const output = collectOutput();
    const shell = new ConsoleShell({
      processor,
      name: 'Demo',
      input: inputLines('tu cw a b c', 'calc'),
      output: output.stream,
      logger,
    });

    const processed = await shell.run();

    expect(processed).toBe(2);
    expect(output.text()).toBe(
      'Demo, type "help", to show command list!\n> 3\n> Please specify a command within a "calc" group!\n> '
    );
  });

  it('should answer blank lines', async () => {
    const processor = createCommandSet({ name: 'Demo', timezone: 'UTC' });
    const output = collectOutput();

    await new ConsoleShell({ processor, name: 'Demo', prompt: '', input: inputLines(''), output: output.stream, logger }).run();

    expect(output.text()).toBe('Demo, type "help", to show command list!\nPlease enter a command!\n');
  });

  it('should resolve when input is empty', async () => {
    const processor = new CommandProcessor({ description: 'Empty' });
    const output = collectOutput();

    const processed = await new ConsoleShell({
      processor,
      name: 'Empty',
      prompt: '$ ',
      input: inputLines(),
      output: output.stream,
      logger,
    }).run();

    expect(processed).toBe(0);
    expect(output.text()).toBe('Empty, type "help", to show command list!\n$ ');
  });

  it('should run every line under its own request id', async () => {
    const processor = new CommandProcessor({ description: 'Ids' });
    vi.spyOn(processor, 'processLine').mockImplementation(() => getRequestId() ?? 'none');
    const output = collectOutput();

    await new ConsoleShell({
      processor,
      name: 'Ids',
      prompt: '',
      input: inputLines('first', 'second'),
      output: output.stream,
      logger,
    }).run();

    const [, first, second] = output.text().split('\n');
    expect(first).toMatch(/^[0-9a-f-]{36}$/);
    expect(second).toMatch(/^[0-9a-f-]{36}$/);
    expect(first).not.toBe(second);
  });
});

describe('welcomeLine', () => {
  it('should name the application', () => {
    expect(welcomeLine('Tapline test console')).toBe('Tapline test console, type "help", to show command list!');
  });
});
