/**
 * Interactive console host
 */

import { createInterface } from 'node:readline';
import type { CommandProcessor } from '@tapline/core';
import { createChildLogger, withCLIRequestContext, type Logger } from '@tapline/logger';

export interface ConsoleShellOptions {
  processor: CommandProcessor;
  /** Shown in the welcome line */
  name: string;
  /** Written before every line of input; empty for none */
  prompt?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  logger: Logger;
}

export function welcomeLine(name: string): string {
  return `${name}, type "help", to show command list!`;
}

/**
 * Reads lines until input ends and writes the processor's answer to each.
 *
 * @example
 * ```typescript
 * const shell = new ConsoleShell({ processor, name: config.app.name, logger });
 * await shell.run(); // resolves on Ctrl+D
 * ```
 */
export class ConsoleShell {
  private readonly processor: CommandProcessor;
  private readonly name: string;
  private readonly prompt: string;
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly logger: Logger;

  constructor(options: ConsoleShellOptions) {
    this.processor = options.processor;
    this.name = options.name;
    this.prompt = options.prompt ?? '> ';
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.logger = createChildLogger(options.logger, { component: 'console-shell' });
  }

  /**
   * @returns Number of lines processed
   */
  async run(): Promise<number> {
    const lines = createInterface({ input: this.input, terminal: false, crlfDelay: Infinity });
    let processed = 0;

    this.logger.info('Shell started');
    this.output.write(`${welcomeLine(this.name)}\n${this.prompt}`);

    try {
      for await (const line of lines) {
        const reply = await withCLIRequestContext('shell:line')(async () => this.processor.processLine(line));
        processed += 1;
        this.output.write(`${reply}\n${this.prompt}`);
      }
    } finally {
      lines.close();
    }

    this.logger.info('Input closed', { lines: processed });
    return processed;
  }
}
