import { ExecutionContext } from './context';
import { Executor, type ExecuteOptions, type ExecutionServices } from './interpreter/executor';
import type { Program } from './parser/ast-nodes';

/**
 * A parsed template, executable any number of times
 *
 * @example
 * ```ts
 * const template = engine.parse('Hello, {~prompty.var name="user" /~}!');
 * await template.execute({ user: 'Alice' }); // => 'Hello, Alice!'
 * ```
 */
export class Template {
  readonly source: string;
  readonly name: string | undefined;
  readonly body: Program;
  private readonly services: ExecutionServices;

  constructor(source: string, body: Program, services: ExecutionServices, name?: string) {
    this.source = source;
    this.body = body;
    this.services = services;
    this.name = name;
    Object.freeze(this);
  }

  execute(
    data: Record<string, unknown> | Map<string, unknown> = {},
    options: ExecuteOptions = {},
  ): Promise<string> {
    const context = new ExecutionContext(data, this.services.config.errorStrategy);
    return this.executeWithContext(context, options);
  }

  async executeWithContext(context: ExecutionContext, options: ExecuteOptions = {}): Promise<string> {
    const { clock, logger } = this.services.config;
    const started = clock();
    const executor = new Executor(this.services, {
      signal: options.signal,
      chain: this.name === undefined ? [] : [this.name],
    });

    const output = await executor.execute(this.body, context);

    logger.debug('execution_completed', {
      template: this.name ?? null,
      output_bytes: Buffer.byteLength(output, 'utf8'),
      duration_ms: clock() - started,
    });
    return output;
  }
}
