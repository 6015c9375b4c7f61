/**
 * FakeExecutor - Scripted Executor for player API tests
 */

import type { Command, Reply } from '@/ipc/protocol/index.js';
import type { Executor } from '@/ipc/types.js';

export type Responder = (command: Command) => Partial<Pick<Reply, 'error' | 'data'>>;

/**
 * Records every command and answers from a responder function.
 *
 * @example
 * ```typescript
 * const executor = new FakeExecutor(() => ({ data: 42 }));
 * await new PlayerClient(executor).volume(); // → 42
 * assert.deepEqual(executor.commands, [['get_property', 'volume']]);
 * ```
 */
export class FakeExecutor implements Executor {
  readonly commands: Command[] = [];
  closed = false;
  private nextId = 1;

  constructor(private readonly responder: Responder = () => ({})) {}

  execute(command: Command): Promise<Reply> {
    this.commands.push(command);
    const { error = '', data } = this.responder(command);
    return Promise.resolve({ error, data, event: '', requestId: this.nextId++ });
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}
