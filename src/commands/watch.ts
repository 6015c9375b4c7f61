import type { Command } from 'commander';

import { runCommand, type BaseCommandOptions } from '@/commands/shared/CommandRunner.js';
import { jsonOption } from '@/commands/shared/commonOptions.js';
import { getGlobalOptions, toClientOptions } from '@/commands/shared/connection.js';
import { ClientClosedError, EventRouter, IPCClient, type Notification } from '@/ipc/index.js';
import { PlayerClient } from '@/player/index.js';
import { formatValue } from '@/ui/formatting.js';

interface WatchOptions extends BaseCommandOptions {
  /** Properties to observe; their changes arrive as property-change events. */
  observe?: string[];
}

interface WatchResult {
  notifications: number;
}

/**
 * Render one notification as a single output line.
 *
 * @example
 * ```
 * property-change pause=true
 * start-file playlist_entry_id=1
 * ```
 */
export function formatNotification(notification: Notification): string {
  if (notification.event === 'property-change') {
    const name = notification.fields['name'];
    return `property-change ${typeof name === 'string' ? name : '?'}=${formatValue(notification.data)}`;
  }
  const extras = Object.entries(notification.fields)
    .filter(([key]) => key !== 'event')
    .map(([key, value]) => `${key}=${formatValue(value)}`);
  return [notification.event, ...extras].join(' ');
}

/**
 * Resolve once the client shuts down or the user interrupts.
 */
function waitForStop(client: IPCClient): Promise<void> {
  if (client.closed) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const stop = (): void => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
      client.signal.removeEventListener('abort', stop);
      resolve();
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
    client.signal.addEventListener('abort', stop, { once: true });
  });
}

/**
 * Register watch command
 *
 * @param program - Commander.js Command instance to register commands on
 */
export function registerWatchCommand(program: Command): void {
  program
    .command('watch')
    .description('Stream player events until interrupted (Ctrl+C)')
    .option('--observe <property...>', 'Also report changes of these properties')
    .addOption(jsonOption)
    .action(async (options: WatchOptions, command: Command) => {
      const globals = getGlobalOptions(command);
      await runCommand<WatchOptions, WatchResult>(
        async (opts) => {
          let count = 0;
          const events = new EventRouter();
          events.onAny((notification) => {
            count++;
            console.log(opts.json ? JSON.stringify(notification) : formatNotification(notification));
          });

          const client = await IPCClient.open({
            ...toClientOptions(globals),
            notificationSink: events,
          });
          const player = new PlayerClient(client);
          try {
            const properties = opts.observe ?? [];
            for (const [index, property] of properties.entries()) {
              await player.observeProperty(index + 1, property);
            }
            await waitForStop(client);

            const reason: unknown = client.signal.reason;
            if (client.closed && !(reason instanceof ClientClosedError)) {
              throw reason;
            }
          } finally {
            await player.close();
          }
          return { success: true, data: { notifications: count } };
        },
        options,
        (result) => `Stopped after ${result.notifications} event(s)`
      );
    });
}
