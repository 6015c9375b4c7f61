import type { Command } from 'commander';

import { registerExecCommand } from '@/commands/exec.js';
import { registerPlaybackCommands } from '@/commands/playback.js';
import { registerPropertyCommands } from '@/commands/properties.js';
import { registerStatusCommand } from '@/commands/status.js';
import { registerVolumeCommand } from '@/commands/volume.js';
import { registerWatchCommand } from '@/commands/watch.js';

/**
 * Command registration function type
 */
export type CommandRegistrar = (program: Command) => void;

/**
 * Helper to add a command group
 */
const addCommandGroup = (groupName: string): CommandRegistrar => {
  return (program: Command) => {
    program.commandsGroup(groupName);
  };
};

/**
 * Registry of all CLI commands with grouping
 * Order matters: groups organize commands in help output
 */
export const commandRegistry: CommandRegistrar[] = [
  addCommandGroup('Playback:'),
  registerPlaybackCommands,
  registerVolumeCommand,

  addCommandGroup('Inspection:'),
  registerStatusCommand,
  registerWatchCommand,

  addCommandGroup('Properties & Raw Commands:'),
  registerPropertyCommands,
  registerExecCommand,
];
