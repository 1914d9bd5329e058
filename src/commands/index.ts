// File: src/commands/index.ts
// Central registry for all CLI commands in the application

import { Command } from 'commander'
import { registerDocumentCommands } from './document'
import { registerAccountCommands } from './accounts'
import { registerRegionCommands } from './regions'

/**
 * Register all commands with the CLI program
 *
 * @param program - The Commander program object to register commands with
 */
export function registerCommands(program: Command): void {
  // Network documentation (default command)
  registerDocumentCommands(program)

  // Organization account listing
  registerAccountCommands(program)

  // Enabled region listing
  registerRegionCommands(program)
}
