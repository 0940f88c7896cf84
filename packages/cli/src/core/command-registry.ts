/**
 * Command Registry
 *
 * Command modules register at import time; defineCommand() looks the
 * definition up again when Commander fires, so the zod schema and the handler
 * live in exactly one place.
 */

import type { CommandDefinition, PackageCommandModule } from '../types/index.js';
import { ConfigurationError, ValidationError } from '@cloverrun/utils';

const BINARY_NAME = 'cloverrun';

export class CommandRegistry {
  private readonly packages = new Map<string, Map<string, CommandDefinition>>();

  /**
   * Register every command of a package. Nothing is registered when any
   * command is invalid.
   */
  registerPackage(module: PackageCommandModule): void {
    const { packageName } = module;
    if (this.packages.has(packageName)) {
      throw new ConfigurationError(`Package ${packageName} is already registered`, 'packageName', {
        packageName,
      });
    }

    const commands = new Map<string, CommandDefinition>();
    for (const command of module.commands) {
      this.validateCommand(command);
      if (commands.has(command.name)) {
        throw new ConfigurationError(
          `Command ${packageName}.${command.name} is already registered`,
          'commandName',
          { packageName, commandName: command.name }
        );
      }
      commands.set(command.name, command);
    }

    this.packages.set(packageName, commands);
  }

  getCommand(packageName: string, commandName: string): CommandDefinition | undefined {
    return this.packages.get(packageName)?.get(commandName);
  }

  /**
   * Names and descriptions must be non-empty; examples must be runnable as
   * written, so they start with the binary name.
   */
  validateCommand(command: CommandDefinition): void {
    if (command.name.trim() === '') {
      throw new ValidationError('Command name must be a non-empty string', {
        command: command.name,
      });
    }
    if (command.description.trim() === '') {
      throw new ValidationError('Command description must be a non-empty string', {
        command: command.name,
      });
    }
    const stray = command.examples?.find((example) => !example.startsWith(`${BINARY_NAME} `));
    if (stray !== undefined) {
      throw new ValidationError('Command examples must start with the binary name', {
        command: command.name,
        example: stray,
      });
    }
  }
}

export const commandRegistry = new CommandRegistry();
