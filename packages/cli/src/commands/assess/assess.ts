import { Command } from 'commander';
import { AssessCommand } from './assess-command';

/**
 * Register the assess command
 */
export function registerAssessCommands(program: Command): void {
  const assessCommand = new AssessCommand();
  assessCommand.register(program);
}
