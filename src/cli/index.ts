import { Command } from 'commander';
import { runCommand } from './commands/run.js';
import { profilesCommand } from './commands/profiles.js';
import { templateCommand } from './commands/template.js';
import { mcpCommand } from './commands/mcp.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('lms-report')
    .description('Extract assignment deadlines from a learning portal into a Markdown report')
    .version('1.0.0');

  program.addCommand(runCommand);
  program.addCommand(profilesCommand);
  program.addCommand(templateCommand);
  program.addCommand(mcpCommand);

  return program;
}
