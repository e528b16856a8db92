import { Command } from 'commander';
import { DEFAULT_TEMPLATE_PATH, TemplateError, loadReportTemplate } from '../../report/template.js';

export const templateCommand = new Command('template').description('Work with the report template');

templateCommand
  .command('validate [path]')
  .description('Check that a report template has every required placeholder')
  .action(async (templatePath: string | undefined) => {
    const target = templatePath ?? DEFAULT_TEMPLATE_PATH;
    try {
      await loadReportTemplate(target);
      console.log(`Template ${target} is valid.`);
    } catch (error) {
      if (error instanceof TemplateError) {
        console.error(error.message);
        process.exit(1);
      }
      throw error;
    }
  });
