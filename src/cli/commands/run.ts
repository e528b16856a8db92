import { Command, InvalidArgumentError } from 'commander';
import { runPipeline } from '../../pipeline/workflow.js';
import { config } from '../../utils/config.js';
import { logger } from '../../utils/logger.js';
import {
  createBrowser,
  createLanguageModel,
  createPipelineDeps,
  createRunOptions,
  hasPortalCredentials,
  loadProfileOrExit,
} from '../runtime.js';

interface RunCommandOptions {
  profile: string;
  daysAhead: number;
  daysBehind: number;
  maxCourses: number;
  output: string;
  llm: boolean;
}

export function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export const runCommand = new Command('run')
  .description('Log in to the portal, extract assignments and write the Markdown report')
  .option('-p, --profile <name>', 'Portal profile to use', config.portal.profile)
  .option('--days-ahead <n>', 'Days ahead to include', parseCount, config.scraper.daysAhead)
  .option('--days-behind <n>', 'Days behind to include', parseCount, config.scraper.daysBehind)
  .option('--max-courses <n>', 'Limit the number of courses processed (0 = all)', parseCount, config.scraper.maxCourses)
  .option('-o, --output <dir>', 'Directory for the report', config.paths.outputDir)
  .option('--no-llm', 'Do not use the local language model')
  .action(async (options: RunCommandOptions) => {
    if (!hasPortalCredentials()) {
      console.error('PORTAL_BASE_URL, PORTAL_USERNAME and PORTAL_PASSWORD must be set (see .env.example).');
      process.exit(1);
    }

    const profile = loadProfileOrExit(options.profile);

    console.log(`Portal: ${config.portal.baseUrl} (profile: ${options.profile})`);
    console.log(`Window: last ${options.daysBehind} and next ${options.daysAhead} days\n`);

    const browser = createBrowser();
    const model = createLanguageModel(options.llm);

    try {
      const state = await runPipeline(
        createRunOptions({
          profileName: options.profile,
          profile,
          daysAhead: options.daysAhead,
          daysBehind: options.daysBehind,
          maxCourses: options.maxCourses,
          outputDir: options.output,
        }),
        createPipelineDeps(browser, model)
      );

      if (state.errors.length > 0) {
        console.log('\nErrors:');
        for (const error of state.errors) {
          console.log(`  - ${error}`);
        }
      }

      console.log(`\nCourses: ${state.courses.length} | Tasks: ${state.classification?.totalInPeriod ?? 0}`);
      if (state.reportPath) {
        console.log(`Report: ${state.reportPath}`);
      }

      if (!state.authenticated) {
        console.error('\nLogin failed. Check your credentials and the profile selectors.');
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error(`Run failed: ${error}`);
      console.error(`\nRun failed: ${error}`);
      process.exitCode = 1;
    } finally {
      await browser.close();
    }
  });
