import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { createMcpServer } from '../../mcp/server.js';
import { ProfileLoader } from '../../profiles/loader.js';
import { runPipeline } from '../../pipeline/workflow.js';
import { config } from '../../utils/config.js';
import { logToStderr, logger } from '../../utils/logger.js';
import {
  createBrowser,
  createLanguageModel,
  createPipelineDeps,
  createRunOptions,
  hasPortalCredentials,
  loadProfileOrExit,
} from '../runtime.js';

interface ServeOptions {
  profile: string;
  llm: boolean;
}

export const mcpCommand = new Command('mcp').description('Model Context Protocol server');

mcpCommand
  .command('serve')
  .description('Serve the assignment tools over stdio')
  .option('-p, --profile <name>', 'Portal profile to use', config.portal.profile)
  .option('--no-llm', 'Do not use the local language model')
  .action(async (options: ServeOptions) => {
    // stdout carries the protocol
    logToStderr();

    const profile = loadProfileOrExit(options.profile);
    const browser = createBrowser();
    const deps = createPipelineDeps(browser, createLanguageModel(options.llm));

    const server = createMcpServer({
      isConfigured: hasPortalCredentials(),
      runReport: (window) =>
        runPipeline(
          createRunOptions({
            profileName: options.profile,
            profile,
            ...window,
            maxCourses: config.scraper.maxCourses,
            outputDir: config.paths.outputDir,
          }),
          deps
        ),
      listProfiles: () => new ProfileLoader().list(),
      clock: () => new Date(),
    });

    server.server.onclose = () => {
      browser.close().catch((error) => logger.warn(`Failed to close browser: ${error}`));
    };

    await server.connect(new StdioServerTransport());
    logger.info(`MCP server ready (profile: ${options.profile})`);
  });
