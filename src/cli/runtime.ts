import { ProfileError, ProfileLoader, portalTitle } from '../profiles/loader.js';
import { PlaywrightBrowser } from '../scraper/portal.js';
import { BrowserDriver } from '../scraper/browser.js';
import { LanguageModel, OllamaClient, disabledLanguageModel } from '../llm/client.js';
import { FileReportSink } from '../report/sink.js';
import { loadReportTemplate } from '../report/template.js';
import { PipelineDeps } from '../pipeline/nodes.js';
import { RunOptions } from '../pipeline/state.js';
import { config } from '../utils/config.js';
import { DateWindow, PortalProfile } from '../types/index.js';

export function hasPortalCredentials(): boolean {
  const { baseUrl, username, password } = config.portal;
  return Boolean(baseUrl && username && password);
}

/** Load a profile, or print the problem and exit with code 1. */
export function loadProfileOrExit(name: string): PortalProfile {
  try {
    return new ProfileLoader().load(name);
  } catch (error) {
    if (error instanceof ProfileError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

export function createBrowser(): PlaywrightBrowser {
  return new PlaywrightBrowser({
    headless: config.scraper.headless,
    channel: config.scraper.browserChannel,
  });
}

export function createLanguageModel(useLlm: boolean): LanguageModel {
  if (!useLlm || !config.ollama.enabled) {
    return disabledLanguageModel;
  }
  return new OllamaClient({
    baseUrl: config.ollama.baseUrl,
    model: config.ollama.model,
    timeoutMs: config.ollama.timeoutMs,
  });
}

export function createPipelineDeps(browser: BrowserDriver, model: LanguageModel): PipelineDeps {
  return {
    browser,
    model,
    openSink: (outputDir) => new FileReportSink(outputDir),
    loadTemplate: () => loadReportTemplate(),
    clock: () => new Date(),
    settings: {
      timeoutMs: config.scraper.timeoutMs,
      requestDelayMs: config.scraper.requestDelayMs,
      maxCourseChars: config.ollama.maxCourseChars,
      maxPageChars: config.ollama.maxPageChars,
    },
  };
}

interface RunSettings extends DateWindow {
  profileName: string;
  profile: PortalProfile;
  maxCourses: number;
  outputDir: string;
}

export function createRunOptions(settings: RunSettings): RunOptions {
  const { baseUrl, username, password } = config.portal;
  return {
    ...settings,
    baseUrl,
    username,
    password,
    reportTitle: portalTitle(settings.profile, baseUrl),
  };
}
