import path from 'path';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { Config } from '../types/index.js';

dotenv.config();

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const projectRoot = path.resolve(__dirname, '../..');

function envString(name: string, fallback = ''): string {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? fallback : value.trim();
}

function envInt(name: string, fallback: number): number {
  const parsed = parseInt(envString(name), 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function envBool(name: string, fallback: boolean): boolean {
  const value = envString(name).toLowerCase();
  if (!value) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value);
}

/**
 * Reduce a portal URL to its origin, so a pasted login URL such as
 * `https://campus.example.edu/login/index.php` still builds correct paths.
 */
export function normalizeBaseUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  if (!trimmed) return trimmed;
  try {
    return new URL(trimmed).origin;
  } catch {
    return trimmed;
  }
}

const debug = envBool('SCRAPER_DEBUG_MODE', false);

export const config: Config = {
  portal: {
    profile: envString('PORTAL_PROFILE', 'moodle_default'),
    baseUrl: normalizeBaseUrl(envString('PORTAL_BASE_URL')),
    username: envString('PORTAL_USERNAME'),
    password: envString('PORTAL_PASSWORD'),
  },
  scraper: {
    daysAhead: envInt('SCRAPER_DAYS_AHEAD', 7),
    daysBehind: envInt('SCRAPER_DAYS_BEHIND', 7),
    maxCourses: envInt('SCRAPER_MAX_COURSES', 0),
    debug,
    requestDelayMs: envInt('SCRAPER_REQUEST_DELAY_MS', 500),
    timeoutMs: envInt('SCRAPER_TIMEOUT_MS', 20000),
    headless: envBool('SCRAPER_HEADLESS', true),
    browserChannel: envString('BROWSER_CHANNEL') || undefined,
  },
  ollama: {
    enabled: envBool('OLLAMA_ENABLED', true),
    baseUrl: envString('OLLAMA_BASE_URL', 'http://localhost:11434').replace(/\/+$/, ''),
    model: envString('OLLAMA_MODEL', 'llama3.1'),
    timeoutMs: envInt('OLLAMA_TIMEOUT_MS', 120000),
    maxCourseChars: 18000,
    maxPageChars: 8000,
  },
  logging: {
    level: envString('LOG_LEVEL', debug ? 'debug' : 'info'),
    silent: process.env.NODE_ENV === 'test',
  },
  paths: {
    projectRoot,
    dataDir: path.join(projectRoot, 'data'),
    logFile: path.join(projectRoot, 'data', 'lms-report.log'),
    outputDir: path.resolve(envString('OUTPUT_DIR', path.join(projectRoot, 'reports'))),
    profilesDir: path.join(projectRoot, 'profiles'),
    templatesDir: path.join(projectRoot, 'templates'),
  },
};
