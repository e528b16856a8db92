import { Assignment } from '../types/index.js';
import { LanguageModel } from '../llm/client.js';
import { BrowserDriver } from '../scraper/browser.js';
import { ReportSink } from '../report/sink.js';
import { buildClassification, normalizeDueDates } from '../report/classify.js';
import { renderReport } from '../report/render.js';
import { discoverCourses as runCourseCascade } from '../extraction/courses/index.js';
import { extractAssignments as runAssignmentCascade } from '../extraction/assignments/index.js';
import { toAbsoluteUrl } from '../utils/urls.js';
import { errorMessage, sleep } from '../utils/async.js';
import { logger } from '../utils/logger.js';
import { PipelineState, StageUpdate } from './state.js';

export interface PipelineSettings {
  timeoutMs: number;
  requestDelayMs: number;
  maxCourseChars: number;
  maxPageChars: number;
}

export interface PipelineDeps {
  browser: BrowserDriver;
  model: LanguageModel;
  openSink: (outputDir: string) => ReportSink;
  loadTemplate: () => Promise<string>;
  clock: () => Date;
  settings: PipelineSettings;
}

export type PipelineNode = (state: PipelineState, deps: PipelineDeps) => Promise<StageUpdate>;

function portalUrl(path: string, baseUrl: string): string {
  return toAbsoluteUrl(path, baseUrl) ?? `${baseUrl}${path}`;
}

export const authenticate: PipelineNode = async (state, deps) => {
  if (!state.baseUrl || !state.username || !state.password) {
    logger.warn('Portal URL or credentials not configured; skipping login');
    return { authenticated: false, sessionCookies: [] };
  }

  try {
    const result = await deps.browser.login({
      loginUrl: portalUrl(state.profile.auth.loginPath, state.baseUrl),
      username: state.username,
      password: state.password,
      auth: state.profile.auth,
      timeoutMs: deps.settings.timeoutMs,
    });

    if (!result.success) {
      return {
        authenticated: false,
        sessionCookies: [],
        errors: [`Auth error: ${result.error ?? 'login was not confirmed'}`],
      };
    }

    logger.info(`Logged in, ${result.cookies.length} session cookie(s) captured`);
    return { authenticated: true, sessionCookies: result.cookies };
  } catch (error) {
    return { authenticated: false, sessionCookies: [], errors: [`Auth error: ${errorMessage(error)}`] };
  }
};

export const discoverCourses: PipelineNode = async (state, deps) => {
  if (!state.authenticated) {
    logger.warn('No session; skipping course discovery');
    return { courses: [] };
  }

  try {
    const pageUrl = portalUrl(state.profile.navigation.coursesPage, state.baseUrl);
    const html = await deps.browser.fetchPage({
      url: pageUrl,
      cookies: state.sessionCookies,
      timeoutMs: deps.settings.timeoutMs,
    });

    const result = await runCourseCascade(
      { html, pageUrl, baseUrl: state.baseUrl },
      {
        profile: state.profile,
        model: deps.model,
        browser: deps.browser,
        cookies: state.sessionCookies,
        timeoutMs: deps.settings.timeoutMs,
        requestDelayMs: deps.settings.requestDelayMs,
        maxCourseChars: deps.settings.maxCourseChars,
        maxPageChars: deps.settings.maxPageChars,
      }
    );

    logger.info(`Found ${result.items.length} course(s)${result.strategy ? ` via ${result.strategy}` : ''}`);
    return { courses: result.items };
  } catch (error) {
    return { courses: [], errors: [`Course discovery error: ${errorMessage(error)}`] };
  }
};

export const extractAssignments: PipelineNode = async (state, deps) => {
  if (state.courses.length === 0) {
    return { assignments: [] };
  }

  const courses = state.maxCourses > 0 ? state.courses.slice(0, state.maxCourses) : state.courses;
  const assignments: Assignment[] = [];
  const errors: string[] = [];

  for (const [index, course] of courses.entries()) {
    if (index > 0) await sleep(deps.settings.requestDelayMs);
    logger.info(`Processing ${index + 1}/${courses.length}: ${course.name}`);

    try {
      const html = await deps.browser.fetchPage({
        url: course.url,
        cookies: state.sessionCookies,
        timeoutMs: deps.settings.timeoutMs,
      });
      const result = await runAssignmentCascade(
        { html, course },
        {
          profile: state.profile,
          model: deps.model,
          maxPageChars: deps.settings.maxPageChars,
          timeoutMs: deps.settings.timeoutMs,
          now: deps.clock,
        }
      );
      assignments.push(...result.items);
    } catch (error) {
      errors.push(`Extraction error (${course.name}): ${errorMessage(error)}`);
    }
  }

  logger.info(`Extracted ${assignments.length} activities from ${courses.length} course(s)`);
  return { assignments, errors };
};

export const classify: PipelineNode = async (state, deps) => {
  const now = deps.clock();
  const assignments = normalizeDueDates(state.assignments, now);
  const classification = buildClassification(assignments, {
    daysAhead: state.daysAhead,
    daysBehind: state.daysBehind,
    today: now,
  });

  logger.info(
    `Overdue: ${classification.overdue.length}, due today: ${classification.dueToday.length}, ` +
      `upcoming: ${classification.upcoming.length}, recently submitted: ${classification.recentlySubmitted.length}`
  );
  return { assignments, classification };
};

export const generateReport: PipelineNode = async (state, deps) => {
  const now = deps.clock();
  const window = { daysAhead: state.daysAhead, daysBehind: state.daysBehind };
  const classification = state.classification ?? buildClassification(state.assignments, { ...window, today: now });

  try {
    const template = await deps.loadTemplate();
    const content = renderReport(
      classification,
      state.courses,
      { title: state.reportTitle, generatedAt: now, window },
      template
    );
    const reportPath = await deps.openSink(state.outputDir).write(content);
    return { reportPath };
  } catch (error) {
    return { reportPath: '', errors: [`Report error: ${errorMessage(error)}`] };
  }
};
